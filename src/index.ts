#!/usr/bin/env node

/**
 * Exec Gateway - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { AppContext, createAppContext } from './context.js';
import { McpServer } from './presentation/McpServer.js';
import { WebServer } from './infrastructure/web/WebServer.js';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

async function main() {
  let context: AppContext | null = null;
  let mcpServer: McpServer | null = null;
  let webServer: WebServer | null = null;
  let cleanupTimer: NodeJS.Timeout | null = null;

  const shutdown = async (signal: string, exitCode: number = 0) => {
    console.error(`\nReceived ${signal}, shutting down gracefully...`);

    if (cleanupTimer) {
      clearInterval(cleanupTimer);
    }

    // Stop MCP server first
    if (mcpServer) {
      await mcpServer.shutdown();
    }

    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }

    context?.shutdown();
    process.exit(exitCode);
  };

  try {
    const config = getConfig();
    printConfigInfo(config);

    context = createAppContext(config);
    context.jobManager.start();

    const appContext = context;
    cleanupTimer = setInterval(() => {
      appContext.jobManager.cleanup(config.jobs.retentionHours * 60 * 60 * 1000);
    }, CLEANUP_INTERVAL_MS);
    cleanupTimer.unref();

    if (config.http.enabled) {
      webServer = new WebServer(context);
      await webServer.start();
    }

    if (config.mcp.transport === 'stdio') {
      mcpServer = new McpServer(context);
      await mcpServer.start();
    }

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('Fatal error in main():', error);

    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }
    context?.shutdown();

    process.exit(1);
  }
}

void main();
