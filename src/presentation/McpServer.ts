import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AppContext } from '../context.js';
import { registerExecTools } from './tools/ExecTools.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * MCP front end over the same services as the HTTP API
 */
export class McpServer {
  private server: BaseMcpServer;
  private connected = false;

  constructor(private context: AppContext) {
    this.server = new BaseMcpServer({
      name: context.config.server.name,
      version: context.config.server.version,
    });
    this.registerTools();
  }

  private registerTools() {
    const { jobService, workerService, dispatchService, statsService, config } = this.context;

    registerExecTools(this.server, jobService, workerService, dispatchService, config.jobs.defaultTimeoutSec);
    registerJobManagementTools(this.server, jobService);
    registerHealthCheckTool(this.server, workerService, statsService);
  }

  /**
   * Serve tools over stdio. stdout carries the protocol, so all logging goes to stderr.
   */
  async start() {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      console.error('[McpServer] stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('[McpServer] stdout error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('[McpServer] stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    this.connected = true;
    console.error(`[McpServer] ${this.context.config.server.name} running on stdio`);
  }

  async shutdown() {
    if (!this.connected) return;
    this.connected = false;
    try {
      await this.server.close();
    } catch (error) {
      console.error('[McpServer] Error closing MCP server:', error);
    }
  }
}
