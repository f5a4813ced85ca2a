import express, { Express } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { AppContext } from '../../context.js';
import type { Job } from '../../core/entities/Job.js';
import { errorHandler, notFoundHandler, requestLogger } from './http.js';
import { createExecRouter } from './routes/execRoutes.js';
import { createWorkerRouter } from './routes/workerRoutes.js';
import { createAdminRouter } from './routes/adminRoutes.js';

export interface JobUpdateMessage {
  type: 'job_updated';
  jobId: string;
  status: Job['status'];
  timestamp: string;
}

export type BroadcastMessage = JobUpdateMessage | { type: 'connected'; timestamp: string };

/**
 * HTTP API plus a WebSocket channel that pushes job updates
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private context: AppContext,
    private port: number = context.config.http.port
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors({ origin: this.context.config.http.corsOrigin }));
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(requestLogger(this.context.statsService));
  }

  private setupRoutes(): void {
    const routers = [
      createExecRouter(this.context),
      createWorkerRouter(this.context),
      createAdminRouter(this.context),
    ];

    // Same routes with and without the /api prefix
    for (const router of routers) {
      this.app.use('/api', router);
      this.app.use('/', router);
    }

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.debugLog('WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });

    this.unsubscribe = this.context.jobManager.onJobUpdated((job) => this.notifyJobUpdate(job));
  }

  broadcast(message: BroadcastMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  notifyJobUpdate(job: Job): void {
    this.broadcast({
      type: 'job_updated',
      jobId: job.id,
      status: job.status,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Bound port; differs from the configured one when that was 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port);
      this.httpServer = server;

      server.once('listening', () => {
        console.error(`[WebServer] API available at http://localhost:${this.getPort()}/api`);
        this.setupWebSocket();
        resolve();
      });

      server.once('error', (error) => {
        console.error('[WebServer] Server error:', error);
        this.httpServer = null;
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.unsubscribe?.();
      this.unsubscribe = null;

      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.terminate();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      const server = this.httpServer;
      this.httpServer = null;
      if (server) {
        server.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
        server.closeAllConnections();
      } else {
        resolve();
      }
    });
  }

  private debugLog(message: string): void {
    if (this.context.config.server.debug) {
      console.error(`[DEBUG] [WebServer] ${message}`);
    }
  }
}
