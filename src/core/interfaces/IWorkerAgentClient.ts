import { WorkerInfo, WorkerStatus } from '../entities/Worker.js';

export type AgentExecOutcome =
  | { kind: 'completed'; output: string; error: string; exitCode: number }
  | { kind: 'connection_error'; message: string }
  | { kind: 'timeout' }
  | { kind: 'http_error'; statusCode: number; message: string };

/**
 * Client for the per-worker agent (POST /exec, GET /ping, GET /status)
 */
export interface IWorkerAgentClient {
  exec(worker: WorkerInfo, command: string, timeoutMs: number): Promise<AgentExecOutcome>;

  ping(worker: WorkerInfo): Promise<boolean>;

  /**
   * Resolves null when the agent is unreachable
   */
  status(worker: WorkerInfo): Promise<WorkerStatus | null>;
}
