import fetch, { FetchError, Response } from 'node-fetch';
import { z } from 'zod';
import { AgentExecOutcome, IWorkerAgentClient } from '../../core/interfaces/IWorkerAgentClient.js';
import { WorkerInfo, WorkerStatus } from '../../core/entities/Worker.js';
import { CircuitBreaker, CircuitState, DEFAULT_RETRY_CONFIG, RetryConfig, isRetryableError, withRetry } from '../../utils/retry.js';

export interface WorkerAgentClientOptions {
  pingTimeoutMs: number;
  statusTimeoutMs: number;
  /**
   * Server-side ceiling the agent enforces on /exec; used when a caller passes no timeout
   */
  execCeilingMs: number;
  retry: RetryConfig;
  breakerFailureThreshold: number;
  breakerResetMs: number;
  debug: boolean;
}

export const DEFAULT_AGENT_CLIENT_OPTIONS: WorkerAgentClientOptions = {
  pingTimeoutMs: 2000,
  statusTimeoutMs: 3000,
  execCeilingMs: 300000,
  retry: DEFAULT_RETRY_CONFIG,
  breakerFailureThreshold: 5,
  breakerResetMs: 30000,
  debug: false,
};

const ExecResponseSchema = z
  .object({
    output: z.string().nullish(),
    error: z.string().nullish(),
    exit_code: z.number().int().nullish(),
  })
  .passthrough();

const StatusResponseSchema = z
  .object({
    cpu_percent: z.number().nullish(),
    memory_percent: z.number().nullish(),
    memory_total_gb: z.number().nullish(),
    memory_available_gb: z.number().nullish(),
    cpu_count: z.number().nullish(),
    hostname: z.string().nullish(),
  })
  .passthrough();

/**
 * Derive memory load from the agent's /status payload. Agents without
 * psutil only report totals, so fall back to available/total.
 */
export function memoryPercentFrom(status: z.infer<typeof StatusResponseSchema>): number {
  if (typeof status.memory_percent === 'number') {
    return status.memory_percent;
  }
  const total = status.memory_total_gb ?? 0;
  const available = status.memory_available_gb ?? 0;
  if (total <= 0) return 0;
  return Math.round((1 - available / total) * 1000) / 10;
}

/**
 * HTTP client for the worker agent that runs on every worker (port 7576 by default)
 */
export class WorkerAgentClient implements IWorkerAgentClient {
  private options: WorkerAgentClientOptions;
  private breakers: Map<string, CircuitBreaker> = new Map();

  constructor(options: Partial<WorkerAgentClientOptions> = {}) {
    this.options = { ...DEFAULT_AGENT_CLIENT_OPTIONS, ...options };
  }

  async exec(worker: WorkerInfo, command: string, timeoutMs: number): Promise<AgentExecOutcome> {
    const effectiveTimeout = timeoutMs > 0 ? timeoutMs : this.options.execCeilingMs;

    try {
      // Not retried: the command may already have run
      const res = await fetch(this.url(worker, '/exec'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ cmd: command }),
        timeout: effectiveTimeout,
      });
      const body = await this.readJson(res);

      if (res.status === 408) {
        return { kind: 'timeout' };
      }

      const parsed = ExecResponseSchema.safeParse(body);
      if (!res.ok) {
        const message = parsed.success && parsed.data.error ? parsed.data.error : res.statusText;
        return { kind: 'http_error', statusCode: res.status, message };
      }
      if (!parsed.success) {
        return { kind: 'http_error', statusCode: res.status, message: 'Malformed response from worker agent' };
      }

      return {
        kind: 'completed',
        output: parsed.data.output ?? '',
        error: parsed.data.error ?? '',
        exitCode: parsed.data.exit_code ?? 1,
      };
    } catch (error) {
      if (error instanceof FetchError && (error.type === 'request-timeout' || error.type === 'body-timeout')) {
        this.debugLog(`exec on ${worker.name} timed out after ${effectiveTimeout}ms`);
        return { kind: 'timeout' };
      }
      const message = error instanceof Error ? error.message : String(error);
      this.debugLog(`exec on ${worker.name} failed: ${message}`);
      return { kind: 'connection_error', message };
    }
  }

  async ping(worker: WorkerInfo): Promise<boolean> {
    try {
      await this.probe(worker, '/ping', this.options.pingTimeoutMs);
      return true;
    } catch (error) {
      this.debugLog(`ping ${worker.name} failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async status(worker: WorkerInfo): Promise<WorkerStatus | null> {
    try {
      const body = await this.probe(worker, '/status', this.options.statusTimeoutMs);
      const parsed = StatusResponseSchema.safeParse(body);
      if (!parsed.success) {
        this.debugLog(`status ${worker.name}: malformed payload`);
        return null;
      }
      return {
        cpuPercent: parsed.data.cpu_percent ?? 0,
        memoryPercent: memoryPercentFrom(parsed.data),
        cpuCount: parsed.data.cpu_count ?? undefined,
        hostname: parsed.data.hostname ?? undefined,
        raw: parsed.data,
      };
    } catch (error) {
      this.debugLog(`status ${worker.name} failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  getBreakerState(workerName: string): CircuitState {
    return this.breakers.get(workerName)?.getState() ?? 'closed';
  }

  /**
   * GET with retry, guarded by the worker's circuit breaker
   */
  private async probe(worker: WorkerInfo, path: string, timeoutMs: number): Promise<unknown> {
    return this.breakerFor(worker.name).execute(() =>
      withRetry(
        async () => {
          const res = await fetch(this.url(worker, path), {
            method: 'GET',
            headers: { 'Content-Type': 'application/json' },
            timeout: timeoutMs,
          });
          if (!res.ok) {
            throw new Error(`HTTP ${res.status}`);
          }
          return this.readJson(res);
        },
        { ...this.options.retry, timeoutMs: timeoutMs + 500 },
        undefined,
        isRetryableError
      )
    );
  }

  private breakerFor(workerName: string): CircuitBreaker {
    let breaker = this.breakers.get(workerName);
    if (!breaker) {
      breaker = new CircuitBreaker(workerName, this.options.breakerFailureThreshold, this.options.breakerResetMs);
      this.breakers.set(workerName, breaker);
    }
    return breaker;
  }

  private async readJson(res: Response): Promise<unknown> {
    const text = await res.text();
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch {
      return { error: text };
    }
  }

  private url(worker: WorkerInfo, path: string): string {
    return `http://${worker.ip}:${worker.agentPort}${path}`;
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[DEBUG] [WorkerAgentClient] ${message}`);
    }
  }
}
