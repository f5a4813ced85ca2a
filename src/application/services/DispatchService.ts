import { IWorkerDirectory } from '../../core/interfaces/IWorkerDirectory.js';
import { AgentExecOutcome, IWorkerAgentClient } from '../../core/interfaces/IWorkerAgentClient.js';
import { BatchDispatchResult, DispatchResult } from '../../core/entities/DispatchResult.js';
import { WorkerService } from './WorkerService.js';

type Aborted = { kind: 'aborted' };

/**
 * Resolves when the signal fires; the returned dispose detaches the listener
 */
function abortPromise(signal: AbortSignal): { promise: Promise<Aborted>; dispose: () => void } {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<Aborted>((resolve) => {
    onAbort = () => resolve({ kind: 'aborted' });
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

/**
 * Routes execute requests to worker agents and reports every outcome as a
 * tagged result. Nothing here throws past the public methods.
 */
export class DispatchService {
  constructor(
    private directory: IWorkerDirectory,
    private agentClient: IWorkerAgentClient,
    private workerService: WorkerService,
    private debug: boolean = false
  ) {}

  async dispatch(
    workerName: string,
    command: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<DispatchResult> {
    const startTime = Date.now();
    const elapsed = () => Date.now() - startTime;

    const worker = this.directory.getWorker(workerName);
    if (!worker) {
      return { kind: 'worker_not_found', success: false, worker: workerName, durationMs: elapsed() };
    }

    if (signal?.aborted) {
      return { kind: 'cancelled', success: false, worker: workerName, durationMs: elapsed() };
    }

    let outcome: AgentExecOutcome | Aborted;
    try {
      const call = this.agentClient.exec(worker, command, timeoutMs);
      if (signal) {
        // The request keeps running until its own deadline; only the caller stops waiting
        const abort = abortPromise(signal);
        try {
          outcome = await Promise.race([call, abort.promise]);
        } finally {
          abort.dispose();
        }
      } else {
        outcome = await call;
      }
    } catch (error) {
      outcome = { kind: 'connection_error', message: error instanceof Error ? error.message : String(error) };
    }

    const base = { worker: workerName, durationMs: elapsed() };
    this.debugLog(`${workerName}: ${outcome.kind} in ${base.durationMs}ms`);

    switch (outcome.kind) {
      case 'aborted':
        return { kind: 'cancelled', success: false, ...base };
      case 'timeout':
        return { kind: 'timeout', success: false, timeoutMs, ...base };
      case 'connection_error':
        return { kind: 'connection_error', success: false, message: outcome.message, ...base };
      case 'http_error':
        return {
          kind: 'remote_failure',
          success: false,
          statusCode: outcome.statusCode,
          message: outcome.message,
          ...base,
        };
      case 'completed':
        if (outcome.exitCode === 0) {
          return { kind: 'success', success: true, output: outcome.output, error: outcome.error, exitCode: 0, ...base };
        }
        return {
          kind: 'remote_error',
          success: false,
          exitCode: outcome.exitCode,
          output: outcome.output,
          error: outcome.error,
          ...base,
        };
    }
  }

  async dispatchToBest(command: string, timeoutMs: number, signal?: AbortSignal): Promise<DispatchResult> {
    const startTime = Date.now();
    let best: string | null;
    try {
      best = await this.workerService.selectBest();
    } catch (error) {
      console.error(
        `[DispatchService] Worker selection failed: ${error instanceof Error ? error.message : String(error)}`
      );
      best = null;
    }

    if (!best) {
      return {
        kind: 'no_eligible_worker',
        success: false,
        worker: null,
        durationMs: Date.now() - startTime,
        autoSelected: true,
      };
    }

    const result = await this.dispatch(best, command, timeoutMs, signal);
    return { ...result, autoSelected: true };
  }

  /**
   * Fan out to several workers at once. One worker failing never keeps the
   * others from reporting.
   */
  async batchDispatch(workers: string[] | 'all', command: string, timeoutMs: number): Promise<BatchDispatchResult> {
    const names = workers === 'all' ? this.directory.getWorkers().map((worker) => worker.name) : [...new Set(workers)];

    const outcomes = await Promise.all(names.map((name) => this.dispatch(name, command, timeoutMs)));

    const results: Record<string, DispatchResult> = {};
    names.forEach((name, index) => {
      results[name] = outcomes[index];
    });

    return {
      results,
      successCount: outcomes.filter((outcome) => outcome.success).length,
      total: names.length,
    };
  }

  private debugLog(message: string): void {
    if (this.debug) {
      console.error(`[DEBUG] [DispatchService] ${message}`);
    }
  }
}
