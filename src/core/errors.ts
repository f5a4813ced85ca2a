import type { AnalysisVerdict } from './entities/CodeIssue.js';
import type { DispatchFailure } from './entities/DispatchResult.js';

/**
 * Base class for every error the service reports to callers
 */
export class ExecServiceError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number = 500
  ) {
    super(message);
    this.name = code;
  }
}

export class AnalysisRejected extends ExecServiceError {
  constructor(readonly analysis: AnalysisVerdict) {
    super(
      `Code analysis found ${analysis.summary.high} high-severity issue(s)`,
      'AnalysisRejected',
      400
    );
  }
}

export class NoEligibleWorker extends ExecServiceError {
  constructor() {
    super('No workers available', 'NoEligibleWorker', 503);
  }
}

export class WorkerNotFound extends ExecServiceError {
  constructor(readonly worker: string) {
    super(`Worker '${worker}' not found`, 'WorkerNotFound', 404);
  }
}

export class DispatchConnectionError extends ExecServiceError {
  constructor(readonly worker: string, reason: string) {
    super(`Cannot connect to ${worker}: ${reason}`, 'DispatchConnectionError', 502);
  }
}

export class DispatchTimeout extends ExecServiceError {
  constructor(readonly worker: string, readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs / 1000}s on ${worker}`, 'DispatchTimeout', 504);
  }
}

export class RemoteNonZeroExit extends ExecServiceError {
  constructor(readonly worker: string, readonly exitCode: number, stderr: string) {
    super(
      `Command exited with code ${exitCode} on ${worker}${stderr ? `: ${stderr.trim()}` : ''}`,
      'RemoteNonZeroExit',
      502
    );
  }
}

export class JobNotFound extends ExecServiceError {
  constructor(readonly jobId: string) {
    super(`Job '${jobId}' not found`, 'JobNotFound', 404);
  }
}

export class InvalidTransition extends ExecServiceError {
  constructor(readonly jobId: string, from: string, action: string) {
    super(`Cannot ${action} job '${jobId}' in status '${from}'`, 'InvalidTransition', 409);
  }
}

export class ValidationError extends ExecServiceError {
  constructor(message: string, readonly details: string[] = []) {
    super(message, 'ValidationError', 400);
  }
}

/**
 * Translate a failed dispatch into the matching error
 */
export function errorForDispatch(result: DispatchFailure): ExecServiceError {
  const worker = result.worker ?? 'unknown';
  switch (result.kind) {
    case 'worker_not_found':
      return new WorkerNotFound(worker);
    case 'no_eligible_worker':
      return new NoEligibleWorker();
    case 'connection_error':
      return new DispatchConnectionError(worker, result.message);
    case 'timeout':
      return new DispatchTimeout(worker, result.timeoutMs);
    case 'remote_error':
      return new RemoteNonZeroExit(worker, result.exitCode, result.error);
    case 'remote_failure':
      return new ExecServiceError(
        `Worker agent on ${worker} answered ${result.statusCode}: ${result.message}`,
        'RemoteFailure',
        502
      );
    case 'cancelled':
      return new ExecServiceError(`Dispatch to ${worker} was cancelled`, 'Cancelled', 409);
  }
}
