interface DispatchBase {
  worker: string | null;
  durationMs: number;
  autoSelected?: boolean;
}

export interface DispatchSuccess extends DispatchBase {
  kind: 'success';
  success: true;
  output: string;
  error: string;
  exitCode: 0;
}

export interface DispatchWorkerNotFound extends DispatchBase {
  kind: 'worker_not_found';
  success: false;
}

export interface DispatchNoEligibleWorker extends DispatchBase {
  kind: 'no_eligible_worker';
  success: false;
}

export interface DispatchConnectionFailure extends DispatchBase {
  kind: 'connection_error';
  success: false;
  message: string;
}

export interface DispatchTimedOut extends DispatchBase {
  kind: 'timeout';
  success: false;
  timeoutMs: number;
}

export interface DispatchRemoteError extends DispatchBase {
  kind: 'remote_error';
  success: false;
  exitCode: number;
  output: string;
  error: string;
}

export interface DispatchRemoteFailure extends DispatchBase {
  kind: 'remote_failure';
  success: false;
  statusCode: number;
  message: string;
}

export interface DispatchCancelled extends DispatchBase {
  kind: 'cancelled';
  success: false;
}

/**
 * Outcome of one remote execute call
 */
export type DispatchResult =
  | DispatchSuccess
  | DispatchWorkerNotFound
  | DispatchNoEligibleWorker
  | DispatchConnectionFailure
  | DispatchTimedOut
  | DispatchRemoteError
  | DispatchRemoteFailure
  | DispatchCancelled;

export type DispatchFailure = Exclude<DispatchResult, DispatchSuccess>;

export interface BatchDispatchResult {
  results: Record<string, DispatchResult>;
  successCount: number;
  total: number;
}
