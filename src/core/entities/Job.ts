import type { AnalysisVerdict } from './CodeIssue.js';
import type { DispatchResult } from './DispatchResult.js';

/**
 * Job lifecycle states
 */
export const JOB_STATUSES = [
  'pending',
  'analyzing',
  'running',
  'completed',
  'failed',
  'cancelled',
  'timeout',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_PRIORITIES = ['low', 'normal', 'high', 'critical'] as const;

export type JobPriority = (typeof JOB_PRIORITIES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled', 'timeout'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface JobMetrics {
  cpuUsage: number;
  memoryUsage: number;
  executionTimeMs: number;
  outputLength: number;
}

/**
 * Job domain entity
 */
export interface Job {
  readonly id: string;
  code: string;
  worker: string | null;
  userId: string;
  status: JobStatus;
  priority: JobPriority;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  timeoutMs?: number;
  result?: DispatchResult;
  error?: string;
  analysis?: AnalysisVerdict;
  metrics: JobMetrics;
  abortController: AbortController;
  progress: number; // 0-1
}

export interface JobCreateOptions {
  worker?: string | null;
  userId?: string;
  priority?: JobPriority;
  timeoutMs?: number;
}

/**
 * Work handed to the execution pool. Receives the live job and must resolve
 * with the dispatch outcome.
 */
export type ExecutionFn = (job: Job) => Promise<DispatchResult>;

export interface JobStatistics {
  total: number;
  running: number;
  byStatus: Partial<Record<JobStatus, number>>;
  byWorker: Record<string, number>;
  avgExecutionTimeMs: number;
  maxConcurrent: number;
  queued: number;
  currentCpuUsage: number;
  currentMemoryUsage: number;
}
