import { randomUUID } from 'crypto';
import {
  ExecutionFn,
  Job,
  JobCreateOptions,
  JobStatistics,
  JobStatus,
  isTerminal,
} from '../../core/entities/Job.js';
import { AnalysisVerdict } from '../../core/entities/CodeIssue.js';
import { AnalysisRejected, errorForDispatch } from '../../core/errors.js';
import { ICodeAnalyzer } from '../../core/interfaces/ICodeAnalyzer.js';
import { ISystemMonitor } from '../../core/interfaces/ISystemMonitor.js';
import { ExecutionPool } from './ExecutionPool.js';
import { JobMonitor } from './JobMonitor.js';

export type JobUpdateListener = (job: Job) => void;

export type SuspiciousPattern = 'sustained_high_cpu' | 'high_memory_usage' | 'long_execution_no_progress';

export interface JobManagerOptions {
  maxConcurrentJobs: number;
  monitorIntervalMs: number;
  debug: boolean;
}

export interface AnalyzedJob {
  jobId: string;
  verdict: AnalysisVerdict;
  admitted: boolean;
}

const UNBOUNDED_PROGRESS_HORIZON_MS = 300_000;

function timeoutMessage(timeoutMs: number): string {
  return `Job exceeded timeout of ${timeoutMs / 1000}s`;
}

/**
 * Owns the job table, the execution pool and the timeout monitor.
 *
 * Every status change goes through `transition`, a synchronous
 * compare-and-set: whichever of the pool task and the monitor reaches a
 * terminal state first wins, and the other's write becomes a no-op.
 */
export class JobManager {
  private jobs: Map<string, Job> = new Map();
  private pool: ExecutionPool;
  private monitor: JobMonitor;
  private listeners: Set<JobUpdateListener> = new Set();
  private options: JobManagerOptions;

  constructor(
    private systemMonitor: ISystemMonitor,
    options: Partial<JobManagerOptions> = {}
  ) {
    this.options = { maxConcurrentJobs: 5, monitorIntervalMs: 1000, debug: false, ...options };
    this.pool = new ExecutionPool(this.options.maxConcurrentJobs);
    this.monitor = new JobMonitor(() => this.tick(), this.options.monitorIntervalMs);
  }

  /**
   * Start the periodic timeout monitor
   */
  start(): void {
    this.monitor.start();
    console.error(
      `[JobManager] Started (max ${this.options.maxConcurrentJobs} concurrent, monitor every ${this.options.monitorIntervalMs}ms)`
    );
  }

  create(code: string, options: JobCreateOptions = {}): string {
    const job: Job = {
      id: randomUUID(),
      code,
      worker: options.worker ?? null,
      userId: options.userId ?? 'anonymous',
      status: 'pending',
      priority: options.priority ?? 'normal',
      createdAt: new Date(),
      timeoutMs: options.timeoutMs,
      metrics: { cpuUsage: 0, memoryUsage: 0, executionTimeMs: 0, outputLength: 0 },
      abortController: new AbortController(),
      progress: 0,
    };

    this.jobs.set(job.id, job);
    this.debugLog(`Created job ${job.id} for ${job.userId}`);
    this.emit(job);
    return job.id;
  }

  /**
   * Create a job and run the analyzer on it. A rejecting verdict fails the
   * job straight from ANALYZING unless `allowRisky` is set.
   */
  createAnalyzed(
    code: string,
    options: JobCreateOptions & { allowRisky?: boolean },
    analyzer: ICodeAnalyzer
  ): AnalyzedJob {
    const jobId = this.create(code, options);
    const job = this.requireJob(jobId);
    this.transition(job, ['pending'], 'analyzing');

    const verdict = analyzer.analyze(code);
    job.analysis = verdict;

    if (!verdict.shouldExecute && !options.allowRisky) {
      this.transition(job, ['analyzing'], 'failed', (j) => {
        j.error = new AnalysisRejected(verdict).message;
      });
      return { jobId, verdict, admitted: false };
    }

    return { jobId, verdict, admitted: true };
  }

  /**
   * Hand a job to the pool. False when the job is unknown or already scheduled.
   */
  submit(jobId: string, fn: ExecutionFn): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;

    const started = this.transition(job, ['pending', 'analyzing'], 'running', (j) => {
      j.startedAt = new Date();
    });
    if (!started) return false;

    this.pool.run(() => this.execute(job, fn));
    return true;
  }

  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) return false;

    return this.transition(job, ['pending', 'analyzing', 'running'], 'cancelled', (j) => {
      j.error = 'Job was cancelled';
      j.abortController.abort();
    });
  }

  get(jobId: string): Job | null {
    return this.jobs.get(jobId) ?? null;
  }

  list(userId?: string): Job[] {
    const all = Array.from(this.jobs.values());
    return userId === undefined ? all : all.filter((job) => job.userId === userId);
  }

  listByStatus(status: JobStatus): Job[] {
    return this.list().filter((job) => job.status === status);
  }

  getRunning(): Job[] {
    return this.listByStatus('running');
  }

  /**
   * One monitor pass: time out overdue jobs and refresh progress estimates
   */
  tick(now: number = Date.now()): void {
    for (const job of this.getRunning()) {
      try {
        this.superviseJob(job, now);
      } catch (error) {
        console.error(`[JobManager] Monitoring job ${job.id} failed:`, error);
      }
    }
  }

  /**
   * Remove terminal jobs that completed before the cutoff
   */
  cleanup(maxAgeMs: number): number {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;

    for (const [jobId, job] of this.jobs.entries()) {
      if (isTerminal(job.status) && job.completedAt && job.completedAt.getTime() < cutoff) {
        this.jobs.delete(jobId);
        removed++;
      }
    }

    if (removed > 0) {
      console.error(`[JobManager] Cleaned up ${removed} old job(s)`);
    }
    return removed;
  }

  stats(): JobStatistics {
    const all = this.list();
    const byStatus: Partial<Record<JobStatus, number>> = {};
    const byWorker: Record<string, number> = {};

    for (const job of all) {
      byStatus[job.status] = (byStatus[job.status] ?? 0) + 1;
      const worker = job.worker ?? 'unassigned';
      byWorker[worker] = (byWorker[worker] ?? 0) + 1;
    }

    const timed = all.filter((job) => job.startedAt && job.completedAt);
    const totalMs = timed.reduce(
      (sum, job) => sum + ((job.completedAt?.getTime() ?? 0) - (job.startedAt?.getTime() ?? 0)),
      0
    );

    return {
      total: all.length,
      running: this.getRunning().length,
      byStatus,
      byWorker,
      avgExecutionTimeMs: timed.length === 0 ? 0 : Math.round(totalMs / timed.length),
      maxConcurrent: this.pool.maxConcurrent,
      queued: this.pool.queuedCount,
      currentCpuUsage: this.sample(() => this.systemMonitor.cpuPercent()),
      currentMemoryUsage: this.sample(() => this.systemMonitor.memoryPercent()),
    };
  }

  /**
   * Heuristic flags for runaway jobs, based on the sampled metrics
   */
  detectSuspiciousPatterns(job: Job): SuspiciousPattern[] {
    const patterns: SuspiciousPattern[] = [];

    if (job.metrics.cpuUsage > 90 && job.metrics.executionTimeMs > 30_000) {
      patterns.push('sustained_high_cpu');
    }
    if (job.metrics.memoryUsage > 80) {
      patterns.push('high_memory_usage');
    }
    if (job.metrics.executionTimeMs > 300_000 && job.progress < 0.1) {
      patterns.push('long_execution_no_progress');
    }

    return patterns;
  }

  /**
   * Subscribe to job changes; returns the unsubscribe function
   */
  onJobUpdated(listener: JobUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once the pool has no running or queued task
   */
  whenIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  /**
   * Stop the monitor and cancel everything not yet terminal
   */
  shutdown(): void {
    this.monitor.stop();
    let cancelled = 0;
    for (const job of this.jobs.values()) {
      if (!isTerminal(job.status) && this.cancel(job.id)) {
        cancelled++;
      }
    }
    console.error(`[JobManager] Shut down, cancelled ${cancelled} job(s)`);
  }

  /**
   * Compare-and-set on a job's status. Applies `mutate` and notifies
   * listeners only when the job is non-terminal and in one of `allowedFrom`.
   */
  private transition(
    job: Job,
    allowedFrom: JobStatus[],
    to: JobStatus,
    mutate?: (job: Job) => void
  ): boolean {
    if (isTerminal(job.status) || !allowedFrom.includes(job.status)) {
      return false;
    }

    job.status = to;
    mutate?.(job);

    if (isTerminal(to)) {
      job.completedAt = new Date();
      if (job.startedAt) {
        job.metrics.executionTimeMs = job.completedAt.getTime() - job.startedAt.getTime();
      }
    }

    this.debugLog(`Job ${job.id} -> ${to}`);
    this.emit(job);
    return true;
  }

  private async execute(job: Job, fn: ExecutionFn): Promise<void> {
    // Checkpoint before the remote call
    if (job.abortController.signal.aborted || isTerminal(job.status)) {
      return;
    }

    try {
      const result = await fn(job);

      // Checkpoint after the remote call; a cancel or timeout already won
      if (job.abortController.signal.aborted || isTerminal(job.status)) {
        return;
      }

      if (result.kind === 'timeout') {
        const limitMs = job.timeoutMs ?? result.timeoutMs;
        this.transition(job, ['running'], 'timeout', (j) => {
          j.result = result;
          j.worker = result.worker ?? j.worker;
          j.error = timeoutMessage(limitMs);
        });
      } else if (result.success) {
        this.transition(job, ['running'], 'completed', (j) => {
          j.result = result;
          j.worker = result.worker ?? j.worker;
          j.progress = 1;
          j.metrics.outputLength = result.output.length;
        });
      } else {
        this.transition(job, ['running'], 'failed', (j) => {
          j.result = result;
          j.worker = result.worker ?? j.worker;
          j.error = errorForDispatch(result).message;
          j.metrics.outputLength = 'output' in result ? result.output.length : 0;
        });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[JobManager] Job ${job.id} failed: ${message}`);
      this.transition(job, ['running'], 'failed', (j) => {
        j.error = message;
      });
    }
  }

  private superviseJob(job: Job, now: number): void {
    if (!job.startedAt) return;
    const elapsed = now - job.startedAt.getTime();

    if (job.timeoutMs !== undefined && elapsed > job.timeoutMs) {
      const timeoutMs = job.timeoutMs;
      const timedOut = this.transition(job, ['running'], 'timeout', (j) => {
        j.error = timeoutMessage(timeoutMs);
        j.abortController.abort();
      });
      if (timedOut) {
        console.error(`[JobManager] Job ${job.id} timed out after ${elapsed}ms`);
      }
      return;
    }

    job.progress =
      job.timeoutMs !== undefined && job.timeoutMs > 0
        ? Math.min(0.9, (elapsed / job.timeoutMs) * 0.8)
        : Math.min(0.5, elapsed / UNBOUNDED_PROGRESS_HORIZON_MS);
    job.metrics.executionTimeMs = elapsed;
    job.metrics.cpuUsage = this.sample(() => this.systemMonitor.cpuPercent());
    job.metrics.memoryUsage = this.sample(() => this.systemMonitor.memoryPercent());

    const patterns = this.detectSuspiciousPatterns(job);
    if (patterns.length > 0) {
      this.debugLog(`Job ${job.id} looks suspicious: ${patterns.join(', ')}`);
    }
  }

  private sample(read: () => number): number {
    try {
      const value = read();
      return Number.isFinite(value) ? value : 0;
    } catch {
      return 0;
    }
  }

  private requireJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} vanished during creation`);
    }
    return job;
  }

  private emit(job: Job): void {
    for (const listener of this.listeners) {
      try {
        listener(job);
      } catch (error) {
        console.error('[JobManager] Job update listener failed:', error);
      }
    }
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[DEBUG] [JobManager] ${message}`);
    }
  }
}
