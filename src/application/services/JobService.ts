import { JobManager, SuspiciousPattern } from '../../infrastructure/queue/JobManager.js';
import { AnalyzerFactory } from '../../infrastructure/analysis/AnalyzerFactory.js';
import { Job, JobPriority, JobStatistics } from '../../core/entities/Job.js';
import { AnalysisVerdict } from '../../core/entities/CodeIssue.js';
import { DispatchResult } from '../../core/entities/DispatchResult.js';
import { AnalysisRejected, InvalidTransition, JobNotFound } from '../../core/errors.js';
import { DispatchService } from './DispatchService.js';
import { WorkerService } from './WorkerService.js';

export interface SafeExecuteRequest {
  code: string;
  worker?: string;
  timeoutSec?: number;
  priority?: JobPriority;
  allowRisky?: boolean;
  userId?: string;
  language?: string;
}

export interface SafeExecuteResult {
  job: Job;
  analysis: AnalysisVerdict;
}

/**
 * Service for analyzed submissions and job lifecycle operations
 */
export class JobService {
  constructor(
    private jobManager: JobManager,
    private analyzers: AnalyzerFactory,
    private dispatchService: DispatchService,
    private workerService: WorkerService,
    private defaultTimeoutSec: number = 30
  ) {}

  analyze(code: string, language?: string): AnalysisVerdict {
    return this.analyzers.getAnalyzer(language).analyze(code);
  }

  /**
   * Analyze, create and schedule a job. Throws AnalysisRejected when the
   * verdict blocks execution and the caller did not allow risky code.
   */
  safeExecute(request: SafeExecuteRequest): SafeExecuteResult {
    const analyzer = this.analyzers.getAnalyzer(request.language);
    const timeoutSec = request.timeoutSec ?? this.defaultTimeoutSec;
    const timeoutMs = timeoutSec * 1000;

    const { jobId, verdict, admitted } = this.jobManager.createAnalyzed(
      request.code,
      {
        worker: request.worker ?? null,
        userId: request.userId,
        priority: request.priority,
        timeoutMs,
        allowRisky: request.allowRisky,
      },
      analyzer
    );

    if (!admitted) {
      throw new AnalysisRejected(verdict);
    }
    if (!verdict.shouldExecute) {
      console.error(`[JobService] Job ${jobId} admitted despite ${verdict.summary.high} high-severity issue(s)`);
    }

    const command = analyzer.buildCommand(request.code);
    this.jobManager.submit(jobId, (job) => this.runJob(job, command, timeoutMs));

    return { job: this.requireJob(jobId), analysis: verdict };
  }

  getJob(jobId: string): Job {
    return this.requireJob(jobId);
  }

  listJobs(userId?: string): Job[] {
    return this.jobManager.list(userId).sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Throws InvalidTransition when the job is already terminal
   */
  cancelJob(jobId: string): Job {
    const job = this.requireJob(jobId);
    const from = job.status;
    if (!this.jobManager.cancel(jobId)) {
      throw new InvalidTransition(jobId, from, 'cancel');
    }
    return job;
  }

  detectSuspiciousPatterns(job: Job): SuspiciousPattern[] {
    return this.jobManager.detectSuspiciousPatterns(job);
  }

  cleanup(maxAgeHours: number): number {
    return this.jobManager.cleanup(maxAgeHours * 60 * 60 * 1000);
  }

  getStatistics(): JobStatistics {
    return this.jobManager.stats();
  }

  /**
   * Pool task: resolve a worker when none was given, then dispatch
   */
  private async runJob(job: Job, command: string, timeoutMs: number): Promise<DispatchResult> {
    const signal = job.abortController.signal;

    if (job.worker === null) {
      const selected = await this.workerService.selectBest();
      if (selected === null) {
        return { kind: 'no_eligible_worker', success: false, worker: null, durationMs: 0, autoSelected: true };
      }
      if (job.status === 'running') {
        job.worker = selected;
      }
      const result = await this.dispatchService.dispatch(selected, command, timeoutMs, signal);
      return { ...result, autoSelected: true };
    }

    return this.dispatchService.dispatch(job.worker, command, timeoutMs, signal);
  }

  private requireJob(jobId: string): Job {
    const job = this.jobManager.get(jobId);
    if (!job) {
      throw new JobNotFound(jobId);
    }
    return job;
  }
}
