import { IRequestLogRepository } from '../../core/interfaces/IRequestLogRepository.js';
import { RequestLogEntry, RequestStats } from '../../core/entities/RequestLog.js';
import { JobStatistics } from '../../core/entities/Job.js';
import { JobManager } from '../../infrastructure/queue/JobManager.js';

export interface ServiceOverview {
  jobs: JobStatistics;
  requests: RequestStats;
  uptimeMs: number;
}

/**
 * Read-only admin view over the job table and the request log
 */
export class StatsService {
  private startedAt = Date.now();

  constructor(
    private jobManager: JobManager,
    private requestLog: IRequestLogRepository
  ) {}

  /**
   * Logging must never fail the request that is being logged
   */
  recordRequest(entry: RequestLogEntry): void {
    try {
      this.requestLog.append(entry);
    } catch (error) {
      console.error('[StatsService] Failed to record request:', error);
    }
  }

  getRecentRequests(count: number = 200): RequestLogEntry[] {
    return this.requestLog.getRecent(count);
  }

  getRequestStats(): RequestStats {
    return this.requestLog.getStats();
  }

  clearRequests(): void {
    this.requestLog.clear();
  }

  getJobStats(): JobStatistics {
    return this.jobManager.stats();
  }

  getOverview(): ServiceOverview {
    return {
      jobs: this.getJobStats(),
      requests: this.getRequestStats(),
      uptimeMs: Date.now() - this.startedAt,
    };
  }
}
