import { RequestLogEntry, RequestStats } from '../entities/RequestLog.js';

/**
 * Interface for request log persistence
 */
export interface IRequestLogRepository {
  append(entry: RequestLogEntry): void;

  getRecent(count: number): RequestLogEntry[];

  getStats(): RequestStats;

  clear(): void;
}
