import Database from 'better-sqlite3';
import { IRequestLogRepository } from '../../../core/interfaces/IRequestLogRepository.js';
import { RequestLogEntry, RequestStats } from '../../../core/entities/RequestLog.js';

interface RequestLogRow {
  endpoint: string;
  method: string;
  worker: string | null;
  duration_ms: number;
  success: number;
  status_code: number | null;
  timestamp: string;
}

interface CountRow {
  key: string;
  count: number;
}

interface TotalsRow {
  total: number;
  success: number | null;
}

const TOP_ENDPOINT_LIMIT = 10;

function toCountMap(rows: CountRow[]): Record<string, number> {
  const map: Record<string, number> = {};
  for (const row of rows) {
    map[row.key] = row.count;
  }
  return map;
}

/**
 * SQLite implementation of the admin request log. Only the newest
 * `maxEntries` rows are kept; statistics cover the retained rows.
 */
export class RequestLogRepository implements IRequestLogRepository {
  constructor(
    private db: Database.Database,
    private maxEntries: number = 1000
  ) {}

  append(entry: RequestLogEntry): void {
    const insert = this.db.prepare<[string, string, string | null, number, number, number | null, string]>(`
      INSERT INTO request_logs (endpoint, method, worker, duration_ms, success, status_code, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const prune = this.db.prepare<[number]>(`
      DELETE FROM request_logs
      WHERE id NOT IN (SELECT id FROM request_logs ORDER BY id DESC LIMIT ?)
    `);

    const write = this.db.transaction((e: RequestLogEntry) => {
      insert.run(
        e.endpoint,
        e.method.toUpperCase(),
        e.worker ?? null,
        Math.max(0, Math.round(e.durationMs)),
        e.success ? 1 : 0,
        e.statusCode ?? null,
        e.timestamp.toISOString()
      );
      prune.run(this.maxEntries);
    });

    write(entry);
  }

  getRecent(count: number): RequestLogEntry[] {
    const rows = this.db
      .prepare<[number], RequestLogRow>(
        `SELECT endpoint, method, worker, duration_ms, success, status_code, timestamp
         FROM request_logs ORDER BY id DESC LIMIT ?`
      )
      .all(Math.max(0, count));

    // Oldest first, newest last
    return rows.reverse().map((row) => ({
      endpoint: row.endpoint,
      method: row.method,
      worker: row.worker,
      durationMs: row.duration_ms,
      success: row.success === 1,
      statusCode: row.status_code ?? undefined,
      timestamp: new Date(row.timestamp),
    }));
  }

  getStats(): RequestStats {
    const totals = this.db
      .prepare<[], TotalsRow>('SELECT COUNT(*) AS total, SUM(success) AS success FROM request_logs')
      .get();
    const total = totals?.total ?? 0;
    const success = totals?.success ?? 0;

    const byEndpointRows = this.db
      .prepare<[], CountRow>(
        `SELECT endpoint AS key, COUNT(*) AS count FROM request_logs
         GROUP BY endpoint ORDER BY count DESC, MIN(id) ASC`
      )
      .all();
    const byWorkerRows = this.db
      .prepare<[], CountRow>(
        `SELECT worker AS key, COUNT(*) AS count FROM request_logs
         WHERE worker IS NOT NULL GROUP BY worker ORDER BY MIN(id) ASC`
      )
      .all();
    const byMethodRows = this.db
      .prepare<[], CountRow>(
        'SELECT method AS key, COUNT(*) AS count FROM request_logs GROUP BY method ORDER BY MIN(id) ASC'
      )
      .all();

    return {
      total,
      success,
      failed: total - success,
      successRate: Math.round((success / Math.max(total, 1)) * 10000) / 100,
      byEndpoint: toCountMap(byEndpointRows),
      byWorker: toCountMap(byWorkerRows),
      byMethod: toCountMap(byMethodRows),
      activeWorkers: byWorkerRows.length,
      topEndpoints: byEndpointRows.slice(0, TOP_ENDPOINT_LIMIT).map((row) => row.key),
    };
  }

  clear(): void {
    this.db.prepare('DELETE FROM request_logs').run();
  }
}
