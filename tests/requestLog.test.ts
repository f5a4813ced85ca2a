import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { RequestLogRepository } from '../src/infrastructure/database/repositories/RequestLogRepository.js';
import { StatsService } from '../src/application/services/StatsService.js';
import { JobManager } from '../src/infrastructure/queue/JobManager.js';
import { IRequestLogRepository } from '../src/core/interfaces/IRequestLogRepository.js';
import { RequestLogEntry, RequestStats } from '../src/core/entities/RequestLog.js';
import { FixedSystemMonitor } from './fakes.js';

function entry(overrides: Partial<RequestLogEntry> = {}): RequestLogEntry {
  return {
    endpoint: '/exec',
    method: 'POST',
    worker: 'w1',
    durationMs: 12,
    success: true,
    statusCode: 200,
    timestamp: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

describe('RequestLogRepository', () => {
  let connection: DatabaseConnection;
  let repository: RequestLogRepository;

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY);
    repository = new RequestLogRepository(connection.getDatabase(), 3);
  });

  afterEach(() => {
    connection.close();
  });

  test('should store and read back an entry', () => {
    repository.append(entry({ method: 'post', durationMs: 12.6 }));

    expect(repository.getRecent(10)).toEqual([
      {
        endpoint: '/exec',
        method: 'POST',
        worker: 'w1',
        durationMs: 13,
        success: true,
        statusCode: 200,
        timestamp: new Date('2026-01-01T00:00:00.000Z'),
      },
    ]);
  });

  test('should return recent entries oldest first', () => {
    ['/a', '/b', '/c'].forEach((endpoint) => repository.append(entry({ endpoint })));

    expect(repository.getRecent(2).map((e) => e.endpoint)).toEqual(['/b', '/c']);
  });

  test('should keep only the newest entries', () => {
    ['/1', '/2', '/3', '/4', '/5'].forEach((endpoint) => repository.append(entry({ endpoint })));

    expect(repository.getRecent(10).map((e) => e.endpoint)).toEqual(['/3', '/4', '/5']);
    expect(repository.getStats().total).toBe(3);
  });

  test('should aggregate statistics', () => {
    const wide = new RequestLogRepository(connection.getDatabase(), 100);
    wide.append(entry({ endpoint: '/exec', worker: 'w1' }));
    wide.append(entry({ endpoint: '/workers', method: 'GET', worker: null }));
    wide.append(entry({ endpoint: '/exec', worker: 'w2', success: false, statusCode: 502 }));
    wide.append(entry({ endpoint: '/exec/jobs', method: 'GET', worker: undefined, statusCode: undefined }));

    expect(wide.getStats()).toEqual({
      total: 4,
      success: 3,
      failed: 1,
      successRate: 75,
      byEndpoint: { '/exec': 2, '/workers': 1, '/exec/jobs': 1 },
      byWorker: { w1: 1, w2: 1 },
      byMethod: { POST: 2, GET: 2 },
      activeWorkers: 2,
      topEndpoints: ['/exec', '/workers', '/exec/jobs'],
    });
  });

  test('should report zeros for an empty log', () => {
    expect(repository.getStats()).toEqual({
      total: 0,
      success: 0,
      failed: 0,
      successRate: 0,
      byEndpoint: {},
      byWorker: {},
      byMethod: {},
      activeWorkers: 0,
      topEndpoints: [],
    });
  });

  test('should clear all entries', () => {
    repository.append(entry());
    repository.clear();

    expect(repository.getRecent(10)).toEqual([]);
  });
});

describe('DatabaseConnection', () => {
  test('should open and close an in-memory store', () => {
    const connection = new DatabaseConnection(IN_MEMORY);

    expect(connection.getDatabasePath()).toBe(':memory:');
    expect(connection.isOpen()).toBe(true);
    connection.close();
    expect(connection.isOpen()).toBe(false);
    connection.close();
  });
});

describe('StatsService', () => {
  class FailingRequestLog implements IRequestLogRepository {
    append(): void {
      throw new Error('disk full');
    }

    getRecent(): RequestLogEntry[] {
      return [];
    }

    getStats(): RequestStats {
      return {
        total: 0,
        success: 0,
        failed: 0,
        successRate: 0,
        byEndpoint: {},
        byWorker: {},
        byMethod: {},
        activeWorkers: 0,
        topEndpoints: [],
      };
    }

    clear(): void {
      return;
    }
  }

  test('should never fail the request being logged', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const stats = new StatsService(new JobManager(new FixedSystemMonitor()), new FailingRequestLog());

    expect(() => stats.recordRequest(entry())).not.toThrow();
    expect(spy).toHaveBeenCalledWith('[StatsService] Failed to record request:', expect.any(Error));
    spy.mockRestore();
  });

  test('should combine job and request statistics', () => {
    const connection = new DatabaseConnection(IN_MEMORY);
    const jobManager = new JobManager(new FixedSystemMonitor());
    const stats = new StatsService(jobManager, new RequestLogRepository(connection.getDatabase()));
    jobManager.create('print(1)');
    stats.recordRequest(entry());

    const overview = stats.getOverview();
    expect(overview.jobs.total).toBe(1);
    expect(overview.jobs.currentCpuUsage).toBe(10);
    expect(overview.requests.total).toBe(1);
    expect(overview.uptimeMs).toBeGreaterThanOrEqual(0);
    connection.close();
  });
});
