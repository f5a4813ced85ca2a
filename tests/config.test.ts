import { ZodError } from 'zod';
import { loadConfig, parseArgs } from '../src/config.js';

describe('parseArgs', () => {
  test('should read valued and bare flags', () => {
    expect(parseArgs(['--port', '9000', '--debug', '--workers-file', 'peers.json'])).toEqual({
      port: '9000',
      debug: true,
      'workers-file': 'peers.json',
    });
  });

  test('should ignore positional arguments', () => {
    expect(parseArgs(['serve', '--http', 'false'])).toEqual({ http: 'false' });
  });
});

describe('loadConfig', () => {
  test('should apply defaults', () => {
    const config = loadConfig([], {});

    expect(config.server).toEqual({ name: 'exec-gateway', version: '1.0.0', debug: false });
    expect(config.http).toEqual({ enabled: true, port: 8000, corsOrigin: '*' });
    expect(config.jobs).toEqual({
      maxConcurrentJobs: 5,
      monitorIntervalMs: 1000,
      defaultTimeoutSec: 30,
      retentionHours: 24,
    });
    expect(config.workers).toEqual({
      directoryPath: 'workers.json',
      agentPort: 7576,
      pingTimeoutMs: 2000,
      statusTimeoutMs: 3000,
      execCeilingMs: 300000,
    });
    expect(config.retry).toEqual({ attempts: 2, initialDelayMs: 200, maxDelayMs: 1000 });
    expect(config.requestLog).toEqual({ databasePath: 'data/request-log.db', maxEntries: 1000 });
    expect(config.mcp.transport).toBe('stdio');
  });

  test('should read the environment', () => {
    const config = loadConfig([], {
      PORT: '9100',
      DEBUG: 'true',
      MAX_CONCURRENT_JOBS: '8',
      REQUEST_LOG_DB: ':memory:',
      MCP_TRANSPORT: 'none',
    });

    expect(config.http.port).toBe(9100);
    expect(config.server.debug).toBe(true);
    expect(config.jobs.maxConcurrentJobs).toBe(8);
    expect(config.requestLog.databasePath).toBe(':memory:');
    expect(config.mcp.transport).toBe('none');
  });

  test('should let CLI flags win over the environment', () => {
    const config = loadConfig(['--port', '9200', '--http', 'false'], { PORT: '9100', HTTP_ENABLED: 'true' });

    expect(config.http.port).toBe(9200);
    expect(config.http.enabled).toBe(false);
  });

  test('should reject out-of-range values', () => {
    expect(() => loadConfig(['--max-concurrent-jobs', '0'], {})).toThrow(ZodError);
    expect(() => loadConfig([], { PORT: 'eighty' })).toThrow(ZodError);
    expect(() => loadConfig([], { MCP_TRANSPORT: 'sse' })).toThrow(ZodError);
  });

  test('should name the offending field', () => {
    try {
      loadConfig(['--monitor-interval', '10'], {});
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ZodError);
      if (error instanceof ZodError) {
        expect(error.errors[0].path).toEqual(['jobs', 'monitorIntervalMs']);
      }
    }
  });
});
