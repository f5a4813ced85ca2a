import express from 'express';
import { Server } from 'http';
import { WorkerAgentClient, memoryPercentFrom } from '../src/infrastructure/http/WorkerAgentClient.js';
import { WorkerInfo } from '../src/core/entities/Worker.js';
import { JobManager } from '../src/infrastructure/queue/JobManager.js';
import { AnalyzerFactory } from '../src/infrastructure/analysis/AnalyzerFactory.js';
import { StaticWorkerDirectory } from '../src/infrastructure/workers/FileWorkerDirectory.js';
import { WorkerService } from '../src/application/services/WorkerService.js';
import { DispatchService } from '../src/application/services/DispatchService.js';
import { JobService } from '../src/application/services/JobService.js';
import { FixedSystemMonitor } from './fakes.js';

/**
 * Minimal worker agent: POST /exec, GET /ping, GET /status
 */
function createFakeAgent() {
  const app = express();
  app.use(express.json());

  app.post('/exec', (req, res) => {
    const cmd: unknown = req.body?.cmd;
    switch (cmd) {
      case 'echo hi':
        res.json({ output: 'hi\n', error: '', exit_code: 0 });
        return;
      case 'false':
        res.json({ output: '', error: 'failed\n', exit_code: 1 });
        return;
      case 'too-slow':
        res.status(408).json({ error: 'Command timed out' });
        return;
      case 'crash':
        res.status(500).json({ error: 'agent exploded' });
        return;
      case 'bad-shape':
        res.json({ output: 'x', exit_code: 'zero' });
        return;
      case 'hang':
        setTimeout(() => res.json({ output: '', error: '', exit_code: 0 }), 2000).unref();
        return;
      default:
        res.status(400).json({ error: 'unknown command' });
    }
  });

  app.get('/ping', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/status', (_req, res) => {
    res.json({ cpu_percent: 12.5, memory_total_gb: 16, memory_available_gb: 4, cpu_count: 8, hostname: 'fake-agent' });
  });

  return app;
}

function listen(app: express.Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

function portOf(server: Server): number {
  const address = server.address();
  return address && typeof address === 'object' ? address.port : 0;
}

const FAST_RETRY = { maxAttempts: 1, initialDelayMs: 10, maxDelayMs: 10, multiplier: 2, timeoutMs: 1000 };

describe('WorkerAgentClient', () => {
  let server: Server;
  let agent: WorkerInfo;
  let deadAgent: WorkerInfo;
  let client: WorkerAgentClient;

  beforeAll(async () => {
    server = await listen(createFakeAgent());
    agent = { name: 'local', ip: '127.0.0.1', agentPort: portOf(server), gpus: 0 };

    // Grab a port, then free it so nothing listens there
    const scratch = await listen(express());
    const deadPort = portOf(scratch);
    await close(scratch);
    deadAgent = { name: 'dead', ip: '127.0.0.1', agentPort: deadPort, gpus: 0 };
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    client = new WorkerAgentClient({ retry: FAST_RETRY, breakerFailureThreshold: 2 });
  });

  describe('exec', () => {
    test('should return output and exit code', async () => {
      expect(await client.exec(agent, 'echo hi', 5000)).toEqual({
        kind: 'completed',
        output: 'hi\n',
        error: '',
        exitCode: 0,
      });
    });

    test('should pass non-zero exits through', async () => {
      expect(await client.exec(agent, 'false', 5000)).toEqual({
        kind: 'completed',
        output: '',
        error: 'failed\n',
        exitCode: 1,
      });
    });

    test('should map the agent ceiling to a timeout', async () => {
      expect(await client.exec(agent, 'too-slow', 5000)).toEqual({ kind: 'timeout' });
    });

    test('should time out on the client deadline', async () => {
      expect(await client.exec(agent, 'hang', 100)).toEqual({ kind: 'timeout' });
    });

    test('should report agent errors with their message', async () => {
      expect(await client.exec(agent, 'crash', 5000)).toEqual({
        kind: 'http_error',
        statusCode: 500,
        message: 'agent exploded',
      });
    });

    test('should reject malformed payloads', async () => {
      expect(await client.exec(agent, 'bad-shape', 5000)).toEqual({
        kind: 'http_error',
        statusCode: 200,
        message: 'Malformed response from worker agent',
      });
    });

    test('should report an unreachable agent as a connection error', async () => {
      const outcome = await client.exec(deadAgent, 'echo hi', 5000);

      expect(outcome.kind).toBe('connection_error');
      if (outcome.kind === 'connection_error') {
        expect(outcome.message).toContain('ECONNREFUSED');
      }
    });
  });

  describe('jobs', () => {
    test('should end a job in timeout when the agent never answers in time', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const directory = new StaticWorkerDirectory([agent]);
      const workerService = new WorkerService(directory, client);
      const jobManager = new JobManager(new FixedSystemMonitor(), { monitorIntervalMs: 1000 });
      const jobService = new JobService(
        jobManager,
        new AnalyzerFactory(),
        new DispatchService(directory, client, workerService),
        workerService
      );
      jobManager.start();

      try {
        const { job } = jobService.safeExecute({ code: 'hang', language: 'shell', worker: 'local', timeoutSec: 0.2 });
        await jobManager.whenIdle();

        expect(job.status).toBe('timeout');
        expect(job.error).toBe('Job exceeded timeout of 0.2s');
      } finally {
        jobManager.shutdown();
        jest.restoreAllMocks();
      }
    });
  });

  describe('probes', () => {
    test('should ping a live agent', async () => {
      expect(await client.ping(agent)).toBe(true);
    });

    test('should derive memory load from totals', async () => {
      const status = await client.status(agent);

      expect(status).not.toBeNull();
      expect(status?.cpuPercent).toBe(12.5);
      expect(status?.memoryPercent).toBe(75);
      expect(status?.cpuCount).toBe(8);
      expect(status?.hostname).toBe('fake-agent');
      expect(status?.raw.memory_total_gb).toBe(16);
    });

    test('should treat an unreachable agent as offline', async () => {
      expect(await client.ping(deadAgent)).toBe(false);
      expect(await client.status(deadAgent)).toBeNull();
    });

    test('should open the breaker for a worker that keeps failing', async () => {
      await client.ping(deadAgent);
      await client.ping(deadAgent);

      expect(client.getBreakerState('dead')).toBe('open');
      expect(client.getBreakerState('local')).toBe('closed');
    });
  });
});

describe('memoryPercentFrom', () => {
  test('should prefer a reported percentage', () => {
    expect(memoryPercentFrom({ memory_percent: 33.3, memory_total_gb: 16, memory_available_gb: 1 })).toBe(33.3);
  });

  test('should fall back to zero without totals', () => {
    expect(memoryPercentFrom({})).toBe(0);
    expect(memoryPercentFrom({ memory_total_gb: 0, memory_available_gb: 0 })).toBe(0);
  });

  test('should round to one decimal', () => {
    expect(memoryPercentFrom({ memory_total_gb: 3, memory_available_gb: 1 })).toBe(66.7);
  });
});
