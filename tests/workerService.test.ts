import { WorkerService, compareCandidates, scorePoolHealth } from '../src/application/services/WorkerService.js';
import { StaticWorkerDirectory } from '../src/infrastructure/workers/FileWorkerDirectory.js';
import { FakeAgentClient, worker } from './fakes.js';

describe('WorkerService', () => {
  describe('Selection', () => {
    test('should prefer lower combined load over GPU count', async () => {
      const directory = new StaticWorkerDirectory([worker('A', 0), worker('B', 1)]);
      const agents = new FakeAgentClient({
        A: { online: true, cpu: 10, memory: 10 },
        B: { online: true, cpu: 50, memory: 50 },
      });
      const service = new WorkerService(directory, agents);

      expect(await service.selectBest()).toBe('A');
    });

    test('should break load ties by GPU count', async () => {
      const directory = new StaticWorkerDirectory([worker('cpu-only', 0), worker('gpu-box', 2)]);
      const agents = new FakeAgentClient({
        'cpu-only': { online: true, cpu: 20, memory: 30 },
        'gpu-box': { online: true, cpu: 30, memory: 20 },
      });
      const service = new WorkerService(directory, agents);

      const best = await service.selectBestDetailed();
      expect(best?.name).toBe('gpu-box');
      expect(best?.reason).toBe(
        'Lowest combined load among 2 online worker(s): cpu 30% + memory 20% = 50.0, 2 GPU(s)'
      );
    });

    test('should break full ties by registration order', async () => {
      const directory = new StaticWorkerDirectory([worker('first'), worker('second')]);
      const agents = new FakeAgentClient({
        first: { online: true, cpu: 5, memory: 5 },
        second: { online: true, cpu: 5, memory: 5 },
      });
      const service = new WorkerService(directory, agents);

      expect(await service.selectBest()).toBe('first');
    });

    test('should skip unreachable workers whatever their last load', async () => {
      const directory = new StaticWorkerDirectory([worker('idle-but-down'), worker('busy')]);
      const agents = new FakeAgentClient({
        'idle-but-down': { online: false, cpu: 0, memory: 0 },
        busy: { online: true, cpu: 90, memory: 90 },
      });
      const service = new WorkerService(directory, agents);

      expect(await service.selectBest()).toBe('busy');
      expect(await service.getOnlineWorkers()).toEqual(['busy']);
    });

    test('should return null when nothing is eligible', async () => {
      const service = new WorkerService(
        new StaticWorkerDirectory([worker('down')]),
        new FakeAgentClient({ down: { online: false } })
      );

      expect(await service.selectBest()).toBeNull();
      expect(await service.selectBestDetailed()).toBeNull();
    });

    test('should recompute on every call', async () => {
      const directory = new StaticWorkerDirectory([worker('A'), worker('B')]);
      const agents = new FakeAgentClient({
        A: { online: true, cpu: 10, memory: 10 },
        B: { online: true, cpu: 50, memory: 50 },
      });
      const service = new WorkerService(directory, agents);

      expect(await service.selectBest()).toBe('A');
      agents.set('A', { online: true, cpu: 95, memory: 95 });
      expect(await service.selectBest()).toBe('B');
    });
  });

  describe('Pings', () => {
    test('should report unknown and silent workers', async () => {
      const service = new WorkerService(
        new StaticWorkerDirectory([worker('up', 0, '10.0.0.2'), worker('down', 0, '10.0.0.3')]),
        new FakeAgentClient({ up: { online: true } })
      );

      expect(await service.pingWorker('ghost')).toEqual({ online: false, error: 'Worker not found' });
      expect(await service.pingWorker('down')).toEqual({
        online: false,
        ip: '10.0.0.3',
        error: 'Agent did not respond',
      });

      const summary = await service.pingAll();
      expect(summary.online).toBe(1);
      expect(summary.offline).toBe(1);
      expect(summary.total).toBe(2);
      expect(summary.results.up).toEqual({ online: true, ip: '10.0.0.2' });
    });
  });

  describe('Pool', () => {
    test('should describe load per worker and recommend the best', async () => {
      const service = new WorkerService(
        new StaticWorkerDirectory([worker('A'), worker('B', 1), worker('C')]),
        new FakeAgentClient({
          A: { online: true, cpu: 40, memory: 40 },
          B: { online: true, cpu: 10, memory: 20 },
        })
      );

      const pool = await service.getPoolStatus();
      expect(pool.totalWorkers).toBe(3);
      expect(pool.onlineWorkers).toBe(2);
      expect(pool.offlineWorkers).toBe(1);
      expect(pool.recommendedWorker).toBe('B');
      expect(pool.workers[2]).toEqual({ name: 'C', online: false, cpuPercent: null, memoryPercent: null, gpus: 0 });
    });

    test('should score pool health from availability', async () => {
      const service = new WorkerService(
        new StaticWorkerDirectory([worker('A'), worker('B'), worker('C')]),
        new FakeAgentClient({ A: { online: true }, B: { online: true } })
      );

      expect(await service.getPoolHealth()).toEqual({
        healthStatus: 'fair',
        healthScore: 60,
        onlineWorkers: 2,
        totalWorkers: 3,
        availabilityPercentage: 66.7,
        onlineWorkerNames: ['A', 'B'],
      });
    });
  });
});

describe('scorePoolHealth', () => {
  test.each([
    [0, 0, 'no_workers', 0],
    [0, 4, 'all_offline', 0],
    [4, 4, 'excellent', 100],
    [4, 5, 'good', 80],
    [1, 2, 'fair', 60],
    [1, 4, 'poor', 40],
  ])('%i of %i online is %s', (online, total, status, score) => {
    expect(scorePoolHealth(online, total)).toEqual({ status, score });
  });
});

describe('compareCandidates', () => {
  test('should order by load, then GPUs, then order', () => {
    const candidate = (name: string, load: number, gpus: number, order: number) => ({
      info: worker(name, gpus),
      status: { cpuPercent: load, memoryPercent: 0, raw: {} },
      order,
    });

    const sorted = [
      candidate('d', 30, 0, 3),
      candidate('c', 10, 0, 2),
      candidate('b', 10, 0, 1),
      candidate('a', 10, 4, 0),
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.info.name)).toEqual(['a', 'b', 'c', 'd']);
  });
});
