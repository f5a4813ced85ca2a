import { IWorkerDirectory } from '../../core/interfaces/IWorkerDirectory.js';
import { IWorkerAgentClient } from '../../core/interfaces/IWorkerAgentClient.js';
import {
  PingResult,
  PoolHealth,
  PoolHealthStatus,
  WorkerCandidate,
  WorkerInfo,
  WorkerStatus,
  WorkerSummary,
} from '../../core/entities/Worker.js';

export interface BestWorkerSelection {
  name: string;
  info: WorkerInfo;
  status: WorkerStatus;
  reason: string;
}

export interface WorkerLoad {
  name: string;
  online: boolean;
  cpuPercent: number | null;
  memoryPercent: number | null;
  gpus: number;
}

export interface PoolStatus {
  totalWorkers: number;
  onlineWorkers: number;
  offlineWorkers: number;
  workers: WorkerLoad[];
  recommendedWorker: string | null;
}

export interface PingSummary {
  results: Record<string, PingResult>;
  online: number;
  offline: number;
  total: number;
}

/**
 * Order candidates by combined load, then GPU count, then registration order
 */
export function compareCandidates(a: WorkerCandidate, b: WorkerCandidate): number {
  const loadA = a.status.cpuPercent + a.status.memoryPercent;
  const loadB = b.status.cpuPercent + b.status.memoryPercent;
  if (loadA !== loadB) return loadA - loadB;
  if (a.info.gpus !== b.info.gpus) return b.info.gpus - a.info.gpus;
  return a.order - b.order;
}

export function scorePoolHealth(online: number, total: number): { status: PoolHealthStatus; score: number } {
  if (total === 0) return { status: 'no_workers', score: 0 };
  if (online === 0) return { status: 'all_offline', score: 0 };
  if (online === total) return { status: 'excellent', score: 100 };

  const availability = (online / total) * 100;
  if (availability >= 80) return { status: 'good', score: 80 };
  if (availability >= 50) return { status: 'fair', score: 60 };
  return { status: 'poor', score: 40 };
}

/**
 * Worker registry view and load-based selector.
 *
 * Nothing is cached: every call takes a fresh directory snapshot and probes
 * the workers concurrently. A worker is eligible only when both its ping and
 * its status probe succeed.
 */
export class WorkerService {
  constructor(
    private directory: IWorkerDirectory,
    private agentClient: IWorkerAgentClient,
    private debug: boolean = false
  ) {}

  getWorkers(): WorkerInfo[] {
    return this.directory.getWorkers();
  }

  getWorker(name: string): WorkerInfo | null {
    return this.directory.getWorker(name);
  }

  async selectBest(): Promise<string | null> {
    const best = await this.selectBestDetailed();
    return best ? best.name : null;
  }

  async selectBestDetailed(): Promise<BestWorkerSelection | null> {
    const candidates = await this.probeCandidates(this.directory.getWorkers());
    if (candidates.length === 0) {
      this.debugLog('no eligible worker');
      return null;
    }

    const [best] = [...candidates].sort(compareCandidates);
    const load = best.status.cpuPercent + best.status.memoryPercent;
    const reason =
      `Lowest combined load among ${candidates.length} online worker(s): ` +
      `cpu ${best.status.cpuPercent}% + memory ${best.status.memoryPercent}% = ${load.toFixed(1)}` +
      (best.info.gpus > 0 ? `, ${best.info.gpus} GPU(s)` : '');

    this.debugLog(`selected ${best.info.name} (${reason})`);
    return { name: best.info.name, info: best.info, status: best.status, reason };
  }

  async getOnlineWorkers(): Promise<string[]> {
    const candidates = await this.probeCandidates(this.directory.getWorkers());
    return candidates.map((candidate) => candidate.info.name);
  }

  async listWorkers(): Promise<WorkerSummary[]> {
    const workers = this.directory.getWorkers();
    const online = await Promise.all(workers.map((worker) => this.agentClient.ping(worker)));
    return workers.map((worker, index) => ({ ...worker, online: online[index] }));
  }

  async pingWorker(name: string): Promise<PingResult> {
    const worker = this.directory.getWorker(name);
    if (!worker) {
      return { online: false, error: 'Worker not found' };
    }
    const online = await this.agentClient.ping(worker);
    return online ? { online, ip: worker.ip } : { online, ip: worker.ip, error: 'Agent did not respond' };
  }

  async pingAll(): Promise<PingSummary> {
    const workers = this.directory.getWorkers();
    const pings = await Promise.all(workers.map((worker) => this.pingWorker(worker.name)));

    const results: Record<string, PingResult> = {};
    workers.forEach((worker, index) => {
      results[worker.name] = pings[index];
    });
    const online = pings.filter((ping) => ping.online).length;

    return { results, online, offline: workers.length - online, total: workers.length };
  }

  async getWorkerStatus(name: string): Promise<WorkerStatus | null> {
    const worker = this.directory.getWorker(name);
    return worker ? this.agentClient.status(worker) : null;
  }

  async getPoolStatus(): Promise<PoolStatus> {
    const workers = this.directory.getWorkers();
    const candidates = await Promise.all(workers.map((worker, order) => this.probe(worker, order)));

    const loads: WorkerLoad[] = workers.map((worker, index) => {
      const candidate = candidates[index];
      return {
        name: worker.name,
        online: candidate !== null,
        cpuPercent: candidate ? candidate.status.cpuPercent : null,
        memoryPercent: candidate ? candidate.status.memoryPercent : null,
        gpus: worker.gpus,
      };
    });

    const eligible = candidates.filter((c): c is WorkerCandidate => c !== null).sort(compareCandidates);

    return {
      totalWorkers: workers.length,
      onlineWorkers: eligible.length,
      offlineWorkers: workers.length - eligible.length,
      workers: loads,
      recommendedWorker: eligible.length > 0 ? eligible[0].info.name : null,
    };
  }

  async getPoolHealth(): Promise<PoolHealth> {
    const workers = this.directory.getWorkers();
    const online = await this.getOnlineWorkers();
    const { status, score } = scorePoolHealth(online.length, workers.length);

    return {
      healthStatus: status,
      healthScore: score,
      onlineWorkers: online.length,
      totalWorkers: workers.length,
      availabilityPercentage:
        workers.length === 0 ? 0 : Math.round((online.length / workers.length) * 1000) / 10,
      onlineWorkerNames: online,
    };
  }

  private async probeCandidates(workers: WorkerInfo[]): Promise<WorkerCandidate[]> {
    const probed = await Promise.all(workers.map((worker, order) => this.probe(worker, order)));
    return probed.filter((candidate): candidate is WorkerCandidate => candidate !== null);
  }

  private async probe(worker: WorkerInfo, order: number): Promise<WorkerCandidate | null> {
    const online = await this.agentClient.ping(worker);
    if (!online) return null;

    const status = await this.agentClient.status(worker);
    if (!status) return null;

    return { info: worker, status, order };
  }

  private debugLog(message: string): void {
    if (this.debug) {
      console.error(`[DEBUG] [WorkerService] ${message}`);
    }
  }
}
