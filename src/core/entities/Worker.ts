/**
 * Worker as advertised by the worker directory
 */
export interface WorkerInfo {
  name: string;
  ip: string;
  agentPort: number;
  cpus?: number;
  memoryGb?: number;
  gpus: number;
}

/**
 * Payload of a worker agent's GET /status
 */
export interface WorkerStatus {
  cpuPercent: number;
  memoryPercent: number;
  cpuCount?: number;
  hostname?: string;
  raw: Record<string, unknown>;
}

export interface WorkerCandidate {
  info: WorkerInfo;
  status: WorkerStatus;
  order: number;
}

export interface WorkerSummary extends WorkerInfo {
  online: boolean;
}

export interface PingResult {
  online: boolean;
  ip?: string;
  error?: string;
}

export type PoolHealthStatus = 'excellent' | 'good' | 'fair' | 'poor' | 'all_offline' | 'no_workers';

export interface PoolHealth {
  healthStatus: PoolHealthStatus;
  healthScore: number;
  onlineWorkers: number;
  totalWorkers: number;
  availabilityPercentage: number;
  onlineWorkerNames: string[];
}
