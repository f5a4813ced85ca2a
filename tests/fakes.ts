import { AgentExecOutcome, IWorkerAgentClient } from '../src/core/interfaces/IWorkerAgentClient.js';
import { ISystemMonitor } from '../src/core/interfaces/ISystemMonitor.js';
import { WorkerInfo, WorkerStatus } from '../src/core/entities/Worker.js';

export interface FakeAgent {
  online: boolean;
  cpu?: number;
  memory?: number;
  exec?: (command: string, timeoutMs: number) => Promise<AgentExecOutcome>;
}

/**
 * In-process stand-in for the worker agents, keyed by worker name
 */
export class FakeAgentClient implements IWorkerAgentClient {
  readonly execCalls: Array<{ worker: string; command: string; timeoutMs: number }> = [];

  constructor(private agents: Record<string, FakeAgent> = {}) {}

  set(name: string, agent: FakeAgent): void {
    this.agents[name] = agent;
  }

  async exec(worker: WorkerInfo, command: string, timeoutMs: number): Promise<AgentExecOutcome> {
    this.execCalls.push({ worker: worker.name, command, timeoutMs });
    const agent = this.agents[worker.name];
    if (!agent || !agent.online) {
      return { kind: 'connection_error', message: `connect ECONNREFUSED ${worker.ip}:${worker.agentPort}` };
    }
    if (agent.exec) {
      return agent.exec(command, timeoutMs);
    }
    return { kind: 'completed', output: `ran ${command}\n`, error: '', exitCode: 0 };
  }

  async ping(worker: WorkerInfo): Promise<boolean> {
    return this.agents[worker.name]?.online ?? false;
  }

  async status(worker: WorkerInfo): Promise<WorkerStatus | null> {
    const agent = this.agents[worker.name];
    if (!agent || !agent.online) return null;
    const cpuPercent = agent.cpu ?? 0;
    const memoryPercent = agent.memory ?? 0;
    return {
      cpuPercent,
      memoryPercent,
      raw: { cpu_percent: cpuPercent, memory_percent: memoryPercent },
    };
  }
}

export class FixedSystemMonitor implements ISystemMonitor {
  cpuPercent(): number {
    return 10;
  }

  memoryPercent(): number {
    return 20;
  }
}

export function worker(name: string, gpus: number = 0, ip: string = '10.0.0.1'): WorkerInfo {
  return { name, ip, agentPort: 7576, gpus };
}
