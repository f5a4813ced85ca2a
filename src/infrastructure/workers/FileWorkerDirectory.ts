import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { IWorkerDirectory } from '../../core/interfaces/IWorkerDirectory.js';
import { WorkerInfo } from '../../core/entities/Worker.js';

const PeerSchema = z
  .object({
    ip: z.string().min(1),
    agent_port: z.number().int().min(1).max(65535).optional(),
    cpus: z.number().nonnegative().optional(),
    memory: z.number().nonnegative().optional(),
    gpus: z.number().int().nonnegative().optional(),
  })
  .passthrough();

const DirectoryFileSchema = z.object({
  peers: z.record(PeerSchema).default({}),
});

/**
 * Convert a `{peers: {...}}` document into worker records, keeping key order
 */
export function parseDirectory(document: unknown, defaultAgentPort: number): WorkerInfo[] {
  const parsed = DirectoryFileSchema.parse(document);
  return Object.entries(parsed.peers).map(([name, peer]) => ({
    name,
    ip: peer.ip,
    agentPort: peer.agent_port ?? defaultAgentPort,
    cpus: peer.cpus,
    memoryGb: peer.memory,
    gpus: peer.gpus ?? 0,
  }));
}

/**
 * Worker directory backed by a JSON file. The file is re-read on every call,
 * so edits show up without a restart and each caller gets its own snapshot.
 */
export class FileWorkerDirectory implements IWorkerDirectory {
  // Message of the last failed read, null while the file parses
  private lastError: string | null = null;

  constructor(
    private filePath: string,
    private defaultAgentPort: number = 7576,
    private debug: boolean = false
  ) {}

  getWorkers(): WorkerInfo[] {
    if (!existsSync(this.filePath)) {
      if (this.debug) {
        console.error(`[DEBUG] [WorkerDirectory] ${this.filePath} not found, no workers registered`);
      }
      return [];
    }

    try {
      const document: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      const workers = parseDirectory(document, this.defaultAgentPort);
      if (this.lastError !== null) {
        console.error(`[WorkerDirectory] ${this.filePath} is readable again`);
        this.lastError = null;
      }
      return workers;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message !== this.lastError) {
        console.error(`[WorkerDirectory] Failed to read ${this.filePath}: ${message}`);
        this.lastError = message;
      }
      return [];
    }
  }

  getWorker(name: string): WorkerInfo | null {
    return this.getWorkers().find((worker) => worker.name === name) ?? null;
  }
}

/**
 * In-memory directory, used by tests and embedders that manage workers themselves
 */
export class StaticWorkerDirectory implements IWorkerDirectory {
  private workers: WorkerInfo[];

  constructor(workers: WorkerInfo[] = []) {
    this.workers = [...workers];
  }

  /**
   * Replace the whole worker set at once
   */
  replace(workers: WorkerInfo[]): void {
    this.workers = [...workers];
  }

  getWorkers(): WorkerInfo[] {
    return this.workers.map((worker) => ({ ...worker }));
  }

  getWorker(name: string): WorkerInfo | null {
    const worker = this.workers.find((w) => w.name === name);
    return worker ? { ...worker } : null;
  }
}
