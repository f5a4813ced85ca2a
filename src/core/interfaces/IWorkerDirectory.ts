import { WorkerInfo } from '../entities/Worker.js';

/**
 * Source of known workers, in registration order
 */
export interface IWorkerDirectory {
  getWorkers(): WorkerInfo[];

  getWorker(name: string): WorkerInfo | null;
}
