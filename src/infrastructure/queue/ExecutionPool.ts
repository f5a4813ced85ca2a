type Task = () => Promise<void>;

/**
 * Bounded FIFO pool. At most `capacity` tasks run at once; the rest wait in
 * submission order. A task's rejection is logged and never escapes the pool.
 */
export class ExecutionPool {
  private queue: Task[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private capacity: number = 5) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Pool capacity must be a positive integer, got ${capacity}`);
    }
  }

  run(task: Task): void {
    this.queue.push(task);
    this.pump();
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get maxConcurrent(): number {
    return this.capacity;
  }

  /**
   * Resolves once nothing is running or queued
   */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.capacity && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      this.active++;
      void this.runTask(task);
    }
  }

  private async runTask(task: Task): Promise<void> {
    try {
      await task();
    } catch (error) {
      console.error('[ExecutionPool] Task failed:', error);
    } finally {
      this.active--;
      this.pump();
      if (this.active === 0 && this.queue.length === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}
