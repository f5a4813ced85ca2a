/**
 * Periodic supervisor. Runs `tick` on an interval that never keeps the
 * process alive; a failing tick is logged and the next one still runs.
 */
export class JobMonitor {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private tick: () => void,
    private intervalMs: number = 1000
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runOnce(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  runOnce(): void {
    try {
      this.tick();
    } catch (error) {
      console.error('[JobMonitor] Monitoring error:', error);
    }
  }
}
