import os from 'os';
import { ISystemMonitor } from '../../core/interfaces/ISystemMonitor.js';

interface CpuSnapshot {
  idle: number;
  total: number;
}

function snapshot(): CpuSnapshot {
  return os.cpus().reduce<CpuSnapshot>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return { idle: acc.idle + idle, total: acc.total + user + nice + sys + idle + irq };
    },
    { idle: 0, total: 0 }
  );
}

/**
 * Host utilization from the os module. CPU load is measured between two
 * consecutive calls; the first call compares against process start.
 */
export class SystemMonitor implements ISystemMonitor {
  private last: CpuSnapshot = snapshot();

  cpuPercent(): number {
    const current = snapshot();
    const idle = current.idle - this.last.idle;
    const total = current.total - this.last.total;
    this.last = current;
    if (total <= 0) return 0;
    return Math.round((1 - idle / total) * 1000) / 10;
  }

  memoryPercent(): number {
    const total = os.totalmem();
    if (total <= 0) return 0;
    return Math.round((1 - os.freemem() / total) * 1000) / 10;
  }
}
