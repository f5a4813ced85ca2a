/**
 * Best-effort host utilization probe; implementations return 0 when unavailable
 */
export interface ISystemMonitor {
  cpuPercent(): number;

  memoryPercent(): number;
}
