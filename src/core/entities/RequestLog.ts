export interface RequestLogEntry {
  endpoint: string;
  method: string;
  worker?: string | null;
  durationMs: number;
  success: boolean;
  statusCode?: number;
  timestamp: Date;
}

export interface RequestStats {
  total: number;
  success: number;
  failed: number;
  successRate: number;
  byEndpoint: Record<string, number>;
  byWorker: Record<string, number>;
  byMethod: Record<string, number>;
  activeWorkers: number;
  topEndpoints: string[];
}
