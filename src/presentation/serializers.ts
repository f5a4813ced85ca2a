import { Job, JobStatistics } from '../core/entities/Job.js';
import { AnalysisVerdict } from '../core/entities/CodeIssue.js';
import { BatchDispatchResult, DispatchResult } from '../core/entities/DispatchResult.js';
import { PoolHealth, WorkerInfo, WorkerStatus, WorkerSummary } from '../core/entities/Worker.js';
import { RequestLogEntry, RequestStats } from '../core/entities/RequestLog.js';
import { errorForDispatch } from '../core/errors.js';
import { BestWorkerSelection, PingSummary, PoolStatus } from '../application/services/WorkerService.js';

/**
 * Wire shapes shared by the HTTP API and the MCP tools (snake_case keys)
 */

export function serializeVerdict(verdict: AnalysisVerdict) {
  return {
    language: verdict.language,
    should_execute: verdict.shouldExecute,
    issues: verdict.issues.map((issue) => ({
      type: issue.type,
      severity: issue.severity,
      line: issue.line,
      message: issue.message,
      suggestion: issue.suggestion ?? null,
    })),
    suggestions: verdict.suggestions,
    summary: {
      total_issues: verdict.summary.totalIssues,
      high: verdict.summary.high,
      medium: verdict.summary.medium,
      low: verdict.summary.low,
    },
  };
}

export function serializeDispatch(result: DispatchResult) {
  const base = {
    kind: result.kind,
    success: result.success,
    worker: result.worker,
    duration_ms: result.durationMs,
    ...(result.autoSelected ? { auto_selected: true } : {}),
  };

  switch (result.kind) {
    case 'success':
      return { ...base, output: result.output, error: result.error, exit_code: result.exitCode };
    case 'remote_error':
      return { ...base, output: result.output, error: result.error, exit_code: result.exitCode };
    case 'timeout':
      return { ...base, error: errorForDispatch(result).message, timeout_ms: result.timeoutMs };
    case 'remote_failure':
      return { ...base, error: errorForDispatch(result).message, status_code: result.statusCode };
    case 'connection_error':
    case 'worker_not_found':
    case 'no_eligible_worker':
    case 'cancelled':
      return { ...base, error: errorForDispatch(result).message };
  }
}

export function serializeBatch(batch: BatchDispatchResult) {
  const results: Record<string, ReturnType<typeof serializeDispatch>> = {};
  for (const [worker, result] of Object.entries(batch.results)) {
    results[worker] = serializeDispatch(result);
  }
  return { results, success_count: batch.successCount, total: batch.total };
}

export function serializeJobSummary(job: Job) {
  return {
    job_id: job.id,
    status: job.status,
    worker: job.worker,
    user_id: job.userId,
    priority: job.priority,
    progress: Math.round(job.progress * 1000) / 1000,
    created_at: job.createdAt.toISOString(),
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
  };
}

export function serializeJobDetail(job: Job, suspiciousPatterns: string[] = []) {
  return {
    ...serializeJobSummary(job),
    code: job.code,
    started_at: job.startedAt ? job.startedAt.toISOString() : null,
    timeout_ms: job.timeoutMs ?? null,
    result: job.result ? serializeDispatch(job.result) : null,
    error: job.error ?? null,
    analysis: job.analysis ? serializeVerdict(job.analysis) : null,
    metrics: {
      cpu_usage: job.metrics.cpuUsage,
      memory_usage: job.metrics.memoryUsage,
      execution_time_ms: job.metrics.executionTimeMs,
      output_length: job.metrics.outputLength,
    },
    suspicious_patterns: suspiciousPatterns,
  };
}

export function serializeJobStats(stats: JobStatistics) {
  return {
    total_jobs: stats.total,
    running_jobs: stats.running,
    queued_jobs: stats.queued,
    max_concurrent: stats.maxConcurrent,
    by_status: stats.byStatus,
    by_worker: stats.byWorker,
    avg_execution_time_ms: stats.avgExecutionTimeMs,
    current_cpu_usage: stats.currentCpuUsage,
    current_memory_usage: stats.currentMemoryUsage,
  };
}

export function serializeWorkerInfo(worker: WorkerInfo) {
  return {
    name: worker.name,
    ip: worker.ip,
    agent_port: worker.agentPort,
    cpus: worker.cpus ?? null,
    memory_gb: worker.memoryGb ?? null,
    gpus: worker.gpus,
  };
}

export function serializeWorkerSummary(worker: WorkerSummary) {
  return { ...serializeWorkerInfo(worker), online: worker.online };
}

export function serializeWorkerStatus(status: WorkerStatus) {
  return {
    ...status.raw,
    cpu_percent: status.cpuPercent,
    memory_percent: status.memoryPercent,
  };
}

export function serializeBestWorker(best: BestWorkerSelection) {
  return {
    name: best.name,
    info: serializeWorkerInfo(best.info),
    status: serializeWorkerStatus(best.status),
    reason: best.reason,
  };
}

export function serializePing(summary: PingSummary) {
  return {
    results: summary.results,
    online: summary.online,
    offline: summary.offline,
    total: summary.total,
  };
}

export function serializePoolStatus(pool: PoolStatus) {
  return {
    total_workers: pool.totalWorkers,
    online_workers: pool.onlineWorkers,
    offline_workers: pool.offlineWorkers,
    recommended_worker: pool.recommendedWorker,
    workers: pool.workers.map((load) => ({
      name: load.name,
      online: load.online,
      cpu_percent: load.cpuPercent,
      memory_percent: load.memoryPercent,
      gpus: load.gpus,
    })),
  };
}

export function serializePoolHealth(health: PoolHealth) {
  return {
    health_status: health.healthStatus,
    health_score: health.healthScore,
    online_workers: health.onlineWorkers,
    total_workers: health.totalWorkers,
    availability_percentage: health.availabilityPercentage,
    online_worker_names: health.onlineWorkerNames,
  };
}

export function serializeRequestLog(entry: RequestLogEntry) {
  return {
    endpoint: entry.endpoint,
    method: entry.method,
    worker: entry.worker ?? null,
    duration_ms: entry.durationMs,
    success: entry.success,
    status_code: entry.statusCode ?? null,
    timestamp: entry.timestamp.toISOString(),
  };
}

export function serializeRequestStats(stats: RequestStats) {
  return {
    total: stats.total,
    success: stats.success,
    failed: stats.failed,
    success_rate: stats.successRate,
    by_endpoint: stats.byEndpoint,
    by_worker: stats.byWorker,
    by_method: stats.byMethod,
    active_workers: stats.activeWorkers,
    top_endpoints: stats.topEndpoints,
  };
}
