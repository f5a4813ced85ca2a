import { Config } from './config.js';
import { IWorkerDirectory } from './core/interfaces/IWorkerDirectory.js';
import { IWorkerAgentClient } from './core/interfaces/IWorkerAgentClient.js';
import { ISystemMonitor } from './core/interfaces/ISystemMonitor.js';
import { IRequestLogRepository } from './core/interfaces/IRequestLogRepository.js';
import { AnalyzerFactory } from './infrastructure/analysis/AnalyzerFactory.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { RequestLogRepository } from './infrastructure/database/repositories/RequestLogRepository.js';
import { WorkerAgentClient } from './infrastructure/http/WorkerAgentClient.js';
import { JobManager } from './infrastructure/queue/JobManager.js';
import { SystemMonitor } from './infrastructure/system/SystemMonitor.js';
import { FileWorkerDirectory } from './infrastructure/workers/FileWorkerDirectory.js';
import { WorkerService } from './application/services/WorkerService.js';
import { DispatchService } from './application/services/DispatchService.js';
import { JobService } from './application/services/JobService.js';
import { StatsService } from './application/services/StatsService.js';

export interface AppContextOverrides {
  directory?: IWorkerDirectory;
  agentClient?: IWorkerAgentClient;
  systemMonitor?: ISystemMonitor;
  requestLog?: IRequestLogRepository;
  analyzers?: AnalyzerFactory;
}

/**
 * Every long-lived component, built once at startup and passed explicitly
 */
export interface AppContext {
  config: Config;
  analyzers: AnalyzerFactory;
  directory: IWorkerDirectory;
  agentClient: IWorkerAgentClient;
  workerService: WorkerService;
  dispatchService: DispatchService;
  jobManager: JobManager;
  jobService: JobService;
  statsService: StatsService;
  /**
   * Stop the monitor, cancel live jobs and close the request log store
   */
  shutdown(): void;
}

export function createAppContext(config: Config, overrides: AppContextOverrides = {}): AppContext {
  const debug = config.server.debug;

  const analyzers = overrides.analyzers ?? new AnalyzerFactory();
  const directory =
    overrides.directory ?? new FileWorkerDirectory(config.workers.directoryPath, config.workers.agentPort, debug);
  const agentClient =
    overrides.agentClient ??
    new WorkerAgentClient({
      pingTimeoutMs: config.workers.pingTimeoutMs,
      statusTimeoutMs: config.workers.statusTimeoutMs,
      execCeilingMs: config.workers.execCeilingMs,
      retry: {
        maxAttempts: config.retry.attempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        multiplier: 2,
        timeoutMs: config.workers.statusTimeoutMs,
      },
      debug,
    });

  let database: DatabaseConnection | null = null;
  let requestLog = overrides.requestLog;
  if (!requestLog) {
    database = new DatabaseConnection(config.requestLog.databasePath);
    requestLog = new RequestLogRepository(database.getDatabase(), config.requestLog.maxEntries);
  }

  const jobManager = new JobManager(overrides.systemMonitor ?? new SystemMonitor(), {
    maxConcurrentJobs: config.jobs.maxConcurrentJobs,
    monitorIntervalMs: config.jobs.monitorIntervalMs,
    debug,
  });

  const workerService = new WorkerService(directory, agentClient, debug);
  const dispatchService = new DispatchService(directory, agentClient, workerService, debug);
  const jobService = new JobService(
    jobManager,
    analyzers,
    dispatchService,
    workerService,
    config.jobs.defaultTimeoutSec
  );
  const statsService = new StatsService(jobManager, requestLog);

  let closed = false;

  return {
    config,
    analyzers,
    directory,
    agentClient,
    workerService,
    dispatchService,
    jobManager,
    jobService,
    statsService,
    shutdown() {
      if (closed) return;
      closed = true;
      jobManager.shutdown();
      database?.close();
    },
  };
}
