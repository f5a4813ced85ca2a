import * as dotenv from 'dotenv';
import { z } from 'zod';

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
    corsOrigin: z.string().min(1),
  }),
  jobs: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(100),
    monitorIntervalMs: z.number().int().min(50).max(60000),
    defaultTimeoutSec: z.number().positive().max(3600),
    retentionHours: z.number().positive(),
  }),
  workers: z.object({
    directoryPath: z.string().min(1, 'Worker directory path must not be empty'),
    agentPort: z.number().int().min(1).max(65535),
    pingTimeoutMs: z.number().int().min(100).max(60000),
    statusTimeoutMs: z.number().int().min(100).max(60000),
    execCeilingMs: z.number().int().min(1000),
  }),
  retry: z.object({
    attempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0).max(10000),
    maxDelayMs: z.number().int().min(0).max(60000),
  }),
  requestLog: z.object({
    databasePath: z.string().min(1),
    maxEntries: z.number().int().min(1).max(100000),
  }),
  mcp: z.object({
    transport: z.enum(['stdio', 'none']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type CliArgs = Record<string, string | boolean>;
type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 8000 --workers-file ./workers.json --debug
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration. Priority: CLI args > env > defaults.
 * Throws a ZodError when a value is out of range.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return cli;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cli = cliArgs[cliKey];
    if (cli !== undefined) return cli === true || cli === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN is left for the schema to reject
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return Number(cli);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'exec-gateway'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      enabled: getBoolean('http', 'HTTP_ENABLED', true),
      port: getNumber('port', 'PORT', 8000),
      corsOrigin: getString('cors-origin', 'CORS_ORIGIN', '*'),
    },
    jobs: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 5),
      monitorIntervalMs: getNumber('monitor-interval', 'MONITOR_INTERVAL_MS', 1000),
      defaultTimeoutSec: getNumber('default-timeout', 'DEFAULT_TIMEOUT_SEC', 30),
      retentionHours: getNumber('retention-hours', 'JOB_RETENTION_HOURS', 24),
    },
    workers: {
      directoryPath: getString('workers-file', 'WORKERS_FILE', 'workers.json'),
      agentPort: getNumber('agent-port', 'AGENT_PORT', 7576),
      pingTimeoutMs: getNumber('ping-timeout', 'PING_TIMEOUT_MS', 2000),
      statusTimeoutMs: getNumber('status-timeout', 'STATUS_TIMEOUT_MS', 3000),
      execCeilingMs: getNumber('exec-ceiling', 'EXEC_CEILING_MS', 300000),
    },
    retry: {
      attempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 2),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 200),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 1000),
    },
    requestLog: {
      databasePath: getString('request-log-db', 'REQUEST_LOG_DB', 'data/request-log.db'),
      maxEntries: getNumber('request-log-max', 'REQUEST_LOG_MAX_ENTRIES', 1000),
    },
    mcp: {
      transport: getString('mcp-transport', 'MCP_TRANSPORT', 'stdio'),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Load .env, then the configuration. Exits the process on invalid values.
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n✖ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\nTips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Numeric flags must be numbers (e.g., --port 8000)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print the effective configuration to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║              Exec Gateway - Configuration                        ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\nServer: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`Workers: ${config.workers.directoryPath} (agent port ${config.workers.agentPort})`);
  console.error(
    `Probes: ping ${config.workers.pingTimeoutMs}ms | status ${config.workers.statusTimeoutMs}ms | retry ${config.retry.attempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`
  );
  console.error(
    `Jobs: ${config.jobs.maxConcurrentJobs} concurrent | default timeout ${config.jobs.defaultTimeoutSec}s | kept ${config.jobs.retentionHours}h`
  );
  console.error(`Request log: ${config.requestLog.databasePath} (max ${config.requestLog.maxEntries} entries)`);

  if (config.http.enabled) {
    console.error(`\nHTTP API: http://localhost:${config.http.port}/api`);
  }
  console.error(`MCP: ${config.mcp.transport === 'stdio' ? 'STDIO' : 'disabled'}`);

  console.error('\n' + '─'.repeat(68));
}
