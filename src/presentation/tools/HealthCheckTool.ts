import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StatsService } from '../../application/services/StatsService.js';
import { WorkerService } from '../../application/services/WorkerService.js';
import { serializeJobStats, serializePoolHealth, serializeRequestStats } from '../serializers.js';
import { errorResult, jsonResult } from './toolResult.js';

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, workerService: WorkerService, statsService: StatsService) {
  server.tool(
    'health-check',
    'Check the service and its worker pool (availability, job load, request log statistics)',
    {},
    async () => {
      try {
        const pool = await workerService.getPoolHealth();
        const overview = statsService.getOverview();
        const status = pool.healthScore >= 80 ? 'healthy' : pool.healthScore > 0 ? 'degraded' : 'unavailable';

        return jsonResult('System Health Check', {
          timestamp: new Date().toISOString(),
          status,
          uptime_ms: overview.uptimeMs,
          workers: serializePoolHealth(pool),
          jobs: serializeJobStats(overview.jobs),
          requests: serializeRequestStats(overview.requests),
        });
      } catch (error) {
        return errorResult('Health check error', error);
      }
    }
  );
}
