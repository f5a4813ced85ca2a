import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { AppContext } from '../../../context.js';
import { serializeRequestLog, serializeRequestStats } from '../../../presentation/serializers.js';
import { parseWith } from '../http.js';

const LogsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(10000).optional(),
});

const LogEntryBody = z.object({
  endpoint: z.string().min(1),
  method: z.string().min(1).default('GET'),
  worker: z.string().min(1).nullish(),
  duration_ms: z.number().nonnegative().default(0),
  success: z.boolean().default(true),
  status_code: z.number().int().optional(),
});

/**
 * Request log admin routes under /middleware, plus the service health check
 */
export function createAdminRouter(context: AppContext): Router {
  const router = Router();
  const { statsService, directory, config } = context;

  router.get('/health', (_req: Request, res: Response) => {
    const overview = statsService.getOverview();
    res.json({
      status: 'ok',
      service: config.server.name,
      version: config.server.version,
      uptime_ms: overview.uptimeMs,
      registered_workers: directory.getWorkers().length,
      running_jobs: overview.jobs.running,
      total_jobs: overview.jobs.total,
    });
  });

  router.get('/middleware/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', middleware: 'active', timestamp: new Date().toISOString() });
  });

  router.get('/middleware/stats', (_req: Request, res: Response) => {
    res.json(serializeRequestStats(statsService.getRequestStats()));
  });

  router.get('/middleware/logs', (req: Request, res: Response) => {
    const query = parseWith(LogsQuery, req.query);
    const logs = statsService.getRecentRequests(query.limit ?? 200);
    res.json({ logs: logs.map(serializeRequestLog) });
  });

  router.post('/middleware/log', (req: Request, res: Response) => {
    const body = parseWith(LogEntryBody, req.body);
    statsService.recordRequest({
      endpoint: body.endpoint,
      method: body.method,
      worker: body.worker ?? null,
      durationMs: body.duration_ms,
      success: body.success,
      statusCode: body.status_code,
      timestamp: new Date(),
    });
    res.json({ success: true });
  });

  router.delete('/middleware/logs', (_req: Request, res: Response) => {
    statsService.clearRequests();
    res.json({ success: true, message: 'Logs cleared' });
  });

  return router;
}
