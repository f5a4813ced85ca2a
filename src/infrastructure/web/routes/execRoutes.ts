import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { JOB_PRIORITIES } from '../../../core/entities/Job.js';
import { AppContext } from '../../../context.js';
import { NoEligibleWorker, ValidationError } from '../../../core/errors.js';
import {
  serializeBatch,
  serializeBestWorker,
  serializeDispatch,
  serializeJobDetail,
  serializeJobStats,
  serializeJobSummary,
  serializeVerdict,
} from '../../../presentation/serializers.js';
import { asyncHandler, markWorker, parseWith } from '../http.js';

const MAX_TIMEOUT_SEC = 3600;

const timeoutField = z.number().positive().max(MAX_TIMEOUT_SEC).optional();

const AnalyzeBody = z.object({
  code: z.string().min(1, 'code must not be empty'),
  language: z.string().min(1).optional(),
});

const SafeExecuteBody = z.object({
  code: z.string().min(1, 'code must not be empty'),
  worker: z.string().min(1).nullish(),
  timeout: timeoutField,
  priority: z.enum(JOB_PRIORITIES).optional(),
  allow_risky: z.boolean().optional(),
  user_id: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
});

const JobsQuery = z.object({
  user_id: z.string().min(1).optional(),
});

const ControlBody = z.object({
  action: z.enum(['cancel']),
});

const CleanupQuery = z.object({
  max_age_hours: z.coerce.number().nonnegative().optional(),
});

const ExecBody = z.object({
  worker: z.string().min(1).nullish(),
  command: z.string().min(1, 'command must not be empty'),
  timeout: timeoutField,
});

const AutoExecBody = z.object({
  command: z.string().min(1, 'command must not be empty'),
  timeout: timeoutField,
});

const BatchBody = z.object({
  workers: z.union([z.literal('all'), z.array(z.string().min(1)).min(1, 'No workers specified')]),
  command: z.string().min(1, 'command must not be empty'),
  timeout: timeoutField,
});

/**
 * Submission, job control and dispatch routes under /exec
 */
export function createExecRouter(context: AppContext): Router {
  const router = Router();
  const { jobService, dispatchService, workerService, directory, config } = context;
  const defaultTimeoutMs = () => config.jobs.defaultTimeoutSec * 1000;

  router.post('/exec/analyze', (req: Request, res: Response) => {
    const body = parseWith(AnalyzeBody, req.body);
    const verdict = jobService.analyze(body.code, body.language);
    res.json({ success: true, analysis: serializeVerdict(verdict) });
  });

  router.post('/exec/safe-execute', (req: Request, res: Response) => {
    const body = parseWith(SafeExecuteBody, req.body);
    const { job, analysis } = jobService.safeExecute({
      code: body.code,
      worker: body.worker ?? undefined,
      timeoutSec: body.timeout,
      priority: body.priority,
      allowRisky: body.allow_risky ?? false,
      userId: body.user_id,
      language: body.language,
    });

    markWorker(res, job.worker);
    res.status(202).json({
      success: true,
      job_id: job.id,
      status: job.status,
      analysis: serializeVerdict(analysis),
    });
  });

  router.get('/exec/jobs', (req: Request, res: Response) => {
    const query = parseWith(JobsQuery, req.query);
    const jobs = jobService.listJobs(query.user_id);
    res.json({ success: true, jobs: jobs.map(serializeJobSummary), count: jobs.length });
  });

  router.get('/exec/jobs/stats', (_req: Request, res: Response) => {
    res.json({ success: true, stats: serializeJobStats(jobService.getStatistics()) });
  });

  router.delete('/exec/jobs/cleanup', (req: Request, res: Response) => {
    const query = parseWith(CleanupQuery, req.query);
    const removed = jobService.cleanup(query.max_age_hours ?? config.jobs.retentionHours);
    res.json({ success: true, removed });
  });

  router.get('/exec/jobs/:id', (req: Request, res: Response) => {
    const job = jobService.getJob(req.params.id);
    markWorker(res, job.worker);
    res.json({ success: true, job: serializeJobDetail(job, jobService.detectSuspiciousPatterns(job)) });
  });

  router.post('/exec/jobs/:id/control', (req: Request, res: Response) => {
    const body = parseWith(ControlBody, req.body);
    const job = jobService.cancelJob(req.params.id);
    res.json({ success: true, action: body.action, job_id: job.id, status: job.status });
  });

  router.get(
    '/exec/workers/best',
    asyncHandler(async (_req: Request, res: Response) => {
      const best = await workerService.selectBestDetailed();
      if (!best) {
        throw new NoEligibleWorker();
      }
      markWorker(res, best.name);
      res.json(serializeBestWorker(best));
    })
  );

  router.get(
    '/exec/workers/online',
    asyncHandler(async (_req: Request, res: Response) => {
      const workers = await workerService.getOnlineWorkers();
      res.json({ workers, count: workers.length });
    })
  );

  router.post(
    '/exec/batch',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseWith(BatchBody, req.body);
      const all = body.workers === 'all' || (body.workers.length === 1 && body.workers[0] === 'all');
      const targets = all ? 'all' : body.workers;
      if (all && directory.getWorkers().length === 0) {
        throw new ValidationError('No workers specified');
      }

      const batch = await dispatchService.batchDispatch(
        targets,
        body.command,
        body.timeout !== undefined ? body.timeout * 1000 : defaultTimeoutMs()
      );
      res.json(serializeBatch(batch));
    })
  );

  router.post(
    '/exec/auto',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseWith(AutoExecBody, req.body);
      const result = await dispatchService.dispatchToBest(
        body.command,
        body.timeout !== undefined ? body.timeout * 1000 : defaultTimeoutMs()
      );
      markWorker(res, result.worker);
      res.json(serializeDispatch(result));
    })
  );

  router.post(
    '/exec',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseWith(ExecBody, req.body);
      const timeoutMs = body.timeout !== undefined ? body.timeout * 1000 : defaultTimeoutMs();
      const result = body.worker
        ? await dispatchService.dispatch(body.worker, body.command, timeoutMs)
        : await dispatchService.dispatchToBest(body.command, timeoutMs);
      markWorker(res, result.worker);
      res.json(serializeDispatch(result));
    })
  );

  return router;
}
