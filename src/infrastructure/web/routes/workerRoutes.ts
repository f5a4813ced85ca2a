import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { AppContext } from '../../../context.js';
import { ExecServiceError, WorkerNotFound } from '../../../core/errors.js';
import {
  serializeDispatch,
  serializePing,
  serializePoolHealth,
  serializePoolStatus,
  serializeWorkerInfo,
  serializeWorkerStatus,
  serializeWorkerSummary,
} from '../../../presentation/serializers.js';
import { asyncHandler, markWorker, parseWith } from '../http.js';

const WorkerExecBody = z.object({
  command: z.string().min(1, 'command must not be empty'),
  timeout: z.number().positive().max(3600).optional(),
});

/**
 * Worker registry admin routes under /workers
 */
export function createWorkerRouter(context: AppContext): Router {
  const router = Router();
  const { workerService, dispatchService, config } = context;

  router.get(
    '/workers',
    asyncHandler(async (_req: Request, res: Response) => {
      const workers = await workerService.listWorkers();
      res.json({
        workers: workers.map(serializeWorkerSummary),
        total: workers.length,
        online: workers.filter((worker) => worker.online).length,
      });
    })
  );

  router.get(
    '/workers/ping',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(serializePing(await workerService.pingAll()));
    })
  );

  router.get(
    '/workers/pool/status',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(serializePoolStatus(await workerService.getPoolStatus()));
    })
  );

  router.get(
    '/workers/pool/health',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(serializePoolHealth(await workerService.getPoolHealth()));
    })
  );

  router.get(
    '/workers/:name',
    asyncHandler(async (req: Request, res: Response) => {
      const worker = workerService.getWorker(req.params.name);
      if (!worker) {
        throw new WorkerNotFound(req.params.name);
      }
      markWorker(res, worker.name);
      const ping = await workerService.pingWorker(worker.name);
      res.json({ ...serializeWorkerInfo(worker), online: ping.online });
    })
  );

  router.get(
    '/workers/:name/status',
    asyncHandler(async (req: Request, res: Response) => {
      const worker = workerService.getWorker(req.params.name);
      if (!worker) {
        throw new WorkerNotFound(req.params.name);
      }
      markWorker(res, worker.name);
      const status = await workerService.getWorkerStatus(worker.name);
      if (!status) {
        throw new ExecServiceError(`Worker '${worker.name}' did not report its status`, 'WorkerOffline', 503);
      }
      res.json({ name: worker.name, ip: worker.ip, ...serializeWorkerStatus(status) });
    })
  );

  router.post(
    '/workers/:name/exec',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseWith(WorkerExecBody, req.body);
      markWorker(res, req.params.name);
      const timeoutSec = body.timeout ?? config.jobs.defaultTimeoutSec;
      const result = await dispatchService.dispatch(req.params.name, body.command, timeoutSec * 1000);
      if (result.kind === 'worker_not_found') {
        throw new WorkerNotFound(req.params.name);
      }
      res.json(serializeDispatch(result));
    })
  );

  return router;
}
