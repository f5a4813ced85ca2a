import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { AnalysisRejected, ExecServiceError, ValidationError } from '../../core/errors.js';
import { serializeVerdict } from '../../presentation/serializers.js';
import { StatsService } from '../../application/services/StatsService.js';

/**
 * Express 4 does not forward promise rejections to the error handler
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Validate a request body or query against a zod schema
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`);
    throw new ValidationError('Invalid request', details);
  }
  return result.data;
}

/**
 * Remember which worker a request touched, for the request log
 */
export function markWorker(res: Response, worker: string | null | undefined): void {
  if (worker) {
    res.locals.worker = worker;
  }
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof AnalysisRejected) {
    res.status(error.statusCode).json({
      success: false,
      error: error.code,
      message: error.message,
      analysis: serializeVerdict(error.analysis),
    });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(error.statusCode).json({
      success: false,
      error: error.code,
      message: error.message,
      details: error.details,
    });
    return;
  }

  if (error instanceof ExecServiceError) {
    res.status(error.statusCode).json({ success: false, error: error.code, message: error.message });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, error: 'ValidationError', message: 'Malformed JSON body' });
    return;
  }

  console.error('[WebServer] Unhandled error:', error);
  res.status(500).json({
    success: false,
    error: 'InternalError',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, error: 'NotFound', message: `No route for ${req.method} ${req.path}` });
}

const UNLOGGED_PATHS = /^\/(?:api\/)?(?:middleware(?:\/|$)|health$)/;

/**
 * Records every API request in the admin request log once the response is sent
 */
export function requestLogger(stats: StatsService): RequestHandler {
  return (req, res, next) => {
    const startTime = Date.now();
    const endpoint = req.path;

    if (UNLOGGED_PATHS.test(endpoint)) {
      next();
      return;
    }

    res.on('finish', () => {
      const worker: unknown = res.locals.worker;
      stats.recordRequest({
        endpoint,
        method: req.method,
        worker: typeof worker === 'string' ? worker : null,
        durationMs: Date.now() - startTime,
        success: res.statusCode < 400,
        statusCode: res.statusCode,
        timestamp: new Date(),
      });
    });

    next();
  };
}
