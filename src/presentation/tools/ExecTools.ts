import { z } from 'zod';
import { JOB_PRIORITIES } from '../../core/entities/Job.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { WorkerService } from '../../application/services/WorkerService.js';
import { DispatchService } from '../../application/services/DispatchService.js';
import { serializeBatch, serializeBestWorker, serializeVerdict } from '../serializers.js';
import { errorResult, jsonResult, textResult } from './toolResult.js';

/**
 * Register analysis, submission and dispatch tools
 */
export function registerExecTools(
  server: McpServer,
  jobService: JobService,
  workerService: WorkerService,
  dispatchService: DispatchService,
  defaultTimeoutSec: number
) {
  server.tool(
    'analyze-code',
    'Statically analyze code for infinite loops, unbounded recursion and heavy resource use without running it',
    {
      code: z.string().min(1).describe('Source code to analyze'),
      language: z.string().optional().describe('Analyzer language (default: python)'),
    },
    async ({ code, language }) => {
      try {
        const verdict = jobService.analyze(code, language);
        const title = verdict.shouldExecute ? 'Analysis: safe to execute' : 'Analysis: execution blocked';
        return jsonResult(title, serializeVerdict(verdict));
      } catch (error) {
        return errorResult('Error analyzing code', error);
      }
    }
  );

  server.tool(
    'safe-execute',
    'Analyze code and, when admitted, run it as a supervised job on a worker. Returns the job id to poll with get-job.',
    {
      code: z.string().min(1).describe('Source code or shell command to run'),
      worker: z.string().optional().describe('Target worker (default: least loaded online worker)'),
      timeout: z.number().positive().max(3600).optional().describe(`Timeout in seconds (default: ${defaultTimeoutSec})`),
      priority: z.enum(JOB_PRIORITIES).optional(),
      allow_risky: z.boolean().optional().describe('Run even when the analysis finds high-severity issues'),
      user_id: z.string().optional(),
      language: z.string().optional().describe('Analyzer language (default: python)'),
    },
    async ({ code, worker, timeout, priority, allow_risky, user_id, language }) => {
      try {
        const { job, analysis } = jobService.safeExecute({
          code,
          worker,
          timeoutSec: timeout,
          priority,
          allowRisky: allow_risky ?? false,
          userId: user_id,
          language,
        });
        return jsonResult('Job submitted', {
          job_id: job.id,
          status: job.status,
          analysis: serializeVerdict(analysis),
        });
      } catch (error) {
        return errorResult('Submission rejected', error);
      }
    }
  );

  server.tool('best-worker', 'Pick the least loaded online worker', {}, async () => {
    try {
      const best = await workerService.selectBestDetailed();
      if (!best) {
        return textResult('No workers available');
      }
      return jsonResult(`Best worker: ${best.name}`, serializeBestWorker(best));
    } catch (error) {
      return errorResult('Error selecting worker', error);
    }
  });

  server.tool(
    'batch-exec',
    'Run one shell command on several workers at once and report every result',
    {
      workers: z.array(z.string().min(1)).min(1).describe('Worker names, or ["all"] for every registered worker'),
      command: z.string().min(1),
      timeout: z.number().positive().max(3600).optional().describe(`Timeout in seconds (default: ${defaultTimeoutSec})`),
    },
    async ({ workers, command, timeout }) => {
      try {
        const targets = workers.length === 1 && workers[0] === 'all' ? 'all' : workers;
        const batch = await dispatchService.batchDispatch(targets, command, (timeout ?? defaultTimeoutSec) * 1000);
        return jsonResult(`Batch: ${batch.successCount}/${batch.total} succeeded`, serializeBatch(batch));
      } catch (error) {
        return errorResult('Error running batch', error);
      }
    }
  );
}
