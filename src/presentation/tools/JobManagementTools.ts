import { z } from 'zod';
import { JOB_STATUSES } from '../../core/entities/Job.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { serializeJobDetail, serializeJobStats, serializeJobSummary } from '../serializers.js';
import { errorResult, jsonResult } from './toolResult.js';

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  server.tool(
    'list-jobs',
    'List execution jobs with their status and progress',
    {
      status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
      user_id: z.string().optional().describe('Only jobs submitted by this user (optional)'),
    },
    async ({ status, user_id }) => {
      try {
        const jobs = jobService.listJobs(user_id).filter((job) => !status || job.status === status);
        return jsonResult(`Jobs (${jobs.length})`, {
          stats: serializeJobStats(jobService.getStatistics()),
          jobs: jobs.map(serializeJobSummary),
        });
      } catch (error) {
        return errorResult('Error listing jobs', error);
      }
    }
  );

  server.tool(
    'get-job',
    'Get full details of a job, including its result, analysis and metrics',
    {
      job_id: z.string().min(1).describe('The job ID returned by safe-execute'),
    },
    async ({ job_id }) => {
      try {
        const job = jobService.getJob(job_id);
        return jsonResult(`Job ${job.id}: ${job.status}`, serializeJobDetail(job, jobService.detectSuspiciousPatterns(job)));
      } catch (error) {
        return errorResult('Error getting job', error);
      }
    }
  );

  server.tool(
    'cancel-job',
    'Cancel a pending or running job',
    {
      job_id: z.string().min(1).describe('The job ID to cancel'),
    },
    async ({ job_id }) => {
      try {
        const job = jobService.cancelJob(job_id);
        return jsonResult('Job cancelled', { job_id: job.id, status: job.status });
      } catch (error) {
        return errorResult('Error cancelling job', error);
      }
    }
  );
}
