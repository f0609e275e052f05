import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Job } from '../../core/entities/Job.js';
import { TranscriptionService } from '../../application/services/TranscriptionService.js';

export function formatJob(job: Job) {
  return {
    id: job.id,
    path: job.path,
    status: job.status,
    progress: `${Math.round(job.progress * 100)}%`,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
    transcriptPath: job.transcriptPath,
    error: job.error,
  };
}

/**
 * Register queue-status, list-jobs and get-job
 */
export function registerQueueStatusTools(server: McpServer, service: TranscriptionService) {
  // queue-status tool
  server.tool(
    'queue-status',
    'Show model readiness, the job being transcribed and the pending queue',
    {},
    async () => {
      const snapshot = service.getSnapshot();
      const stats = snapshot.statistics;
      const current = snapshot.current
        ? `${snapshot.current.fileName} (${Math.round(snapshot.progress * 100)}%)`
        : 'idle';

      const text = `# Transcription Queue

- State: ${snapshot.state}${snapshot.initializationError ? ` (${snapshot.initializationError})` : ''}
- Model Ready: ${snapshot.ready ? 'yes' : 'no'}
- Current: ${current}
- Pending: ${snapshot.pending.map((job) => job.fileName).join(', ') || 'none'}

## Statistics
- Total Jobs: ${stats.total}
- Pending: ${stats.pending}
- Running: ${stats.running}
- Done: ${stats.done}
- Failed: ${stats.failed}`;

      return {
        content: [
          {
            type: 'text',
            text,
          },
        ],
      };
    }
  );

  // list-jobs tool
  server.tool(
    'list-jobs',
    'List transcription jobs with their status and progress',
    {
      status: z
        .enum(['pending', 'running', 'done', 'failed'])
        .optional()
        .describe('Filter jobs by status (optional)'),
    },
    async ({ status }) => {
      const jobs = status ? service.getJobsByStatus(status) : service.getAllJobs();
      const formattedJobs = jobs.map(formatJob);

      return {
        content: [
          {
            type: 'text',
            text: `# Jobs\n\n${formattedJobs.length === 0 ? 'No jobs found' : `\`\`\`json\n${JSON.stringify(formattedJobs, null, 2)}\n\`\`\``}`,
          },
        ],
      };
    }
  );

  // get-job tool
  server.tool(
    'get-job',
    'Get the status, progress and transcript path of a job',
    {
      job_id: z.string().describe('The job ID returned by transcribe-audio'),
    },
    async ({ job_id }) => {
      const job = service.getJob(job_id);
      if (!job) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Job ${job_id} not found`,
            },
          ],
        };
      }

      return {
        content: [
          {
            type: 'text',
            text: `# Job ${job.id}\n\n\`\`\`json\n${JSON.stringify(formatJob(job), null, 2)}\n\`\`\``,
          },
        ],
      };
    }
  );
}
