import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EnqueueReport } from '../../core/entities/Job.js';
import { TranscriptionService } from '../../application/services/TranscriptionService.js';

export function formatEnqueueReports(reports: EnqueueReport[]): string {
  const lines = reports.map((report) => {
    switch (report.status) {
      case 'queued':
        return `- ✓ Queued ${report.job.path} (job ${report.job.id})`;
      case 'duplicate':
        return `- Already queued: ${report.path}`;
      case 'rejected':
        return `- ✗ Rejected ${report.input}: ${report.error}`;
    }
  });

  const queued = reports.filter((report) => report.status === 'queued').length;
  return `# Transcription Request\n\n${queued} of ${reports.length} files queued\n\n${lines.join('\n')}`;
}

/**
 * Register the transcribe-audio tool
 */
export function registerTranscribeAudioTool(server: McpServer, service: TranscriptionService) {
  server.tool(
    'transcribe-audio',
    'Queue .wav or .mp3 files for transcription. Transcripts are written next to each file as <name>_transcript.txt',
    {
      paths: z
        .array(z.string().min(1))
        .min(1)
        .describe('Audio file paths or file:// URIs'),
    },
    async ({ paths }) => {
      try {
        const reports = service.enqueue(paths);
        const allRejected = reports.every((report) => report.status === 'rejected');

        return {
          isError: allRejected,
          content: [
            {
              type: 'text',
              text: formatEnqueueReports(reports),
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error queueing files: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
