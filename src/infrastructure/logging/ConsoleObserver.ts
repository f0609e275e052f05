import type { Job } from '../../core/entities/Job.js';
import type { IPipelineObserver } from '../../core/interfaces/IPipelineObserver.js';

/**
 * Writes pipeline events to stderr (stdout belongs to the MCP stdio transport)
 */
export class ConsoleObserver implements IPipelineObserver {
  private lastPercent = -1;

  constructor(private debug: boolean = false) {}

  onProgress(fraction: number): void {
    if (!this.debug) return;

    const percent = Math.round(fraction * 100);
    if (percent === this.lastPercent) return;
    this.lastPercent = percent;
    console.error(`[DEBUG] Progress: ${percent}%`);
  }

  onStatus(text: string): void {
    console.error(`[Status] ${text}`);
  }

  onError(message: string): void {
    console.error(`[Error] ✗ ${message}`);
  }

  onJobUpdate(job: Job): void {
    if (job.status !== 'pending') {
      this.lastPercent = -1;
    }
    if (this.debug) {
      console.error(`[DEBUG] Job ${job.id} (${job.fileName}) → ${job.status}`);
    }
  }
}
