import type { ProgressExtractor } from './ProgressExtractor.js';

export const DEFAULT_PROGRESS_INTERVAL_MS = 50;

/**
 * Samples whichever extractor is attached to the running job at a fixed
 * interval and forwards the value. Never creates or owns extractors.
 */
export class ProgressMonitor {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly activeExtractor: () => ProgressExtractor | null,
    private readonly onSample: (fraction: number) => void,
    private readonly intervalMs: number = DEFAULT_PROGRESS_INTERVAL_MS
  ) {}

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * One sampling pass; a no-op while no job is running
   */
  tick(): void {
    const extractor = this.activeExtractor();
    if (!extractor) return;

    try {
      this.onSample(extractor.sample());
    } catch (error) {
      console.error('[ProgressMonitor] Error sampling progress:', error);
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
