import type { Job } from '../entities/Job.js';

/**
 * UI-facing callbacks. Implementations must be cheap and must not block.
 */
export interface IPipelineObserver {
  onProgress(fraction: number): void;
  onStatus(text: string): void;
  onError(message: string): void;
  onJobUpdate?(job: Job): void;
}
