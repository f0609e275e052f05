import type { Job } from '../../core/entities/Job.js';
import type { IPipelineObserver } from '../../core/interfaces/IPipelineObserver.js';

/**
 * Fans pipeline events out to every subscriber. A throwing subscriber is
 * logged and skipped; it never reaches the job that emitted the event.
 */
export class ObserverHub implements IPipelineObserver {
  private observers: Set<IPipelineObserver> = new Set();

  subscribe(observer: IPipelineObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  size(): number {
    return this.observers.size;
  }

  onProgress(fraction: number): void {
    this.dispatch('progress', (observer) => observer.onProgress(fraction));
  }

  onStatus(text: string): void {
    this.dispatch('status', (observer) => observer.onStatus(text));
  }

  onError(message: string): void {
    this.dispatch('error', (observer) => observer.onError(message));
  }

  onJobUpdate(job: Job): void {
    this.dispatch('job update', (observer) => observer.onJobUpdate?.(job));
  }

  private dispatch(event: string, deliver: (observer: IPipelineObserver) => void): void {
    for (const observer of Array.from(this.observers)) {
      try {
        deliver(observer);
      } catch (error) {
        console.error(`[ObserverHub] Observer failed while handling ${event}:`, error);
      }
    }
  }
}
