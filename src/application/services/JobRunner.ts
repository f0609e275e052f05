import type { Job, JobErrorKind, JobOutcome } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';
import type { IPipelineObserver } from '../../core/interfaces/IPipelineObserver.js';
import type { IResultSink } from '../../core/interfaces/IResultSink.js';
import type { ITranscriptionEngine } from '../../core/interfaces/ITranscriptionEngine.js';
import { ProgressExtractor } from '../../infrastructure/progress/ProgressExtractor.js';
import type { JobQueue } from '../../infrastructure/queue/JobQueue.js';
import type { ReadinessGate } from '../../infrastructure/queue/ReadinessGate.js';
import { sleep } from '../../utils/retry.js';

export type RunnerState = 'idle' | 'waiting-for-readiness' | 'running' | 'finishing';

export interface JobRunnerOptions {
  readinessTimeoutMs: number;
  readinessRetryDelayMs: number;
}

export const DEFAULT_RUNNER_OPTIONS: JobRunnerOptions = {
  readinessTimeoutMs: 100,
  readinessRetryDelayMs: 100,
};

/**
 * The single worker that drains the queue.
 *
 * There is at most one drain loop at a time: `trigger()` while a loop is
 * active does nothing, so jobs can only reach `running` through that loop.
 * The engine's output channel is shared, and this is what keeps a second job
 * from writing into the running job's progress capture.
 */
export class JobRunner {
  private state: RunnerState = 'idle';
  private activeExtractor: ProgressExtractor | null = null;
  private draining: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private queue: JobQueue,
    private gate: ReadinessGate,
    private engine: ITranscriptionEngine,
    private sink: IResultSink,
    private observer: IPipelineObserver,
    private options: JobRunnerOptions = DEFAULT_RUNNER_OPTIONS,
    private debugLog: (message: string) => void = () => undefined
  ) {}

  /**
   * Start draining if there is work and no loop is already running
   */
  trigger(): void {
    if (this.stopped || this.draining || !this.queue.hasPending()) return;

    this.draining = this.drain()
      .catch((error) => {
        console.error('[JobRunner] ✗ Drain loop failed:', error);
        this.notify(() => this.observer.onError(`Job runner failed: ${errorMessage(error)}`));
      })
      .finally(() => {
        this.draining = null;
        this.state = 'idle';

        // Work enqueued between the last queue check and now
        if (!this.gate.isClosed()) {
          this.trigger();
        }
      });
  }

  /**
   * Resolves once no drain loop is active
   */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Prevent further jobs from starting; an in-flight job still runs to completion
   */
  stop(): void {
    this.stopped = true;
  }

  getState(): RunnerState {
    return this.state;
  }

  getActiveExtractor(): ProgressExtractor | null {
    return this.activeExtractor;
  }

  private async drain(): Promise<void> {
    while (!this.stopped && this.queue.hasPending()) {
      this.state = 'waiting-for-readiness';

      const ready = await this.awaitReadiness();
      if (!ready) {
        this.debugLog('[JobRunner] Gave up waiting for the model');
        return;
      }

      const job = this.queue.dequeueNext();
      if (!job) return;

      await this.runJob(job);
    }
  }

  /**
   * Bounded waits on the gate with a pause between them; false once the gate is closed
   */
  private async awaitReadiness(): Promise<boolean> {
    let announced = false;

    while (!this.stopped) {
      if (await this.gate.wait(this.options.readinessTimeoutMs)) {
        return true;
      }
      if (this.gate.isClosed()) {
        return false;
      }
      if (!announced) {
        this.debugLog('[JobRunner] Waiting for the model to finish loading...');
        announced = true;
      }
      await sleep(this.options.readinessRetryDelayMs);
    }

    return false;
  }

  private async runJob(job: Job): Promise<void> {
    const extractor = new ProgressExtractor((fraction) =>
      this.queue.updateProgress(job.id, fraction)
    );

    let outcome: JobOutcome;
    try {
      extractor.start(this.engine.output);
      this.activeExtractor = extractor;
      this.state = 'running';

      this.debugLog(`[JobRunner] Job ${job.id} started: ${job.path}`);
      this.notify(() => this.observer.onProgress(0));
      this.notify(() => this.observer.onStatus(`Processing: ${job.fileName}`));
      this.notify(() => this.observer.onJobUpdate?.(job));

      outcome = await this.execute(job);
    } catch (error) {
      outcome = this.failure(`Transcription failed for ${job.fileName}`, error, 'engine');
    } finally {
      this.state = 'finishing';
      extractor.stop();
    }

    // Observers hear the outcome before the slot is cleared
    try {
      const finished = this.queue.markCurrent(outcome) ?? job;
      if (outcome.status === 'done') {
        const transcriptPath = outcome.transcriptPath;
        this.debugLog(`[JobRunner] Job ${job.id} completed: ${transcriptPath}`);
        this.notify(() => this.observer.onStatus(`Transcription complete: ${transcriptPath}`));
      } else {
        const message = outcome.error;
        this.debugLog(`[JobRunner] Job ${job.id} failed (${outcome.errorKind}): ${message}`);
        this.notify(() => this.observer.onStatus(`Error: ${message}`));
        this.notify(() => this.observer.onError(message));
      }
      this.notify(() => this.observer.onJobUpdate?.(finished));
    } finally {
      this.activeExtractor = null;
      this.queue.completeCurrent();
    }
  }

  private async execute(job: Job): Promise<JobOutcome> {
    let text: string;
    try {
      text = (await this.engine.transcribe(job.path)).text;
    } catch (error) {
      return this.failure(`Transcription failed for ${job.fileName}`, error, 'engine');
    }

    this.state = 'finishing';
    try {
      const transcriptPath = await this.sink.write(job.path, text);
      return { status: 'done', transcriptPath };
    } catch (error) {
      return this.failure(`Could not save transcript for ${job.fileName}`, error, 'persistence');
    }
  }

  /**
   * An observer that throws must not stall the queue
   */
  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error('[JobRunner] ✗ Observer failed:', error);
    }
  }

  private failure(prefix: string, error: unknown, errorKind: JobErrorKind): JobOutcome {
    return { status: 'failed', error: `${prefix}: ${errorMessage(error)}`, errorKind };
  }
}
