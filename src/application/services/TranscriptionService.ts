import type { EnqueueReport, Job, JobStatus, QueueStatistics } from '../../core/entities/Job.js';
import { InitializationError, errorMessage } from '../../core/errors.js';
import type { IJobHistoryRepository } from '../../core/interfaces/IJobHistoryRepository.js';
import type { IPipelineObserver } from '../../core/interfaces/IPipelineObserver.js';
import type { IResultSink } from '../../core/interfaces/IResultSink.js';
import type { ITranscriptionEngine } from '../../core/interfaces/ITranscriptionEngine.js';
import {
  DEFAULT_PROGRESS_INTERVAL_MS,
  ProgressMonitor,
} from '../../infrastructure/progress/ProgressMonitor.js';
import { JobQueue } from '../../infrastructure/queue/JobQueue.js';
import { ReadinessGate } from '../../infrastructure/queue/ReadinessGate.js';
import { parseDropData } from '../../utils/dropData.js';
import { DEFAULT_RUNNER_OPTIONS, JobRunner, type RunnerState } from './JobRunner.js';
import { ObserverHub } from './ObserverHub.js';

export type ServiceState = 'starting' | 'initializing' | 'ready' | 'failed' | 'stopped';

export interface TranscriptionServiceOptions {
  readinessTimeoutMs: number;
  readinessRetryDelayMs: number;
  progressIntervalMs: number;
}

export const DEFAULT_SERVICE_OPTIONS: TranscriptionServiceOptions = {
  ...DEFAULT_RUNNER_OPTIONS,
  progressIntervalMs: DEFAULT_PROGRESS_INTERVAL_MS,
};

export interface PipelineSnapshot {
  state: ServiceState;
  ready: boolean;
  runner: RunnerState;
  current: Job | null;
  pending: Job[];
  progress: number;
  statistics: QueueStatistics;
  initializationError?: string;
}

/**
 * Application facade over the transcription pipeline: model initialization,
 * the queue, the single runner and the progress monitor.
 */
export class TranscriptionService {
  private readonly observers = new ObserverHub();
  private readonly gate = new ReadinessGate();
  private readonly queue: JobQueue;
  private readonly runner: JobRunner;
  private readonly monitor: ProgressMonitor;
  private state: ServiceState = 'starting';
  private initialization: Promise<void> | null = null;
  private initializationError?: string;
  private shuttingDown: Promise<void> | null = null;

  constructor(
    private engine: ITranscriptionEngine,
    sink: IResultSink,
    historyRepo?: IJobHistoryRepository,
    options: TranscriptionServiceOptions = DEFAULT_SERVICE_OPTIONS,
    private debugLog: (message: string) => void = () => undefined
  ) {
    this.queue = new JobQueue(historyRepo);
    this.runner = new JobRunner(
      this.queue,
      this.gate,
      engine,
      sink,
      this.observers,
      {
        readinessTimeoutMs: options.readinessTimeoutMs,
        readinessRetryDelayMs: options.readinessRetryDelayMs,
      },
      debugLog
    );
    this.monitor = new ProgressMonitor(
      () => this.runner.getActiveExtractor(),
      (fraction) => this.observers.onProgress(fraction),
      options.progressIntervalMs
    );
  }

  subscribe(observer: IPipelineObserver): () => void {
    return this.observers.subscribe(observer);
  }

  /**
   * Start progress monitoring and load the model in the background.
   * The returned promise settles when initialization finishes; it never rejects.
   * A service that has been shut down stays stopped.
   */
  start(): Promise<void> {
    if (this.isStopped()) {
      return this.initialization ?? Promise.resolve();
    }
    if (!this.initialization) {
      this.monitor.start();
      this.initialization = this.initialize();
    }
    return this.initialization;
  }

  private async initialize(): Promise<void> {
    this.state = 'initializing';
    this.observers.onStatus('Initializing model...');

    try {
      await this.engine.loadModel();
    } catch (error) {
      this.failInitialization(error);
      return;
    }

    if (this.isStopped()) return;

    this.gate.signal();
    this.state = 'ready';
    this.observers.onStatus('Ready');
    this.debugLog('[TranscriptionService] Model ready');
    this.runner.trigger();
  }

  /**
   * The model will never load: close the gate and fail everything waiting on it
   */
  private failInitialization(error: unknown): void {
    if (this.isStopped()) return;

    const message = `Model initialization failed: ${errorMessage(error)}`;
    this.state = 'failed';
    this.initializationError = message;

    this.gate.reset();
    this.observers.onStatus(`Error: ${message}`);
    this.observers.onError(message);

    const abandoned = this.queue.failPending(message);
    for (const job of abandoned) {
      this.observers.onJobUpdate(job);
    }
    if (abandoned.length > 0) {
      console.error(`[TranscriptionService] ✗ Failed ${abandoned.length} pending jobs`);
    }
  }

  /**
   * Validate and queue each path independently, then wake the runner
   */
  enqueue(rawPaths: string[]): EnqueueReport[] {
    const reports: EnqueueReport[] = [];

    for (const input of rawPaths) {
      try {
        if (this.state === 'failed' || this.state === 'stopped') {
          throw new InitializationError(
            this.state === 'failed'
              ? this.initializationError ?? 'Model initialization failed'
              : 'Service is shutting down'
          );
        }

        const result = this.queue.enqueue(input);
        if (result.status === 'queued') {
          this.debugLog(`[TranscriptionService] Queued ${result.job.path}`);
          this.observers.onJobUpdate(result.job);
          reports.push({ input, status: 'queued', job: result.job });
        } else {
          reports.push({ input, status: 'duplicate', path: result.path });
        }
      } catch (error) {
        const message = errorMessage(error);
        this.observers.onError(message);
        reports.push({ input, status: 'rejected', error: message });
      }
    }

    this.runner.trigger();
    return reports;
  }

  /**
   * Queue everything in a drag-and-drop payload
   */
  enqueueDropData(raw: string): EnqueueReport[] {
    return this.enqueue(parseDropData(raw));
  }

  getSnapshot(): PipelineSnapshot {
    const current = this.queue.getCurrent();
    return {
      state: this.state,
      ready: this.gate.isSet(),
      runner: this.runner.getState(),
      current,
      pending: this.queue.getPending(),
      progress: current?.progress ?? 0,
      statistics: this.queue.getStatistics(),
      initializationError: this.initializationError,
    };
  }

  getState(): ServiceState {
    return this.state;
  }

  private isStopped(): boolean {
    return this.state === 'stopped';
  }

  getJob(jobId: string): Job | null {
    return this.queue.getJob(jobId);
  }

  getAllJobs(): Job[] {
    return this.queue.getAllJobs();
  }

  getJobsByStatus(status: JobStatus): Job[] {
    return this.queue.getJobsByStatus(status);
  }

  getHistory(): Job[] {
    return this.queue.getHistory();
  }

  getStatistics(): QueueStatistics {
    return this.queue.getStatistics();
  }

  clearOldJobs(hoursOld: number): number {
    return this.queue.clearOldJobs(hoursOld);
  }

  /**
   * Resolves once the runner has drained everything it can
   */
  whenIdle(): Promise<void> {
    return this.runner.whenIdle();
  }

  /**
   * Stop taking work and release the engine. A job already running is allowed to finish.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.stop();
    }
    return this.shuttingDown;
  }

  private async stop(): Promise<void> {
    this.state = 'stopped';
    this.monitor.stop();
    this.gate.reset();
    this.runner.stop();

    const dropped = this.queue.clearPending();
    if (dropped > 0) {
      console.error(`[TranscriptionService] Dropped ${dropped} pending jobs`);
    }

    const current = this.queue.getCurrent();
    if (current) {
      console.error(`[TranscriptionService] Waiting for ${current.fileName} to finish...`);
    }
    await this.runner.whenIdle();
    await this.engine.dispose();
  }
}
