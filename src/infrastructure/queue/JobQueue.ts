import { randomUUID } from 'crypto';
import path from 'path';
import type { IJobHistoryRepository } from '../../core/interfaces/IJobHistoryRepository.js';
import type {
  EnqueueResult,
  Job,
  JobOutcome,
  JobStatus,
  QueueStatistics,
} from '../../core/entities/Job.js';
import { normalizeInputPath, validateAudioFile } from '../../utils/paths.js';

/**
 * FIFO transcription queue with a single "current" slot.
 *
 * Every method runs synchronously, so the duplicate check in `enqueue` and the
 * hand-off in `dequeueNext` can never interleave with each other.
 */
export class JobQueue {
  private pending: Job[] = [];
  private current: Job | null = null;
  private finished: Map<string, Job> = new Map();
  private historyRepo?: IJobHistoryRepository;

  constructor(historyRepo?: IJobHistoryRepository) {
    this.historyRepo = historyRepo;

    if (this.historyRepo) {
      this.loadHistory();
    }
  }

  /**
   * Load terminal jobs from a previous session. Pending work is never restored.
   */
  private loadHistory(): void {
    if (!this.historyRepo) return;

    try {
      // Repository returns newest first; keep the map in completion order
      const records = this.historyRepo.getAllJobs().reverse();
      for (const job of records) {
        if (job.status === 'done' || job.status === 'failed') {
          this.finished.set(job.id, job);
        }
      }
      console.error(`[JobQueue] Loaded ${this.finished.size} finished jobs from history`);
    } catch (error) {
      console.error('[JobQueue] Error loading job history:', error);
    }
  }

  /**
   * Normalize, validate and append a path.
   * Throws ValidationError; a path already pending or running is a silent no-op.
   */
  enqueue(rawPath: string): EnqueueResult {
    const filePath = normalizeInputPath(rawPath);
    validateAudioFile(filePath);

    if (this.contains(filePath)) {
      return { status: 'duplicate', path: filePath };
    }

    const job: Job = {
      id: randomUUID(),
      path: filePath,
      fileName: path.basename(filePath),
      status: 'pending',
      progress: 0,
      createdAt: new Date(),
    };
    this.pending.push(job);

    return { status: 'queued', job };
  }

  /**
   * Whether a normalized path is pending or is the current job
   */
  contains(filePath: string): boolean {
    if (this.current?.path === filePath) return true;
    return this.pending.some((job) => job.path === filePath);
  }

  /**
   * Pop the head job and make it current. Null when nothing is pending or a job is already current.
   */
  dequeueNext(): Job | null {
    if (this.current) return null;

    const job = this.pending.shift();
    if (!job) return null;

    job.status = 'running';
    job.startedAt = new Date();
    job.progress = 0;
    this.current = job;
    return job;
  }

  /**
   * Record the latest progress fraction for the running job
   */
  updateProgress(jobId: string, fraction: number): void {
    if (this.current && this.current.id === jobId) {
      this.current.progress = fraction;
    }
  }

  /**
   * Apply the terminal outcome to the current job; it stays current until completeCurrent()
   */
  markCurrent(outcome: JobOutcome): Job | null {
    const job = this.current;
    if (!job) return null;

    job.status = outcome.status;
    job.completedAt = new Date();
    if (outcome.status === 'done') {
      job.transcriptPath = outcome.transcriptPath;
    } else {
      job.error = outcome.error;
      job.errorKind = outcome.errorKind;
    }
    return job;
  }

  /**
   * Clear the current slot and move its job to history
   */
  completeCurrent(): Job | null {
    const job = this.current;
    if (!job) return null;

    this.current = null;
    this.finished.set(job.id, job);
    this.persist(job);
    return job;
  }

  /**
   * Fail every pending job (used when the model can never become ready)
   */
  failPending(message: string): Job[] {
    const failed = this.pending.splice(0);
    const now = new Date();

    for (const job of failed) {
      job.status = 'failed';
      job.completedAt = now;
      job.error = message;
      job.errorKind = 'initialization';
      this.finished.set(job.id, job);
      this.persist(job);
    }

    return failed;
  }

  /**
   * Drop all pending jobs without recording them
   */
  clearPending(): number {
    return this.pending.splice(0).length;
  }

  private persist(job: Job): void {
    if (!this.historyRepo) return;

    try {
      this.historyRepo.saveJob(job);
      console.error(`[JobQueue] ✓ Job ${job.id} persisted to history (${job.status})`);
    } catch (error) {
      console.error(`[JobQueue] ✗ Failed to persist job ${job.id} to history:`, error);
    }
  }

  hasPending(): boolean {
    return this.pending.length > 0;
  }

  getCurrent(): Job | null {
    return this.current;
  }

  getPending(): Job[] {
    return [...this.pending];
  }

  /**
   * Finished jobs, most recent first
   */
  getHistory(): Job[] {
    return Array.from(this.finished.values()).reverse();
  }

  getJob(jobId: string): Job | null {
    if (this.current?.id === jobId) return this.current;

    const pending = this.pending.find((job) => job.id === jobId);
    if (pending) return pending;

    const finished = this.finished.get(jobId);
    if (finished) return finished;

    if (this.historyRepo) {
      try {
        return this.historyRepo.loadJob(jobId);
      } catch (error) {
        console.error(`[JobQueue] ✗ Error loading job ${jobId} from history:`, error);
      }
    }

    return null;
  }

  getJobsByStatus(status: JobStatus): Job[] {
    return this.getAllJobs().filter((job) => job.status === status);
  }

  getAllJobs(): Job[] {
    const jobs: Job[] = [];
    if (this.current) jobs.push(this.current);
    jobs.push(...this.pending);
    jobs.push(...this.finished.values());
    return jobs;
  }

  getStatistics(): QueueStatistics {
    const finished = Array.from(this.finished.values());
    const running = this.current ? 1 : 0;
    return {
      total: this.pending.length + running + finished.length,
      pending: this.pending.length,
      running,
      done: finished.filter((job) => job.status === 'done').length,
      failed: finished.filter((job) => job.status === 'failed').length,
    };
  }

  /**
   * Clear finished jobs older than the given number of hours
   */
  clearOldJobs(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000);
    let cleared = 0;

    for (const [jobId, job] of this.finished.entries()) {
      if (job.completedAt && job.completedAt < cutoffTime) {
        this.finished.delete(jobId);
        cleared++;
      }
    }

    if (this.historyRepo) {
      try {
        this.historyRepo.deleteJobsByAge(hoursOld);
      } catch (error) {
        console.error('[JobQueue] ✗ Failed to prune job history:', error);
      }
    }

    return cleared;
  }
}
