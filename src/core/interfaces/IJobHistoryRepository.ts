import type { Job, JobStatus } from '../entities/Job.js';

/**
 * Interface for terminal job history persistence
 */
export interface IJobHistoryRepository {
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(limit?: number): Job[];

  getJobsByStatus(status: JobStatus): Job[];

  deleteJobsByAge(hoursOld: number): number;
}
