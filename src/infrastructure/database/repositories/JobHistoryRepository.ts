import Database from 'better-sqlite3';
import type { IJobHistoryRepository } from '../../../core/interfaces/IJobHistoryRepository.js';
import type { Job, JobErrorKind, JobStatus } from '../../../core/entities/Job.js';

interface JobRow {
  id: string;
  path: string;
  file_name: string;
  status: JobStatus;
  progress: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  transcript_path: string | null;
  error: string | null;
  error_kind: JobErrorKind | null;
}

/**
 * SQLite implementation of job history
 */
export class JobHistoryRepository implements IJobHistoryRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO transcription_jobs
        (id, path, file_name, status, progress, created_at, started_at, completed_at, transcript_path, error, error_kind)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.id,
      job.path,
      job.fileName,
      job.status,
      job.progress,
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.completedAt ? job.completedAt.toISOString() : null,
      job.transcriptPath ?? null,
      job.error ?? null,
      job.errorKind ?? null
    );
  }

  loadJob(jobId: string): Job | null {
    const row = this.db
      .prepare<[string], JobRow>('SELECT * FROM transcription_jobs WHERE id = ?')
      .get(jobId);

    return row ? this.toJob(row) : null;
  }

  getAllJobs(limit?: number): Job[] {
    const rows =
      limit !== undefined
        ? this.db
            .prepare<[number], JobRow>(
              'SELECT * FROM transcription_jobs ORDER BY created_at DESC, rowid DESC LIMIT ?'
            )
            .all(limit)
        : this.db
            .prepare<[], JobRow>('SELECT * FROM transcription_jobs ORDER BY created_at DESC, rowid DESC')
            .all();

    return rows.map((row) => this.toJob(row));
  }

  getJobsByStatus(status: JobStatus): Job[] {
    const rows = this.db
      .prepare<[JobStatus], JobRow>(
        'SELECT * FROM transcription_jobs WHERE status = ? ORDER BY created_at DESC, rowid DESC'
      )
      .all(status);

    return rows.map((row) => this.toJob(row));
  }

  deleteJobsByAge(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();

    const result = this.db
      .prepare<[string]>('DELETE FROM transcription_jobs WHERE completed_at < ?')
      .run(cutoffTime);

    return result.changes || 0;
  }

  private toJob(row: JobRow): Job {
    return {
      id: row.id,
      path: row.path,
      fileName: row.file_name,
      status: row.status,
      progress: row.progress,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
      transcriptPath: row.transcript_path ?? undefined,
      error: row.error ?? undefined,
      errorKind: row.error_kind ?? undefined,
    };
  }
}
