/**
 * Transcription job domain entity
 */
export type JobStatus = 'pending' | 'running' | 'done' | 'failed';

export type JobErrorKind = 'engine' | 'persistence' | 'initialization';

export interface Job {
  id: string;
  path: string; // normalized absolute path, dedup key
  fileName: string;
  status: JobStatus;
  progress: number; // fraction, normally 0-1 (engine values pass through unclamped)
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  transcriptPath?: string;
  error?: string;
  errorKind?: JobErrorKind;
}

/**
 * Terminal result applied to the running job
 */
export type JobOutcome =
  | { status: 'done'; transcriptPath: string }
  | { status: 'failed'; error: string; errorKind: JobErrorKind };

export type EnqueueResult =
  | { status: 'queued'; job: Job }
  | { status: 'duplicate'; path: string };

/**
 * Per-path answer returned to whoever submitted paths
 */
export type EnqueueReport =
  | { input: string; status: 'queued'; job: Job }
  | { input: string; status: 'duplicate'; path: string }
  | { input: string; status: 'rejected'; error: string };

export interface QueueStatistics {
  total: number;
  pending: number;
  running: number;
  done: number;
  failed: number;
}
