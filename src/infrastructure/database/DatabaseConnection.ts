import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

export interface DatabaseStatistics {
  totalJobs: number;
  doneJobs: number;
  failedJobs: number;
  databaseSize: number;
}

/**
 * Database connection manager for job history
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/transcriptions.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS transcription_jobs (
        id TEXT PRIMARY KEY,
        path TEXT NOT NULL,
        file_name TEXT NOT NULL,
        status TEXT NOT NULL,
        progress REAL DEFAULT 0,
        created_at TIMESTAMP NOT NULL,
        started_at TIMESTAMP,
        completed_at TIMESTAMP,
        transcript_path TEXT,
        error TEXT,
        error_kind TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_transcription_status ON transcription_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_transcription_completed ON transcription_jobs(completed_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  getStatistics(): DatabaseStatistics {
    const counts = this.db
      .prepare<[], { total: number; done: number | null; failed: number | null }>(
        `SELECT
           COUNT(*) AS total,
           SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) AS done,
           SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed
         FROM transcription_jobs`
      )
      .get();

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalJobs: counts?.total ?? 0,
      doneJobs: counts?.done ?? 0,
      failedJobs: counts?.failed ?? 0,
      databaseSize,
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
