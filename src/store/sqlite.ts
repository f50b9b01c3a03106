import Database from "better-sqlite3";
import { Readable } from "stream";
import { createLogger } from "../logger.js";
import { JobStoreError } from "../errors.js";
import type { DataType, JobStore, JobSummary } from "./types.js";

const log = createLogger("job-store");

interface DataRow {
  data: string;
}

interface BlobRow {
  bytes: Buffer;
}

interface JobRow {
  job_id: string;
  data_types: string | null;
  blob_count: number;
  updated_at: string;
}

/**
 * JobStore backed by a single SQLite file.
 * Typed data is stored as JSON, one row per (job, type); staged photos as blobs.
 */
export class SqliteJobStore implements JobStore {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.init();
  }

  private init(): void {
    this.db.exec(`
      -- Typed job data (album mappings etc.)
      CREATE TABLE IF NOT EXISTS job_data (
        job_id TEXT NOT NULL,
        type TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (job_id, type)
      );

      -- Photo bytes staged for a job
      CREATE TABLE IF NOT EXISTS job_blobs (
        job_id TEXT NOT NULL,
        key TEXT NOT NULL,
        bytes BLOB NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (job_id, key)
      );
    `);
  }

  findData<T>(type: DataType<T>, jobId: string): T | null {
    const row = this.db
      .prepare<{ jobId: string; type: string }, DataRow>(
        "SELECT data FROM job_data WHERE job_id = @jobId AND type = @type"
      )
      .get({ jobId, type: type.name });

    if (!row) return null;

    const parsed = type.schema.safeParse(JSON.parse(row.data));
    if (!parsed.success) {
      throw new JobStoreError(
        `Stored ${type.name} for job ${jobId} is malformed: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  create<T>(jobId: string, type: DataType<T>, value: T): void {
    const now = new Date().toISOString();
    try {
      this.db
        .prepare<{ jobId: string; type: string; data: string; now: string }>(
          `INSERT INTO job_data (job_id, type, data, created_at, updated_at)
           VALUES (@jobId, @type, @data, @now, @now)`
        )
        .run({ jobId, type: type.name, data: JSON.stringify(value), now });
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith("SQLITE_CONSTRAINT")) {
        throw new JobStoreError(`Job ${jobId} already has ${type.name}`);
      }
      throw error;
    }
    log.debug({ jobId, type: type.name }, "Created job data");
  }

  update<T>(jobId: string, type: DataType<T>, value: T): void {
    const result = this.db
      .prepare<{ jobId: string; type: string; data: string; now: string }>(
        `UPDATE job_data SET data = @data, updated_at = @now
         WHERE job_id = @jobId AND type = @type`
      )
      .run({
        jobId,
        type: type.name,
        data: JSON.stringify(value),
        now: new Date().toISOString(),
      });

    if (result.changes === 0) {
      throw new JobStoreError(`Job ${jobId} has no ${type.name} to update`);
    }
    log.debug({ jobId, type: type.name }, "Updated job data");
  }

  getStream(jobId: string, key: string): Readable {
    const row = this.db
      .prepare<{ jobId: string; key: string }, BlobRow>(
        "SELECT bytes FROM job_blobs WHERE job_id = @jobId AND key = @key"
      )
      .get({ jobId, key });

    if (!row) {
      throw new JobStoreError(`No staged data for key ${key} in job ${jobId}`);
    }
    return Readable.from([row.bytes]);
  }

  putBlob(jobId: string, key: string, bytes: Uint8Array): void {
    this.db
      .prepare<{ jobId: string; key: string; bytes: Buffer; now: string }>(
        `INSERT INTO job_blobs (job_id, key, bytes, created_at)
         VALUES (@jobId, @key, @bytes, @now)
         ON CONFLICT(job_id, key) DO UPDATE SET bytes = excluded.bytes, created_at = excluded.created_at`
      )
      .run({ jobId, key, bytes: Buffer.from(bytes), now: new Date().toISOString() });
    log.debug({ jobId, key, size: bytes.byteLength }, "Staged blob");
  }

  listJobs(): JobSummary[] {
    const rows = this.db
      .prepare<[], JobRow>(
        `SELECT jobs.job_id AS job_id,
                (SELECT group_concat(type, ',') FROM job_data d WHERE d.job_id = jobs.job_id) AS data_types,
                (SELECT count(*) FROM job_blobs b WHERE b.job_id = jobs.job_id) AS blob_count,
                max(jobs.updated_at) AS updated_at
         FROM (
           SELECT job_id, updated_at FROM job_data
           UNION ALL
           SELECT job_id, created_at AS updated_at FROM job_blobs
         ) jobs
         GROUP BY jobs.job_id
         ORDER BY updated_at DESC`
      )
      .all();

    return rows.map((row) => ({
      jobId: row.job_id,
      dataTypes: row.data_types ? row.data_types.split(",").sort() : [],
      blobCount: row.blob_count,
      updatedAt: row.updated_at,
    }));
  }

  removeJob(jobId: string): { dataRemoved: number; blobsRemoved: number } {
    const remove = this.db.transaction((id: string) => {
      const data = this.db.prepare("DELETE FROM job_data WHERE job_id = ?").run(id);
      const blobs = this.db.prepare("DELETE FROM job_blobs WHERE job_id = ?").run(id);
      return { dataRemoved: data.changes, blobsRemoved: blobs.changes };
    });
    return remove(jobId);
  }

  close(): void {
    this.db.close();
  }
}
