import type { Readable } from "stream";
import type { z } from "zod";

/** A kind of JSON document a job can hold, keyed by name and validated on read. */
export interface DataType<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface JobSummary {
  jobId: string;
  dataTypes: string[];
  blobCount: number;
  updatedAt: string;
}

export interface JobStore {
  findData<T>(type: DataType<T>, jobId: string): T | null;
  create<T>(jobId: string, type: DataType<T>, value: T): void;
  update<T>(jobId: string, type: DataType<T>, value: T): void;
  getStream(jobId: string, key: string): Readable;
  putBlob(jobId: string, key: string, bytes: Uint8Array): void;
  listJobs(): JobSummary[];
  removeJob(jobId: string): { dataRemoved: number; blobsRemoved: number };
}
