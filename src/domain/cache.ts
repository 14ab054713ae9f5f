import type { JobId } from './job.js';
import type { TaskId } from './task.js';
import type { AttrValue } from './alert.js';

/** One row of a query result, normalized to JSON-safe dynamic values. */
export type QueryRow = Record<string, AttrValue>;

/** Raw result of executing a task's query. */
export type QueryResult = QueryRow[];

export interface CacheEntry {
  readonly job_id: JobId;
  readonly task_id: TaskId;
  readonly payload: QueryResult;
  readonly stored_at: Date;
}

/**
 * Job-scoped result cache keyed by (JobID, TaskID).
 *
 * - `put` never overwrites: an existing key fails with DuplicateCacheKey.
 * - `entries` is lazy, finite, and restartable per call. Order is backend
 *   defined but stable for the lifetime of the backing storage.
 * - `clear` drops a job's whole partition so a Run can be redone.
 *
 * Isolation between jobs comes from the partition key only.
 */
export interface JobCache {
  put(jobId: JobId, taskId: TaskId, payload: QueryResult): Promise<void>;
  get(jobId: JobId, taskId: TaskId): Promise<CacheEntry | undefined>;
  entries(jobId: JobId): AsyncIterable<CacheEntry>;
  clear(jobId: JobId): Promise<void>;
}
