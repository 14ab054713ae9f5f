import type { CacheEntry, JobCache, JobId, QueryResult, TaskId } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';

/**
 * In-process JobCache.
 *
 * Backed by a Map<jobId, Map<taskId, entry>>. Enumeration follows insertion
 * order. Payloads are cloned on write and again on read, so no caller ever
 * holds a reference to a cached row.
 * Only useful when Run and Eval share a process (tests, one-shot pipelines).
 */
function copyEntry(entry: CacheEntry): CacheEntry {
  return {
    job_id: entry.job_id,
    task_id: entry.task_id,
    payload: structuredClone(entry.payload),
    stored_at: new Date(entry.stored_at.getTime()),
  };
}

export class MemoryJobCache implements JobCache {
  private readonly partitions: Map<JobId, Map<TaskId, CacheEntry>> = new Map();
  /** Clock function, injectable for tests. */
  private readonly nowFn: () => number;

  constructor(nowFn: () => number = Date.now) {
    this.nowFn = nowFn;
  }

  async put(jobId: JobId, taskId: TaskId, payload: QueryResult): Promise<void> {
    let partition = this.partitions.get(jobId);
    if (partition === undefined) {
      partition = new Map();
      this.partitions.set(jobId, partition);
    }

    if (partition.has(taskId)) {
      throw new PipelineError('DuplicateCacheKey', `cache entry already exists for task "${taskId}"`, {
        job_id: jobId,
        task_id: taskId,
      });
    }

    partition.set(taskId, {
      job_id: jobId,
      task_id: taskId,
      payload: structuredClone(payload),
      stored_at: new Date(this.nowFn()),
    });
  }

  async get(jobId: JobId, taskId: TaskId): Promise<CacheEntry | undefined> {
    const entry = this.partitions.get(jobId)?.get(taskId);
    return entry === undefined ? undefined : copyEntry(entry);
  }

  async *entries(jobId: JobId): AsyncGenerator<CacheEntry> {
    const partition = this.partitions.get(jobId);
    if (partition === undefined) return;

    // Snapshot so a concurrent put cannot change an enumeration in progress
    for (const entry of [...partition.values()]) {
      yield copyEntry(entry);
    }
  }

  async clear(jobId: JobId): Promise<void> {
    this.partitions.delete(jobId);
  }

  /** Total entries across all partitions. */
  get size(): number {
    let total = 0;
    for (const partition of this.partitions.values()) total += partition.size;
    return total;
  }
}
