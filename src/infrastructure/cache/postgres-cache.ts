import { and, asc, eq, gt } from 'drizzle-orm';
import type { CacheEntry, JobCache, JobId, QueryResult, TaskId } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';
import { queryResultSchema } from '../../application/cache-schema.js';
import type { Database } from '../db/index.js';
import { cacheEntries } from '../db/index.js';
import type { CacheEntryRow } from '../db/index.js';

const PAGE_SIZE = 100;

function toEntry(row: CacheEntryRow): CacheEntry {
  const payload = queryResultSchema.safeParse(row.payload);
  if (!payload.success) {
    throw new PipelineError('CorruptCacheEntry', 'cache entry has an unexpected shape', {
      job_id: row.job_id,
      task_id: row.task_id,
      issues: payload.error.flatten(),
    });
  }

  return {
    job_id: row.job_id,
    task_id: row.task_id,
    payload: payload.data,
    stored_at: row.stored_at,
  };
}

/**
 * JobCache backed by the `cache_entries` table.
 *
 * - Insert with ON CONFLICT DO NOTHING; an empty RETURNING set means the
 *   key already existed → DuplicateCacheKey.
 * - Enumeration pages through the partition by task_id (keyset), so the
 *   order is stable and only one page is held at a time.
 */
export class PostgresJobCache implements JobCache {
  private readonly db: Database;
  private readonly pageSize: number;

  constructor(db: Database, pageSize: number = PAGE_SIZE) {
    this.db = db;
    this.pageSize = pageSize;
  }

  async put(jobId: JobId, taskId: TaskId, payload: QueryResult): Promise<void> {
    const inserted = await this.db
      .insert(cacheEntries)
      .values({ job_id: jobId, task_id: taskId, payload })
      .onConflictDoNothing()
      .returning({ task_id: cacheEntries.task_id });

    if (inserted.length === 0) {
      throw new PipelineError('DuplicateCacheKey', `cache entry already exists for task "${taskId}"`, {
        job_id: jobId,
        task_id: taskId,
      });
    }
  }

  async get(jobId: JobId, taskId: TaskId): Promise<CacheEntry | undefined> {
    const rows = await this.db
      .select()
      .from(cacheEntries)
      .where(and(eq(cacheEntries.job_id, jobId), eq(cacheEntries.task_id, taskId)))
      .limit(1);

    const row = rows[0];
    return row === undefined ? undefined : toEntry(row);
  }

  async *entries(jobId: JobId): AsyncGenerator<CacheEntry> {
    let after = '';

    for (;;) {
      const rows = await this.db
        .select()
        .from(cacheEntries)
        .where(and(eq(cacheEntries.job_id, jobId), gt(cacheEntries.task_id, after)))
        .orderBy(asc(cacheEntries.task_id))
        .limit(this.pageSize);

      for (const row of rows) {
        yield toEntry(row);
      }

      const last = rows.at(-1);
      if (last === undefined || rows.length < this.pageSize) return;
      after = last.task_id;
    }
  }

  async clear(jobId: JobId): Promise<void> {
    await this.db.delete(cacheEntries).where(eq(cacheEntries.job_id, jobId));
  }
}
