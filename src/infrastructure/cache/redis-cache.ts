import type { Redis } from 'ioredis';
import type { CacheEntry, JobCache, JobId, QueryResult, TaskId } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';
import { decodeStoredEntry } from '../../application/cache-schema.js';
import type { StoredEntry } from '../../application/cache-schema.js';

const KEY_PREFIX = 'batchwatch:cache';
const SCAN_COUNT = 100;

/** The Redis commands the cache needs. A dedicated interface keeps fakes small in tests. */
export type RedisCacheClient = Pick<Redis, 'hsetnx' | 'hget' | 'hscanStream' | 'expire' | 'del'>;

export interface RedisJobCacheOptions {
  /** Partition expiry, refreshed on every put. 0 disables expiry. */
  readonly ttlSeconds?: number | undefined;
  readonly keyPrefix?: string | undefined;
  readonly nowFn?: (() => number) | undefined;
}

/**
 * JobCache backed by one Redis hash per job.
 *
 * Key:   `batchwatch:cache:<jobId>`
 * Field: TaskID
 * Value: JSON `{ payload, stored_at }`
 *
 * - HSETNX gives the no-overwrite guarantee atomically.
 * - Enumeration streams HSCAN pages, so large partitions are never
 *   loaded at once. HSCAN may repeat fields; repeats are skipped.
 * - Retention is the key TTL. Different jobs never share a key,
 *   which is the only isolation between them.
 */
export class RedisJobCache implements JobCache {
  private readonly redis: RedisCacheClient;
  private readonly ttlSeconds: number;
  private readonly keyPrefix: string;
  private readonly nowFn: () => number;

  constructor(redis: RedisCacheClient, options: RedisJobCacheOptions = {}) {
    this.redis = redis;
    this.ttlSeconds = options.ttlSeconds ?? 0;
    this.keyPrefix = options.keyPrefix ?? KEY_PREFIX;
    this.nowFn = options.nowFn ?? Date.now;
  }

  key(jobId: JobId): string {
    return `${this.keyPrefix}:${jobId}`;
  }

  async put(jobId: JobId, taskId: TaskId, payload: QueryResult): Promise<void> {
    const stored: StoredEntry = {
      payload,
      stored_at: new Date(this.nowFn()).toISOString(),
    };

    const created = await this.redis.hsetnx(this.key(jobId), taskId, JSON.stringify(stored));
    if (created === 0) {
      throw new PipelineError('DuplicateCacheKey', `cache entry already exists for task "${taskId}"`, {
        job_id: jobId,
        task_id: taskId,
      });
    }

    if (this.ttlSeconds > 0) {
      await this.redis.expire(this.key(jobId), this.ttlSeconds);
    }
  }

  async get(jobId: JobId, taskId: TaskId): Promise<CacheEntry | undefined> {
    const raw = await this.redis.hget(this.key(jobId), taskId);
    if (raw === null) return undefined;
    return decodeStoredEntry(jobId, taskId, raw);
  }

  async *entries(jobId: JobId): AsyncGenerator<CacheEntry> {
    const stream = this.redis.hscanStream(this.key(jobId), { count: SCAN_COUNT });
    const seen = new Set<string>();

    try {
      // Each chunk is a flat [field, value, field, value, ...] array
      for await (const chunk of stream) {
        if (!Array.isArray(chunk)) continue;

        for (let i = 0; i + 1 < chunk.length; i += 2) {
          const taskId: unknown = chunk[i];
          const raw: unknown = chunk[i + 1];
          if (typeof taskId !== 'string' || typeof raw !== 'string') continue;
          if (seen.has(taskId)) continue;

          seen.add(taskId);
          yield decodeStoredEntry(jobId, taskId, raw);
        }
      }
    } finally {
      stream.destroy();
    }
  }

  async clear(jobId: JobId): Promise<void> {
    await this.redis.del(this.key(jobId));
  }
}
