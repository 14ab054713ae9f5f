import { z } from 'zod';
import type { CacheEntry } from '../domain/index.js';
import { PipelineError } from '../domain/index.js';
import { attrsSchema } from './alert-schema.js';

/** A cached payload is a row set: an array of string-keyed dynamic maps. */
export const queryResultSchema = z.array(attrsSchema);

/** Serialized form of a cache entry in key-value backends. */
export const storedEntrySchema = z.object({
  payload: queryResultSchema,
  stored_at: z.string().datetime({ offset: true }),
});

export type StoredEntry = z.infer<typeof storedEntrySchema>;

/** Rebuilds a CacheEntry from its stored JSON, rejecting anything malformed. */
export function decodeStoredEntry(jobId: string, taskId: string, raw: string): CacheEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new PipelineError('CorruptCacheEntry', 'cache entry is not valid JSON', {
      job_id: jobId,
      task_id: taskId,
    }, { cause: err });
  }

  const parsed = storedEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new PipelineError('CorruptCacheEntry', 'cache entry has an unexpected shape', {
      job_id: jobId,
      task_id: taskId,
      issues: parsed.error.flatten(),
    });
  }

  return {
    job_id: jobId,
    task_id: taskId,
    payload: parsed.data.payload,
    stored_at: new Date(parsed.data.stored_at),
  };
}
