import { pgTable, varchar, timestamp, jsonb, index, primaryKey } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `cache_entries` table.
 *
 * One row per (job_id, task_id). The composite primary key is what enforces
 * the write-once contract: a second insert for the same key conflicts.
 * `stored_at` is indexed for retention sweeps run outside this service.
 */
export const cacheEntries = pgTable('cache_entries', {
  job_id: varchar('job_id', { length: 255 }).notNull(),
  task_id: varchar('task_id', { length: 255 }).notNull(),
  payload: jsonb('payload').notNull(),
  stored_at: timestamp('stored_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.job_id, table.task_id] }),
  index('idx_cache_entries_stored_at').on(table.stored_at),
]);

export type CacheEntryRow = typeof cacheEntries.$inferSelect;
