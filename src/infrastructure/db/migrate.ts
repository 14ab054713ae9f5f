import type { SqlClient } from './client.js';

/**
 * Ensures the cache table exists (lightweight migration via raw SQL).
 * drizzle-kit generates the equivalent migration from schema.ts.
 */
export async function ensureCacheSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      job_id     VARCHAR(255) NOT NULL,
      task_id    VARCHAR(255) NOT NULL,
      payload    JSONB        NOT NULL,
      stored_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      PRIMARY KEY (job_id, task_id)
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_cache_entries_stored_at ON cache_entries (stored_at)`);
}
