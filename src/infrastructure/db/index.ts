export { cacheEntries } from './schema.js';
export type { CacheEntryRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureCacheSchema } from './migrate.js';
