export { MemoryJobCache } from './memory-cache.js';
export { RedisJobCache } from './redis-cache.js';
export type { RedisCacheClient, RedisJobCacheOptions } from './redis-cache.js';
export { PostgresJobCache } from './postgres-cache.js';
