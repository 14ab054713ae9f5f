import { Redis } from 'ioredis';

/**
 * Creates an ioredis connection with the project's defaults.
 * `lazyConnect` lets callers decide when to pay the connection cost.
 */
export function createRedis(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
