import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config.js';
import type { JobCache } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';
import { createDbClient, ensureCacheSchema } from '../../infrastructure/db/index.js';
import { createRedis } from '../../infrastructure/redis/index.js';
import { PostgresJobCache, RedisJobCache } from '../../infrastructure/cache/index.js';

type DbClient = ReturnType<typeof createDbClient>;

/**
 * Lazily opened connections for one command invocation.
 *
 * Each connection is created on first use and closed once in `close()`,
 * so a command only pays for the backends it actually touches.
 */
export class Runtime {
  readonly config: AppConfig;
  readonly log: Logger;
  private redis: Redis | undefined;
  private dbClient: DbClient | undefined;

  constructor(config: AppConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async getRedis(): Promise<Redis> {
    if (this.redis === undefined) {
      const redis = createRedis(this.config.redisUrl);
      this.redis = redis;
      await redis.connect();
      this.log.info('Redis connected');
    }
    return this.redis;
  }

  getDb(): DbClient {
    if (this.dbClient === undefined) {
      if (this.config.databaseUrl === undefined) {
        throw new PipelineError('InvalidConfig', 'DATABASE_URL is required');
      }
      this.dbClient = createDbClient(this.config.databaseUrl);
    }
    return this.dbClient;
  }

  async openCache(): Promise<JobCache> {
    switch (this.config.cache.backend) {
      case 'redis':
        return new RedisJobCache(await this.getRedis(), { ttlSeconds: this.config.cache.ttlSeconds });
      case 'postgres': {
        const { sql, db } = this.getDb();
        await ensureCacheSchema(sql);
        return new PostgresJobCache(db);
      }
    }
  }

  async close(): Promise<void> {
    if (this.redis !== undefined) {
      await this.redis.quit();
      this.log.info('Redis disconnected');
    }
    if (this.dbClient !== undefined) {
      await this.dbClient.sql.end();
    }
  }
}
