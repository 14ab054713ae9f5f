import { z } from 'zod';
import { PipelineError } from './domain/index.js';

/**
 * Zod schema for process configuration.
 *
 * Values come from the environment; CLI flags override them key by key.
 * Empty strings count as unset so `FOO=` does not defeat a default.
 */
const configSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  BATCHWATCH_CACHE_BACKEND: z.enum(['redis', 'postgres']).default('redis'),
  // One week: long enough for Eval to run well after Run
  BATCHWATCH_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(604_800),
  BATCHWATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(1),
  BATCHWATCH_QUERY_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
});

export type ConfigKey = keyof z.input<typeof configSchema>;

export type CacheBackend = z.infer<typeof configSchema>['BATCHWATCH_CACHE_BACKEND'];

export interface AppConfig {
  readonly logLevel: z.infer<typeof configSchema>['LOG_LEVEL'];
  readonly databaseUrl: string | undefined;
  readonly redisUrl: string;
  readonly cache: {
    readonly backend: CacheBackend;
    readonly ttlSeconds: number;
  };
  readonly concurrency: number;
  /** 0 disables the per-query deadline. */
  readonly queryTimeoutMs: number;
}

function withoutEmpty(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<ConfigKey, string | undefined>> = {},
): AppConfig {
  const parsed = configSchema.safeParse({
    ...withoutEmpty(env),
    ...withoutEmpty(overrides),
  });

  if (!parsed.success) {
    throw new PipelineError('InvalidConfig', 'invalid configuration', {
      issues: parsed.error.flatten().fieldErrors,
    });
  }

  const c = parsed.data;
  return {
    logLevel: c.LOG_LEVEL,
    databaseUrl: c.DATABASE_URL,
    redisUrl: c.REDIS_URL,
    cache: {
      backend: c.BATCHWATCH_CACHE_BACKEND,
      ttlSeconds: c.BATCHWATCH_CACHE_TTL_SECONDS,
    },
    concurrency: c.BATCHWATCH_CONCURRENCY,
    queryTimeoutMs: c.BATCHWATCH_QUERY_TIMEOUT_MS,
  };
}
