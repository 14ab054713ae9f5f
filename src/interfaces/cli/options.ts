import { Option } from 'commander';
import type { Command } from 'commander';
import { z } from 'zod';
import type { ConfigKey } from '../../config.js';
import { PipelineError } from '../../domain/index.js';

/** Repeated or comma separated list flag (`-t a -t b`, `-t a,b`, or `TAG=a,b`). */
export const listOption = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => splitList(value));

export function splitList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  const items = typeof value === 'string' ? [value] : value;
  return items.flatMap((item) => item.split(',')).map((item) => item.trim()).filter((item) => item !== '');
}

/** Flags shared by every command that talks to a backend. */
export const connectionOptionsSchema = z.object({
  logLevel: z.string().optional(),
  databaseUrl: z.string().optional(),
  redisUrl: z.string().optional(),
  cacheBackend: z.string().optional(),
  cacheTtl: z.string().optional(),
});

export type ConnectionOptions = z.infer<typeof connectionOptionsSchema>;

export function addConnectionOptions(command: Command): Command {
  return command
    .addOption(new Option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace, silent)'))
    .addOption(new Option('--database-url <url>', 'PostgreSQL connection URL [env: DATABASE_URL]'))
    .addOption(new Option('--redis-url <url>', 'Redis connection URL [env: REDIS_URL]'))
    .addOption(new Option('--cache-backend <backend>', 'Cache backend [env: BATCHWATCH_CACHE_BACKEND]').choices(['redis', 'postgres']))
    .addOption(new Option('--cache-ttl <seconds>', 'Cache retention in seconds [env: BATCHWATCH_CACHE_TTL_SECONDS]'));
}

export function toConfigOverrides(opts: ConnectionOptions): Partial<Record<ConfigKey, string | undefined>> {
  return {
    LOG_LEVEL: opts.logLevel,
    DATABASE_URL: opts.databaseUrl,
    REDIS_URL: opts.redisUrl,
    BATCHWATCH_CACHE_BACKEND: opts.cacheBackend,
    BATCHWATCH_CACHE_TTL_SECONDS: opts.cacheTtl,
  };
}

/** Validates commander's untyped option bag against a command's schema. */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PipelineError('InvalidConfig', 'invalid command options', {
      issues: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}
