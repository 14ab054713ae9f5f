import type { Logger } from 'pino';
import { loadConfig } from '../../config.js';
import type { ConfigKey } from '../../config.js';
import { createLogger } from '../../logger.js';
import { Runtime } from './runtime.js';

/** Process-wide cancellation; aborted on SIGINT/SIGTERM by main. */
export const shutdown = new AbortController();

/**
 * Builds config, logger and runtime for one command, runs `fn`, and always
 * releases connections afterwards.
 */
export async function withRuntime<T>(
  overrides: Partial<Record<ConfigKey, string | undefined>>,
  bindings: Record<string, unknown>,
  fn: (runtime: Runtime, log: Logger) => Promise<T>,
): Promise<T> {
  const config = loadConfig(process.env, overrides);
  const log = createLogger(config.logLevel).child(bindings);
  const runtime = new Runtime(config, log);

  try {
    return await fn(runtime, log);
  } catch (err: unknown) {
    log.error({ err }, 'Command failed');
    throw err;
  } finally {
    await runtime.close();
  }
}
