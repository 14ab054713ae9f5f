import { pino, destination } from 'pino';
import type { Logger } from 'pino';

/**
 * Root logger. Writes JSON lines to stderr so stdout stays free for
 * command output (summaries, watched alerts).
 */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino(
    {
      level,
      base: { service: 'batchwatch' },
    },
    destination(2),
  );
}
