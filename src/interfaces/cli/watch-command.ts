import { Command, Option } from 'commander';
import { z } from 'zod';
import { toAlertJson } from '../../domain/index.js';
import { DEFAULT_ALERT_CHANNEL, createRedis, startAlertSubscriber } from '../../infrastructure/redis/index.js';
import { addConnectionOptions, connectionOptionsSchema, parseOptions, toConfigOverrides } from './options.js';
import { shutdown, withRuntime } from './context.js';

const watchOptionsSchema = connectionOptionsSchema.extend({
  channel: z.string().min(1).default(DEFAULT_ALERT_CHANNEL),
});

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Downstream consumer: prints every alert published on the Redis channel
 * as one JSON line on stdout until interrupted.
 */
export function watchCommand(): Command {
  const command = new Command('watch')
    .description('Print alerts published on the Redis alert channel')
    .addOption(new Option('-c, --channel <name>', 'Redis Pub/Sub channel'));

  return addConnectionOptions(command).action(async (raw: unknown) => {
    const opts = parseOptions(watchOptionsSchema, raw);

    await withRuntime(toConfigOverrides(opts), { command: 'watch' }, async (runtime, log) => {
      const sub = createRedis(runtime.config.redisUrl);
      await sub.connect();

      const stop = await startAlertSubscriber(
        sub,
        log,
        (alert) => {
          process.stdout.write(`${JSON.stringify(toAlertJson(alert))}\n`);
        },
        opts.channel,
      );

      await waitForAbort(shutdown.signal);
      await stop();
    });
  });
}
