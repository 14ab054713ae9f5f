import { Command, Option } from 'commander';
import { z } from 'zod';
import { evalAlerts } from '../../application/index.js';
import { createJobContext } from '../../domain/index.js';
import { createRulePolicy } from '../../infrastructure/policy/index.js';
import { createNotificationDispatcher, loadNotificationConfig } from '../../infrastructure/notifications/index.js';
import { addConnectionOptions, connectionOptionsSchema, parseOptions, toConfigOverrides } from './options.js';
import { shutdown, withRuntime } from './context.js';

const evalOptionsSchema = connectionOptionsSchema.extend({
  jobId: z.string().min(1),
  rules: z.string().min(1),
  notifications: z.string().min(1).optional(),
});

export function evalCommand(): Command {
  const command = new Command('eval')
    .alias('e')
    .description('Evaluate cached query results with policy rules and send alerts')
    .addOption(new Option('-j, --job-id <id>', 'Job ID').env('BATCHWATCH_JOB_ID').makeOptionMandatory())
    .addOption(new Option('-r, --rules <file>', 'Policy rule file (JSON)').env('BATCHWATCH_RULES_FILE').makeOptionMandatory())
    .addOption(new Option('-n, --notifications <file>', 'Notification channel config (YAML)').env('BATCHWATCH_NOTIFICATIONS_FILE'));

  return addConnectionOptions(command).action(async (raw: unknown) => {
    const opts = parseOptions(evalOptionsSchema, raw);
    const policy = createRulePolicy(opts.rules);
    const notifConfig = loadNotificationConfig(opts.notifications);

    const summary = await withRuntime(
      toConfigOverrides(opts),
      { job_id: opts.jobId, command: 'eval' },
      async (runtime, log) => {
        const ctx = createJobContext(opts.jobId, shutdown.signal);
        const cache = await runtime.openCache();

        log.info(
          { rules: policy.size, channels: { log: notifConfig.log.enabled, redis: notifConfig.redis.enabled, slack: notifConfig.slack.enabled } },
          'Eval batchwatch job',
        );

        const notifier = createNotificationDispatcher(notifConfig, {
          log,
          redis: notifConfig.redis.enabled ? await runtime.getRedis() : undefined,
        });

        return evalAlerts(ctx, { cache, policy, notifier, log });
      },
    );

    process.stdout.write(`${JSON.stringify(summary)}\n`);
  });
}
