import { Command, Option } from 'commander';
import { z } from 'zod';
import { createJobContext } from '../../domain/index.js';
import { addConnectionOptions, connectionOptionsSchema, parseOptions, toConfigOverrides } from './options.js';
import { withRuntime } from './context.js';

const clearOptionsSchema = connectionOptionsSchema.extend({
  jobId: z.string().min(1),
});

/** Drops a job's cache partition so its Run can be redone. */
export function clearCommand(): Command {
  const command = new Command('clear')
    .description("Delete a job's cached query results")
    .addOption(new Option('-j, --job-id <id>', 'Job ID').env('BATCHWATCH_JOB_ID').makeOptionMandatory());

  return addConnectionOptions(command).action(async (raw: unknown) => {
    const opts = parseOptions(clearOptionsSchema, raw);

    await withRuntime(toConfigOverrides(opts), { job_id: opts.jobId, command: 'clear' }, async (runtime, log) => {
      const ctx = createJobContext(opts.jobId);
      const cache = await runtime.openCache();
      await cache.clear(ctx.jobId);
      log.info('Job cache cleared');
    });
  });
}
