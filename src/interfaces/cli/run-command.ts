import { Command, Option } from 'commander';
import { z } from 'zod';
import { runTasks } from '../../application/index.js';
import { createJobContext } from '../../domain/index.js';
import { PostgresQueryService, loadTasks } from '../../infrastructure/query/index.js';
import { addConnectionOptions, connectionOptionsSchema, listOption, parseOptions, toConfigOverrides } from './options.js';
import { shutdown, withRuntime } from './context.js';

const runOptionsSchema = connectionOptionsSchema.extend({
  jobId: z.string().min(1),
  queryDir: z.string().min(1),
  tag: listOption,
  id: listOption,
  concurrency: z.string().optional(),
  timeout: z.string().optional(),
});

export function runCommand(): Command {
  const command = new Command('run')
    .alias('r')
    .description('Run queries and save the results into the job cache')
    .addOption(new Option('-j, --job-id <id>', 'Job ID').env('BATCHWATCH_JOB_ID').makeOptionMandatory())
    .addOption(new Option('-d, --query-dir <dir>', 'Directory path of query files').env('BATCHWATCH_QUERY_DIR').makeOptionMandatory())
    .addOption(new Option('-t, --tag <tag...>', 'Filter tasks by tag').env('BATCHWATCH_TASK_TAG'))
    .addOption(new Option('-i, --id <id...>', 'Filter tasks by ID').env('BATCHWATCH_TASK_ID'))
    .addOption(new Option('--concurrency <n>', 'Max queries in flight [env: BATCHWATCH_CONCURRENCY]'))
    .addOption(new Option('--timeout <ms>', 'Per-query timeout in ms, 0 = none [env: BATCHWATCH_QUERY_TIMEOUT_MS]'));

  return addConnectionOptions(command).action(async (raw: unknown) => {
    const opts = parseOptions(runOptionsSchema, raw);
    const tasks = loadTasks(opts.queryDir);

    const summary = await withRuntime(
      {
        ...toConfigOverrides(opts),
        BATCHWATCH_CONCURRENCY: opts.concurrency,
        BATCHWATCH_QUERY_TIMEOUT_MS: opts.timeout,
      },
      { job_id: opts.jobId, command: 'run' },
      async (runtime, log) => {
        const ctx = createJobContext(opts.jobId, shutdown.signal);
        const cache = await runtime.openCache();
        const query = new PostgresQueryService(runtime.getDb().sql, log);

        log.info(
          { query_dir: opts.queryDir, tags: opts.tag, ids: opts.id, tasks: tasks.length },
          'Run batchwatch tasks',
        );

        return runTasks(
          ctx,
          { query, cache, log },
          tasks,
          { tags: opts.tag, ids: opts.id },
          {
            concurrency: runtime.config.concurrency,
            timeoutMs: runtime.config.queryTimeoutMs,
          },
        );
      },
    );

    process.stdout.write(`${JSON.stringify(summary)}\n`);
  });
}
