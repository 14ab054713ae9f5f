#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './run-command.js';
import { evalCommand } from './eval-command.js';
import { clearCommand } from './clear-command.js';
import { watchCommand } from './watch-command.js';
import { shutdown } from './context.js';
import { formatError } from './report.js';

/**
 * batchwatch CLI.
 *
 *   run    query → cache   (per job)
 *   eval   cache → policy → alerts
 *   clear  drop a job's cache partition
 *   watch  print alerts published on Redis
 */
const program = new Command();

program
  .name('batchwatch')
  .description('Collect query results now, evaluate alert rules later')
  .version('0.1.0')
  .addCommand(runCommand())
  .addCommand(evalCommand())
  .addCommand(clearCommand())
  .addCommand(watchCommand());

// Graceful shutdown on SIGINT / SIGTERM: in-flight calls observe the signal
function stop(): void {
  shutdown.abort(new Error('interrupted'));
}

process.on('SIGINT', stop);
process.on('SIGTERM', stop);

program.parseAsync(process.argv).then(
  () => {
    process.exit(0);
  },
  (err: unknown) => {
    for (const line of formatError(err)) {
      console.error(line);
    }
    process.exit(1);
  },
);
