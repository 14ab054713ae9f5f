import type { Logger } from 'pino';
import type { JobCache, JobContext, QueryService, Target, Task, TaskId } from '../domain/index.js';
import {
  BatchFailedError,
  PipelineError,
  describeError,
  isCancelled,
  isPipelineError,
  selectTasks,
  throwIfCancelled,
  validateTarget,
} from '../domain/index.js';
import { forEachBounded } from './bounded.js';

export interface RunDeps {
  readonly query: QueryService;
  readonly cache: JobCache;
  readonly log: Logger;
}

export interface RunOptions {
  /** Max tasks in flight. Defaults to 1 (sequential). */
  readonly concurrency?: number | undefined;
  /** Per-query deadline in milliseconds. */
  readonly timeoutMs?: number | undefined;
}

export interface RunSummary {
  readonly job_id: string;
  readonly selected: readonly TaskId[];
  readonly succeeded: readonly TaskId[];
}

/**
 * Run phase: execute every selected task's query and cache its result.
 *
 * Order:
 * 1) Validate target, select tasks. Fail fast before any I/O.
 * 2) For each task: query → cache.put(jobId, taskId).
 * 3) Per-task failures are collected as TaskExecutionFailed; every task is attempted.
 * 4) Any failure → BatchFailed naming each failed task.
 *
 * Cancellation stops scheduling further tasks and fails the whole batch
 * with Cancelled, even when some results were already cached.
 */
export async function runTasks(
  ctx: JobContext,
  deps: RunDeps,
  tasks: readonly Task[],
  target: Target,
  options: RunOptions = {},
): Promise<RunSummary> {
  const log = deps.log.child({ job_id: ctx.jobId });

  validateTarget(target);
  const selected = selectTasks(tasks, target);

  if (selected.length === 0) {
    throw new PipelineError('NoTasksSelected', 'no tasks configured', {
      job_id: ctx.jobId,
      configured: tasks.length,
    });
  }

  throwIfCancelled(ctx);

  log.info(
    { selected: selected.map((t) => t.id), configured: tasks.length },
    'Running tasks',
  );

  const failures: PipelineError[] = [];
  const succeeded: TaskId[] = [];

  await forEachBounded(selected, options.concurrency ?? 1, async (task) => {
    if (isCancelled(ctx)) return;

    try {
      const result = await deps.query.execute(task, {
        signal: ctx.signal,
        timeoutMs: options.timeoutMs,
      });

      await deps.cache.put(ctx.jobId, task.id, result);
      succeeded.push(task.id);

      log.info({ task_id: task.id, rows: result.length }, 'Task result cached');
    } catch (err: unknown) {
      // Reported once as Cancelled after the pool drains
      if (isCancelled(ctx)) return;

      log.warn({ err, task_id: task.id }, 'Task failed');

      failures.push(
        new PipelineError(
          'TaskExecutionFailed',
          `task "${task.id}" failed: ${describeError(err)}`,
          isPipelineError(err)
            ? { job_id: ctx.jobId, task_id: task.id, cause_kind: err.kind }
            : { job_id: ctx.jobId, task_id: task.id },
          { cause: err },
        ),
      );
    }
  });

  throwIfCancelled(ctx);

  if (failures.length > 0) {
    throw new BatchFailedError('run', failures, { job_id: ctx.jobId });
  }

  log.info({ succeeded: succeeded.length }, 'Run completed');

  return {
    job_id: ctx.jobId,
    selected: selected.map((t) => t.id),
    succeeded,
  };
}
