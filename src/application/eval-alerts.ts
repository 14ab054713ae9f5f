import type { Logger } from 'pino';
import type {
  Alert,
  AlertBody,
  CacheEntry,
  IdGenerator,
  JobCache,
  JobContext,
  Notifier,
  PolicyService,
} from '../domain/index.js';
import {
  BatchFailedError,
  PipelineError,
  describeError,
  isPipelineError,
  newAlert,
  throwIfCancelled,
} from '../domain/index.js';

export interface EvalDeps {
  readonly cache: JobCache;
  readonly policy: PolicyService;
  readonly notifier: Notifier;
  readonly log: Logger;
  readonly ids?: IdGenerator | undefined;
  readonly now?: (() => number) | undefined;
}

export interface EvalSummary {
  readonly job_id: string;
  readonly entries: number;
  readonly alerts: number;
  readonly dispatched: number;
}

/**
 * Eval phase: policy over every cached result of a job, alerts out.
 *
 * Entries are consumed lazily from the cache and evaluated one at a time.
 * Policy, construction and dispatch failures are collected per item;
 * every alert is attempted before the batch reports. Queries are never re-run.
 */
export async function evalAlerts(ctx: JobContext, deps: EvalDeps): Promise<EvalSummary> {
  const log = deps.log.child({ job_id: ctx.jobId });

  throwIfCancelled(ctx);

  const failures: PipelineError[] = [];
  let entries = 0;
  let alerts = 0;
  let dispatched = 0;

  for await (const entry of deps.cache.entries(ctx.jobId)) {
    throwIfCancelled(ctx);
    entries++;

    const bodies = await evaluateEntry(ctx, deps, log, entry, failures);

    for (const body of bodies) {
      const alert = constructAlert(ctx, deps, entry, body, failures);
      if (alert === undefined) continue;
      alerts++;

      if (await dispatchAlert(ctx, deps, log, entry, alert, failures)) {
        dispatched++;
      }
    }
  }

  if (entries === 0) {
    throw new PipelineError('EmptyJobCache', 'no cached results for job', { job_id: ctx.jobId });
  }

  throwIfCancelled(ctx);

  if (failures.length > 0) {
    throw new BatchFailedError('eval', failures, { job_id: ctx.jobId });
  }

  log.info({ entries, alerts, dispatched }, 'Eval completed');

  return { job_id: ctx.jobId, entries, alerts, dispatched };
}

async function evaluateEntry(
  ctx: JobContext,
  deps: EvalDeps,
  log: Logger,
  entry: CacheEntry,
  failures: PipelineError[],
): Promise<AlertBody[]> {
  try {
    const bodies = await deps.policy.evaluate(entry, ctx.signal);
    log.debug({ task_id: entry.task_id, candidates: bodies.length }, 'Policy evaluated');
    return bodies;
  } catch (err: unknown) {
    throwIfCancelled(ctx);
    log.warn({ err, task_id: entry.task_id }, 'Policy evaluation failed');
    failures.push(
      new PipelineError(
        'PolicyEvaluationFailed',
        `policy failed for task "${entry.task_id}": ${describeError(err)}`,
        { job_id: ctx.jobId, task_id: entry.task_id },
        { cause: err },
      ),
    );
    return [];
  }
}

/** Returns undefined when the candidate is rejected. Non-pipeline faults propagate. */
function constructAlert(
  ctx: JobContext,
  deps: EvalDeps,
  entry: CacheEntry,
  body: AlertBody,
  failures: PipelineError[],
): Alert | undefined {
  try {
    return newAlert(ctx, body, { ids: deps.ids, now: deps.now });
  } catch (err: unknown) {
    if (!isPipelineError(err)) throw err;
    failures.push(
      new PipelineError(
        err.kind,
        err.message,
        { ...err.context, job_id: ctx.jobId, task_id: entry.task_id },
        { cause: err.cause },
      ),
    );
    return undefined;
  }
}

async function dispatchAlert(
  ctx: JobContext,
  deps: EvalDeps,
  log: Logger,
  entry: CacheEntry,
  alert: Alert,
  failures: PipelineError[],
): Promise<boolean> {
  try {
    await deps.notifier.notify(alert, ctx.signal);
    log.info({ alert_id: alert.id, task_id: entry.task_id, title: alert.title }, 'Alert dispatched');
    return true;
  } catch (err: unknown) {
    throwIfCancelled(ctx);
    log.warn({ err, alert_id: alert.id, task_id: entry.task_id }, 'Alert dispatch failed');
    failures.push(
      new PipelineError(
        'AlertDispatchFailed',
        `dispatch failed for alert "${alert.id}": ${describeError(err)}`,
        { job_id: ctx.jobId, task_id: entry.task_id, alert_id: alert.id },
        { cause: err },
      ),
    );
    return false;
  }
}
