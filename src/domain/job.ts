import { PipelineError } from './errors.js';

/** Opaque identifier scoping one Run/Eval cycle. Doubles as the cache partition key. */
export type JobId = string;

/**
 * Explicit per-invocation context threaded through Run and Eval.
 * `signal` governs cancellation of every external call made on behalf of the job.
 */
export interface JobContext {
  readonly jobId: JobId;
  readonly signal?: AbortSignal | undefined;
}

export function createJobContext(jobId: string, signal?: AbortSignal): JobContext {
  const trimmed = jobId.trim();
  if (trimmed === '') {
    throw new PipelineError('InvalidConfig', 'job id is required', { job_id: jobId });
  }
  return signal === undefined ? { jobId: trimmed } : { jobId: trimmed, signal };
}

export function isCancelled(ctx: JobContext): boolean {
  return ctx.signal?.aborted === true;
}

/** Throws `Cancelled` if the context's signal has fired. */
export function throwIfCancelled(ctx: JobContext): void {
  if (ctx.signal?.aborted === true) {
    throw new PipelineError(
      'Cancelled',
      'job cancelled',
      { job_id: ctx.jobId },
      { cause: ctx.signal.reason },
    );
  }
}
