/**
 * Error taxonomy for the Run/Eval pipeline.
 *
 * Every failure the pipeline reports is a PipelineError carrying a `kind`
 * discriminant and a flat `context` record with the identifiers needed to act
 * on it (task_id, alert_id, the offending timestamp value, ...).
 */

export type PipelineErrorKind =
  | 'InvalidTarget'
  | 'NoTasksSelected'
  | 'InvalidTask'
  | 'DuplicateTaskId'
  | 'MissingTitle'
  | 'MalformedTimestamp'
  | 'UnsupportedTimestampType'
  | 'InvalidAlertBody'
  | 'UnsupportedAlertVersion'
  | 'DuplicateCacheKey'
  | 'CorruptCacheEntry'
  | 'EmptyJobCache'
  | 'TaskExecutionFailed'
  | 'PolicyEvaluationFailed'
  | 'AlertDispatchFailed'
  | 'InvalidConfig'
  | 'Cancelled'
  | 'BatchFailed';

export type ErrorContext = Readonly<Record<string, unknown>>;

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly context: ErrorContext;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
    this.context = context;
  }
}

/**
 * Aggregate error thrown once a batch has attempted every item.
 * `failures` keeps each per-item error in the order it was collected.
 */
export class BatchFailedError extends PipelineError {
  readonly phase: 'run' | 'eval';
  readonly failures: readonly PipelineError[];

  constructor(phase: 'run' | 'eval', failures: readonly PipelineError[], context: ErrorContext = {}) {
    super(
      'BatchFailed',
      `${phase} batch failed: ${failures.length} item(s) failed`,
      { ...context, failed: failures.length },
    );
    this.name = 'BatchFailedError';
    this.phase = phase;
    this.failures = failures;
  }
}

/**
 * Raised when the alert identifier source breaks (entropy or clock failure).
 *
 * Not a PipelineError: batch orchestrators only collect PipelineErrors,
 * so this always propagates and ends the process.
 */
export class IdentifierSourceFault extends Error {
  constructor(options?: { cause?: unknown }) {
    super('alert identifier source failed', options);
    this.name = 'IdentifierSourceFault';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/** Message of an unknown thrown value, for wrapping collaborator errors. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
