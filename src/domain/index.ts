export type { JobId, JobContext } from './job.js';
export { createJobContext, isCancelled, throwIfCancelled } from './job.js';
export type { Task, TaskId } from './task.js';
export { validateTasks, isValidTaskId } from './task.js';
export type { Target } from './target.js';
export { selectTasks, validateTarget, matchesTarget, isEmptyTarget } from './target.js';
export type { Instant } from './instant.js';
export {
  parseRfc3339,
  formatRfc3339,
  fromUnix,
  fromFloatSeconds,
  fromMillis,
  fromDate,
  toDate,
  compareInstants,
  NULL_INSTANT,
} from './instant.js';
export type { Alert, AlertBody, AlertJson, Attrs, AttrValue, TimestampInput, NewAlertOptions } from './alert.js';
export { newAlert, toAlertJson, decodeTimestamp, freezeAttrs, ALERT_SCHEMA_VERSION } from './alert.js';
export type { AlertId, IdGenerator } from './alert-id.js';
export { uuidV7Generator, sequentialIdGenerator } from './alert-id.js';
export type { CacheEntry, JobCache, QueryResult, QueryRow } from './cache.js';
export type { QueryService, QueryOptions, PolicyService, Notifier } from './capabilities.js';
export type { PipelineErrorKind, ErrorContext } from './errors.js';
export {
  PipelineError,
  BatchFailedError,
  IdentifierSourceFault,
  isPipelineError,
  describeError,
} from './errors.js';
