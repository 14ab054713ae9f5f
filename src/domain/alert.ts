import type { JobContext, JobId } from './job.js';
import type { Instant } from './instant.js';
import { PipelineError, IdentifierSourceFault } from './errors.js';
import { fromFloatSeconds, fromMillis, fromUnix, isNullInstant, parseRfc3339, formatRfc3339 } from './instant.js';
import { uuidV7Generator } from './alert-id.js';
import type { AlertId, IdGenerator } from './alert-id.js';

/** Schema tag stamped on every alert. Consumers reject versions they do not know. */
export const ALERT_SCHEMA_VERSION = 'v0';

/** Closed dynamic-value union for open attribute maps and cached query rows. */
export type AttrValue =
  | string
  | number
  | boolean
  | null
  | AttrValue[]
  | { [key: string]: AttrValue };

export type Attrs = Record<string, AttrValue>;

function deepFreeze(value: AttrValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}

/** Returns a deep-frozen copy; the caller's map stays detached from the result. */
export function freezeAttrs(attrs: Attrs): Attrs {
  const copy = structuredClone(attrs);
  Object.values(copy).forEach(deepFreeze);
  return Object.freeze(copy);
}

/**
 * Unvalidated alert content as produced by policy evaluation.
 *
 * `timestamp` may be absent/null, an RFC3339 string, integer Unix seconds
 * or float Unix seconds with a fractional nanosecond part.
 */
export interface AlertBody {
  readonly title: string;
  readonly description?: string | undefined;
  readonly timestamp?: unknown;
  readonly attrs?: Attrs | undefined;
}

/**
 * Validated, addressable alert.
 *
 * `id` is assigned once at construction; the timestamp is always a concrete
 * instant. Instances are frozen.
 */
export interface Alert {
  readonly id: AlertId;
  readonly version: string;
  readonly job_id: JobId;
  readonly timestamp: Instant;
  readonly title: string;
  readonly description: string;
  readonly attrs: Attrs;
}

/** JSON wire shape of an Alert. `timestamp` is RFC3339 (UTC, nanoseconds). */
export interface AlertJson {
  readonly id: string;
  readonly version: string;
  readonly job_id: string;
  readonly timestamp: string;
  readonly title: string;
  readonly description: string;
  readonly attrs: Attrs;
}

/** Timestamp input decoded once into a tagged variant, never carried past construction. */
export type TimestampInput =
  | { readonly kind: 'absent' }
  | { readonly kind: 'rfc3339'; readonly value: string }
  | { readonly kind: 'int-seconds'; readonly value: number }
  | { readonly kind: 'float-seconds'; readonly value: number };

export function decodeTimestamp(raw: unknown): TimestampInput {
  if (raw === undefined || raw === null) return { kind: 'absent' };
  if (typeof raw === 'string') return { kind: 'rfc3339', value: raw };
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return Number.isInteger(raw)
      ? { kind: 'int-seconds', value: raw }
      : { kind: 'float-seconds', value: raw };
  }
  throw new PipelineError('UnsupportedTimestampType', 'unsupported timestamp type', {
    timestamp: raw,
    type: Array.isArray(raw) ? 'array' : typeof raw,
  });
}

function resolveTimestamp(input: TimestampInput, now: () => number): Instant {
  switch (input.kind) {
    case 'absent':
      return fromMillis(now());
    case 'rfc3339': {
      const parsed = parseRfc3339(input.value);
      if (parsed === null) {
        throw new PipelineError('MalformedTimestamp', 'fail to parse timestamp', {
          timestamp: input.value,
        });
      }
      return parsed;
    }
    case 'int-seconds':
      return fromUnix(input.value, 0);
    case 'float-seconds':
      return fromFloatSeconds(input.value);
  }
}

export interface NewAlertOptions {
  readonly ids?: IdGenerator | undefined;
  /** Wall clock in epoch milliseconds. Injectable for tests. */
  readonly now?: (() => number) | undefined;
}

/**
 * Builds an Alert from a policy candidate.
 *
 * Title is validated before anything else, so an empty title always fails
 * with MissingTitle whatever the other fields hold.
 */
export function newAlert(ctx: JobContext, body: AlertBody, options: NewAlertOptions = {}): Alert {
  const now = options.now ?? Date.now;
  const ids = options.ids ?? uuidV7Generator;

  if (body.title === '') {
    throw new PipelineError('MissingTitle', 'title is required', { job_id: ctx.jobId });
  }

  let timestamp = resolveTimestamp(decodeTimestamp(body.timestamp), now);
  if (isNullInstant(timestamp)) {
    timestamp = fromMillis(now());
  }

  let id: AlertId;
  try {
    id = ids.next();
  } catch (err: unknown) {
    throw new IdentifierSourceFault({ cause: err });
  }

  return Object.freeze({
    id,
    version: ALERT_SCHEMA_VERSION,
    job_id: ctx.jobId,
    timestamp,
    title: body.title,
    description: body.description ?? '',
    attrs: freezeAttrs(body.attrs ?? {}),
  });
}

export function toAlertJson(alert: Alert): AlertJson {
  return {
    id: alert.id,
    version: alert.version,
    job_id: alert.job_id,
    timestamp: formatRfc3339(alert.timestamp),
    title: alert.title,
    description: alert.description,
    attrs: alert.attrs,
  };
}
