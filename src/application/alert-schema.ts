import { z } from 'zod';
import type { Alert, AttrValue } from '../domain/index.js';
import { ALERT_SCHEMA_VERSION, PipelineError, freezeAttrs, parseRfc3339 } from '../domain/index.js';

/** Recursive dynamic value: scalars, arrays, and nested string-keyed maps. */
export const attrValueSchema: z.ZodType<AttrValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(attrValueSchema),
    z.record(z.string(), attrValueSchema),
  ]),
);

export const attrsSchema = z.record(z.string(), attrValueSchema);

/** Wire shape of a constructed alert as published to consumers. */
export const alertJsonSchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
  job_id: z.string().min(1),
  timestamp: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  attrs: attrsSchema.default({}),
});

/**
 * Decodes a published alert on the consumer side.
 * Unknown schema versions are rejected, never guessed at.
 */
export function decodeAlert(raw: unknown): Alert {
  const parsed = alertJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PipelineError('InvalidAlertBody', 'invalid alert', {
      issues: parsed.error.flatten(),
    });
  }

  const data = parsed.data;
  if (data.version !== ALERT_SCHEMA_VERSION) {
    throw new PipelineError('UnsupportedAlertVersion', `unsupported alert version "${data.version}"`, {
      alert_id: data.id,
      version: data.version,
      expected: ALERT_SCHEMA_VERSION,
    });
  }

  const timestamp = parseRfc3339(data.timestamp);
  if (timestamp === null) {
    throw new PipelineError('MalformedTimestamp', 'fail to parse timestamp', {
      alert_id: data.id,
      timestamp: data.timestamp,
    });
  }

  return Object.freeze({
    id: data.id,
    version: data.version,
    job_id: data.job_id,
    timestamp,
    title: data.title,
    description: data.description,
    attrs: freezeAttrs(data.attrs),
  });
}
