import { BatchFailedError, isPipelineError } from '../../domain/index.js';

const CONTEXT_KEYS = ['task_id', 'alert_id', 'timestamp'] as const;

function describeContext(context: Readonly<Record<string, unknown>>): string {
  const parts: string[] = [];
  for (const key of CONTEXT_KEYS) {
    const value = context[key];
    if (value !== undefined) parts.push(`${key}=${JSON.stringify(value)}`);
  }
  return parts.length === 0 ? '' : ` (${parts.join(', ')})`;
}

/**
 * Renders an error for the terminal: one headline, then one line per
 * failed item for batch errors.
 */
export function formatError(err: unknown): string[] {
  if (err instanceof BatchFailedError) {
    return [
      `error: ${err.message}`,
      ...err.failures.map((f) => `  - [${f.kind}] ${f.message}${describeContext(f.context)}`),
    ];
  }
  if (isPipelineError(err)) {
    return [`error: [${err.kind}] ${err.message}${describeContext(err.context)}`];
  }
  if (err instanceof Error) {
    return [`error: ${err.message}`];
  }
  return [`error: ${String(err)}`];
}
