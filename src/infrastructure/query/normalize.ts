import type { AttrValue, QueryRow } from '../../domain/index.js';
import { formatRfc3339, fromDate } from '../../domain/index.js';

/**
 * Converts a driver value into a JSON-safe dynamic value so the row can be
 * cached and re-read unchanged:
 * - Date   → RFC3339 string (UTC)
 * - bigint → decimal string
 * - Buffer → base64 string
 * - non-finite numbers → their string form
 * - arrays and plain objects recursively
 */
export function normalizeValue(value: unknown): AttrValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return String(value);
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatRfc3339(fromDate(value));
  }
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (Array.isArray(value)) return value.map(normalizeValue);

  const out: Record<string, AttrValue> = {};
  for (const [key, nested] of Object.entries(value)) {
    out[key] = normalizeValue(nested);
  }
  return out;
}

export function normalizeRow(row: Record<string, unknown>): QueryRow {
  const out: QueryRow = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = normalizeValue(value);
  }
  return out;
}
