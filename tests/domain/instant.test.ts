import { describe, it, expect } from 'vitest';
import {
  parseRfc3339,
  formatRfc3339,
  fromUnix,
  fromFloatSeconds,
  fromMillis,
  toDate,
  compareInstants,
  NULL_INSTANT,
} from '../../src/domain/instant.js';

describe('parseRfc3339', () => {
  it('parses a UTC timestamp', () => {
    expect(parseRfc3339('2024-01-02T03:04:05Z')).toEqual({ seconds: 1704164645, nanos: 0 });
  });

  it('applies numeric offsets', () => {
    expect(parseRfc3339('2024-01-02T07:04:05+04:00')).toEqual({ seconds: 1704164645, nanos: 0 });
    expect(parseRfc3339('2024-01-01T23:04:05-04:00')).toEqual({ seconds: 1704164645, nanos: 0 });
  });

  it('keeps fractional seconds as nanoseconds', () => {
    expect(parseRfc3339('2024-01-02T03:04:05.5Z')).toEqual({ seconds: 1704164645, nanos: 500000000 });
    expect(parseRfc3339('2024-01-02T03:04:05.123456789Z')).toEqual({ seconds: 1704164645, nanos: 123456789 });
  });

  it('truncates precision beyond nanoseconds', () => {
    expect(parseRfc3339('2024-01-02T03:04:05.1234567891Z')).toEqual({ seconds: 1704164645, nanos: 123456789 });
  });

  it('accepts a leap day', () => {
    expect(parseRfc3339('2024-02-29T00:00:00Z')).toEqual({ seconds: 1709164800, nanos: 0 });
  });

  it.each([
    'not-a-time',
    '',
    '2024-01-02',
    '2024-01-02T03:04:05',
    '2024-01-02 03:04:05Z',
    '2024-13-01T00:00:00Z',
    '2024-02-30T00:00:00Z',
    '2023-02-29T00:00:00Z',
    '2024-01-02T24:00:00Z',
    '2024-01-02T03:60:00Z',
    '2024-01-02T03:04:60Z',
    '2024-01-02T03:04:05+24:00',
    '2024-01-02T03:04:05.Z',
  ])('rejects %j', (value) => {
    expect(parseRfc3339(value)).toBeNull();
  });

  it('parses the null instant', () => {
    expect(parseRfc3339('0001-01-01T00:00:00Z')).toEqual(NULL_INSTANT);
    expect(NULL_INSTANT.seconds).toBe(-62135596800);
  });
});

describe('formatRfc3339', () => {
  it('omits the fraction for whole seconds', () => {
    expect(formatRfc3339({ seconds: 1704164645, nanos: 0 })).toBe('2024-01-02T03:04:05Z');
  });

  it('trims trailing zeros of the fraction', () => {
    expect(formatRfc3339({ seconds: 1704164645, nanos: 500000000 })).toBe('2024-01-02T03:04:05.5Z');
    expect(formatRfc3339({ seconds: 1704164645, nanos: 1 })).toBe('2024-01-02T03:04:05.000000001Z');
  });

  it('formats dates before the epoch', () => {
    expect(formatRfc3339(NULL_INSTANT)).toBe('0001-01-01T00:00:00Z');
    expect(formatRfc3339({ seconds: -1, nanos: 0 })).toBe('1969-12-31T23:59:59Z');
  });

  it('is the inverse of parseRfc3339 for UTC input', () => {
    const text = '2026-02-18T12:00:00.25Z';
    const parsed = parseRfc3339(text);
    expect(parsed).not.toBeNull();
    if (parsed !== null) expect(formatRfc3339(parsed)).toBe(text);
  });
});

describe('constructors', () => {
  it('fromUnix normalizes nanosecond overflow', () => {
    expect(fromUnix(10, 1_500_000_000)).toEqual({ seconds: 11, nanos: 500_000_000 });
    expect(fromUnix(10, -1)).toEqual({ seconds: 9, nanos: 999_999_999 });
  });

  it('fromFloatSeconds splits whole seconds and nanoseconds', () => {
    expect(fromFloatSeconds(1704165845.5)).toEqual({ seconds: 1704165845, nanos: 500_000_000 });
    expect(fromFloatSeconds(-1.5)).toEqual({ seconds: -2, nanos: 500_000_000 });
  });

  it('fromMillis keeps nanos non-negative', () => {
    expect(fromMillis(1500)).toEqual({ seconds: 1, nanos: 500_000_000 });
    expect(fromMillis(-1)).toEqual({ seconds: -1, nanos: 999_000_000 });
  });

  it('toDate drops sub-millisecond precision', () => {
    expect(toDate({ seconds: 1704164645, nanos: 500_999_999 }).toISOString()).toBe('2024-01-02T03:04:05.500Z');
  });
});

describe('compareInstants', () => {
  it('orders by seconds then nanos', () => {
    expect(compareInstants({ seconds: 1, nanos: 0 }, { seconds: 2, nanos: 0 })).toBe(-1);
    expect(compareInstants({ seconds: 2, nanos: 5 }, { seconds: 2, nanos: 1 })).toBe(1);
    expect(compareInstants({ seconds: 2, nanos: 5 }, { seconds: 2, nanos: 5 })).toBe(0);
  });
});
