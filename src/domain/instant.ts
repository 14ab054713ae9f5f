/**
 * Absolute point in time with nanosecond precision.
 *
 * `Date` only carries milliseconds, which loses the fractional part of
 * float Unix timestamps, so alerts keep whole seconds and nanoseconds apart.
 * Invariant: 0 <= nanos < 1e9.
 */
export interface Instant {
  readonly seconds: number;
  readonly nanos: number;
}

const NANOS_PER_SECOND = 1_000_000_000;
const SECONDS_PER_DAY = 86_400;

const RFC3339_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/** Days since 1970-01-01 for a proleptic Gregorian civil date. */
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const doy = Math.floor((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146_097 + doe - 719_468;
}

function civilFromDays(days: number): { year: number; month: number; day: number } {
  const z = days + 719_468;
  const era = Math.floor(z / 146_097);
  const doe = z - era * 146_097;
  const yoe = Math.floor(
    (doe - Math.floor(doe / 1460) + Math.floor(doe / 36_524) - Math.floor(doe / 146_096)) / 365,
  );
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp + (mp < 10 ? 3 : -9);
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Builds an instant from Unix seconds and a nanosecond offset, normalizing overflow. */
export function fromUnix(seconds: number, nanos: number = 0): Instant {
  const carry = Math.floor(nanos / NANOS_PER_SECOND);
  return {
    seconds: seconds + carry,
    nanos: nanos - carry * NANOS_PER_SECOND,
  };
}

/** Splits float Unix seconds into whole seconds and truncated nanoseconds. */
export function fromFloatSeconds(value: number): Instant {
  const seconds = Math.floor(value);
  return fromUnix(seconds, Math.trunc((value - seconds) * NANOS_PER_SECOND));
}

export function fromMillis(ms: number): Instant {
  const seconds = Math.floor(ms / 1000);
  return { seconds, nanos: (ms - seconds * 1000) * 1_000_000 };
}

export function fromDate(date: Date): Instant {
  return fromMillis(date.getTime());
}

export function toDate(instant: Instant): Date {
  return new Date(instant.seconds * 1000 + Math.floor(instant.nanos / 1_000_000));
}

/** 0001-01-01T00:00:00Z, used by producers as a "no time" marker. */
export const NULL_INSTANT: Instant = { seconds: daysFromCivil(1, 1, 1) * SECONDS_PER_DAY, nanos: 0 };

export function isNullInstant(instant: Instant): boolean {
  return instant.seconds === NULL_INSTANT.seconds && instant.nanos === 0;
}

export function compareInstants(a: Instant, b: Instant): number {
  if (a.seconds !== b.seconds) return a.seconds < b.seconds ? -1 : 1;
  if (a.nanos !== b.nanos) return a.nanos < b.nanos ? -1 : 1;
  return 0;
}

/**
 * Strict RFC3339 parse. Accepts fractional seconds (truncated to nanoseconds)
 * and numeric offsets; rejects out-of-range calendar fields.
 * Returns null when `value` is not a valid RFC3339 timestamp.
 */
export function parseRfc3339(value: string): Instant | null {
  const m = RFC3339_RE.exec(value);
  if (m === null) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4]);
  const minute = Number(m[5]);
  const second = Number(m[6]);
  const fraction = m[7];

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetSeconds = 0;
  if (m[8] === undefined) {
    const offsetHours = Number(m[10]);
    const offsetMinutes = Number(m[11]);
    if (offsetHours > 23 || offsetMinutes > 59) return null;
    const sign = m[9] === '-' ? -1 : 1;
    offsetSeconds = sign * (offsetHours * 3600 + offsetMinutes * 60);
  }

  const nanos = fraction === undefined ? 0 : Number(fraction.slice(0, 9).padEnd(9, '0'));
  const seconds =
    daysFromCivil(year, month, day) * SECONDS_PER_DAY + hour * 3600 + minute * 60 + second - offsetSeconds;

  return { seconds, nanos };
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/** RFC3339 in UTC with nanoseconds, trailing fractional zeros trimmed. */
export function formatRfc3339(instant: Instant): string {
  const days = Math.floor(instant.seconds / SECONDS_PER_DAY);
  const secOfDay = instant.seconds - days * SECONDS_PER_DAY;
  const { year, month, day } = civilFromDays(days);

  const hh = Math.floor(secOfDay / 3600);
  const mm = Math.floor((secOfDay % 3600) / 60);
  const ss = secOfDay % 60;

  const base = `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}T${pad(hh, 2)}:${pad(mm, 2)}:${pad(ss, 2)}`;
  if (instant.nanos === 0) return `${base}Z`;

  const fraction = pad(instant.nanos, 9).replace(/0+$/, '');
  return `${base}.${fraction}Z`;
}
