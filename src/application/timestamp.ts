/** Number of sub-second digits kept when parsing timestamps. */
export type FractionalDigits = 0 | 1 | 2 | 3;

export const DEFAULT_FRACTIONAL_DIGITS: FractionalDigits = 3;

// Y-M-D h:m:s[.fraction][zone]; date separators - / or .
const TIMESTAMP_RE =
  /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:T|\s+)(\d{1,2}):(\d{1,2}):(\d{1,2})(?:[.,](\d+))?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Parses a timestamp value into epoch milliseconds.
 *
 * Accepts valid `Date` instances, finite numbers (already epoch ms) and
 * date-time strings in year-month-day order. Strings without a zone are
 * read as UTC. Returns `null` for anything unparseable so the caller can
 * attach record context to the failure.
 */
export function parseTimestamp(
  value: unknown,
  fractionalDigits: FractionalDigits = DEFAULT_FRACTIONAL_DIGITS,
): number | null {
  let ms: number | null = null;

  if (value instanceof Date) {
    ms = value.getTime();
  } else if (typeof value === 'number') {
    ms = value;
  } else if (typeof value === 'string') {
    ms = parseTimestampString(value.trim());
  }

  if (ms === null || !Number.isFinite(ms)) return null;
  return truncate(ms, fractionalDigits);
}

function parseTimestampString(value: string): number | null {
  const match = TIMESTAMP_RE.exec(value);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const millis = fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, '0'));

  const offsetMinutes = parseZone(zone);
  if (offsetMinutes === null) return null;

  return utcMillis(year, month - 1, day, hour, minute, second, millis) - offsetMinutes * 60_000;
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not.
function utcMillis(
  year: number,
  monthIndex: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime();
}

/** Zone designator → offset from UTC in minutes; `undefined` means UTC. */
function parseZone(zone: string | undefined): number | null {
  if (zone === undefined || zone.toUpperCase() === 'Z') return 0;

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;

  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcMillis(year, month, 0)).getUTCDate();
}

function truncate(ms: number, fractionalDigits: FractionalDigits): number {
  const unit = 10 ** (3 - fractionalDigits);
  return Math.floor(ms / unit) * unit;
}
