import { ParseError } from '../domain/index.js';
import type { NormalizedRecord, RawRecord } from '../domain/index.js';
import { canonicalizeRecords, resolveField } from './field-names.js';
import { parseTimestamp, DEFAULT_FRACTIONAL_DIGITS } from './timestamp.js';
import type { FractionalDigits } from './timestamp.js';
import { sortBySessionAndTime, toSessionKey } from './session-order.js';

export interface NormalizeOptions {
  /** Sub-second digits kept from parsed timestamps (default 3). */
  fractionalDigits?: FractionalDigits;
}

/**
 * Temporal normalization of raw interaction records.
 *
 * 1. Re-keys every record by canonical field name.
 * 2. Resolves the session-key and timestamp fields.
 * 3. Parses timestamps (failure → ParseError with the record position).
 * 4. Sorts by (session_key, timestamp), stable on ties.
 * 5. Computes `time_diff` in seconds within each session.
 *
 * Returns a new array; the input records are not touched. An empty batch
 * has no columns to resolve against and normalizes to an empty list.
 */
export function normalize(
  records: readonly RawRecord[],
  sessionKeyField: string,
  timestampField: string,
  options: NormalizeOptions = {},
): NormalizedRecord[] {
  if (records.length === 0) return [];

  const { columns, rows } = canonicalizeRecords(records);
  const sessionColumn = resolveField(columns, sessionKeyField, 'session key');
  const timestampColumn = resolveField(columns, timestampField, 'timestamp');
  const fractionalDigits = options.fractionalDigits ?? DEFAULT_FRACTIONAL_DIGITS;

  const parsed = rows.map((fields, position) => {
    const raw = fields[timestampColumn];
    const timestamp_ms = parseTimestamp(raw, fractionalDigits);
    if (timestamp_ms === null) {
      throw new ParseError(position, timestampField, raw ?? null, `cannot parse ${describe(raw)} as a timestamp`);
    }
    return {
      position,
      fields,
      session_key: toSessionKey(fields[sessionColumn], position, sessionKeyField),
      timestamp_ms,
    };
  });

  const sorted = sortBySessionAndTime(parsed);

  return sorted.map((record, i): NormalizedRecord => {
    const previous = i > 0 ? sorted[i - 1] : undefined;
    const time_diff = previous !== undefined && previous.session_key === record.session_key
      ? (record.timestamp_ms - previous.timestamp_ms) / 1000
      : null;

    return { ...record, time_diff };
  });
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}
