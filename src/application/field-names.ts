import { ConfigurationError } from '../domain/index.js';
import type { RawRecord } from '../domain/index.js';

/**
 * Canonical form of a user-supplied field name.
 *
 * camelCase boundaries become separators, everything is lower-cased and
 * each run of non-alphanumeric characters collapses to a single `_`:
 *
 *   "DateTime"      → "date_time"
 *   "Session ID"    → "session_id"
 *   "HTTPCode"      → "http_code"
 *   "2nd attempt"   → "x2nd_attempt"
 *
 * Idempotent: canonicalizing a canonical name returns it unchanged.
 */
export function canonicalizeFieldName(name: string): string {
  const snake = name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (snake === '') return 'x';
  return /^[0-9]/.test(snake) ? `x${snake}` : snake;
}

/**
 * Canonicalizes a column list, suffixing `_2`, `_3`, … onto names that
 * collide after canonicalization (first occurrence keeps the bare name).
 */
export function canonicalizeFieldNames(names: readonly string[]): string[] {
  const used = new Set<string>();

  return names.map((name) => {
    const base = canonicalizeFieldName(name);
    let candidate = base;
    let suffix = 1;
    while (used.has(candidate)) {
      suffix++;
      candidate = `${base}_${suffix}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/** Union of the keys of every row, in first-seen order. */
export function columnsOf(rows: readonly Readonly<Record<string, unknown>>[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return Array.from(seen);
}

export interface CanonicalBatch {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, unknown>>[];
}

/**
 * Re-keys every record by canonical column name.
 *
 * Columns are the union of all record keys; a key absent from a record
 * reads as `null` so every row carries the full column set.
 */
export function canonicalizeRecords(records: readonly RawRecord[]): CanonicalBatch {
  const original = columnsOf(records);
  const canonical = canonicalizeFieldNames(original);
  const pairs = original.map((name, i) => [name, canonical[i] ?? canonicalizeFieldName(name)] as const);

  const rows = records.map((record) => {
    const fields: Record<string, unknown> = {};
    for (const [name, column] of pairs) {
      fields[column] = Object.prototype.hasOwnProperty.call(record, name) ? record[name] : null;
    }
    return fields;
  });

  return { columns: canonical, rows };
}

/**
 * Resolves a user-supplied field name against canonical columns.
 *
 * @param role - human-readable purpose of the field, used in the error.
 * @throws ConfigurationError when no column matches.
 */
export function resolveField(columns: readonly string[], requested: string, role: string): string {
  const canonical = canonicalizeFieldName(requested);
  if (!columns.includes(canonical)) {
    throw new ConfigurationError(requested, canonical, role);
  }
  return canonical;
}
