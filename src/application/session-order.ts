import { ParseError } from '../domain/index.js';
import type { SessionKey } from '../domain/index.js';

/**
 * Reads a session key out of a field value.
 *
 * Missing values group into the `null` session. Objects, arrays and
 * non-finite numbers cannot identify a session.
 */
export function toSessionKey(value: unknown, position: number, field: string): SessionKey {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (Number.isFinite(value)) return value;
    throw new ParseError(position, field, value, `session key ${String(value)} is not a finite number`);
  }
  if (typeof value === 'bigint') return value.toString();
  throw new ParseError(position, field, value, 'session key must be a string, number or boolean');
}

function typeRank(key: SessionKey): number {
  if (key === null) return 3;
  switch (typeof key) {
    case 'boolean': return 0;
    case 'number': return 1;
    default: return 2;
  }
}

/**
 * Total order over session keys: booleans, numbers (numerically),
 * strings (by UTF-16 code unit), then `null`.
 */
export function compareSessionKeys(a: SessionKey, b: SessionKey): number {
  if (a === b) return 0;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return typeRank(a) - typeRank(b);
}

interface Sortable {
  readonly session_key: SessionKey;
  readonly timestamp_ms: number;
  readonly position: number;
}

/**
 * Sorts by `(session_key, timestamp)` ascending. Equal timestamps keep
 * input order via `position`, so the result does not depend on the order
 * the caller passed the items in.
 */
export function sortBySessionAndTime<T extends Sortable>(items: readonly T[]): T[] {
  return [...items].sort(
    (a, b) =>
      compareSessionKeys(a.session_key, b.session_key)
      || a.timestamp_ms - b.timestamp_ms
      || a.position - b.position,
  );
}
