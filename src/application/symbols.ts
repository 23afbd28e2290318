import { ParseError } from '../domain/index.js';
import type { SymbolCode } from '../domain/index.js';

/** Joins the words of a multi-word action label into one token. */
export const SYMBOL_JOINER = '_';

/**
 * Turns an action label into an atomic categorical symbol by replacing
 * every whitespace run with `_`. Labels that differ only in whitespace
 * map to the same symbol. Idempotent.
 */
export function sanitizeSymbol(label: string): string {
  return label.replace(/\s+/g, SYMBOL_JOINER);
}

/**
 * Reads an action label out of a field value. Numbers and booleans are
 * stringified; missing or empty labels cannot be encoded.
 */
export function toActionLabel(value: unknown, position: number, field: string): string {
  if (typeof value === 'string') {
    if (value === '') throw new ParseError(position, field, value, 'action label is empty');
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === undefined || value === null) {
    throw new ParseError(position, field, null, 'action label is missing');
  }
  throw new ParseError(position, field, value, 'action label must be a string, number or boolean');
}

/**
 * Dense 1-based code table for a set of symbols, ordered by UTF-16 code
 * unit so the same symbol set always yields the same codes.
 */
export function buildSymbolCodes(symbols: Iterable<string>): SymbolCode[] {
  return Array.from(new Set(symbols))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((symbol, i) => ({ symbol, code: i + 1 }));
}
