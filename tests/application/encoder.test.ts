import { describe, it, expect } from 'vitest';
import { normalize } from '../../src/application/normalizer.js';
import { countEvents, encode } from '../../src/application/encoder.js';
import { sanitizeSymbol } from '../../src/application/symbols.js';
import { ParseError } from '../../src/domain/index.js';
import { SCENARIO_RECORDS } from '../helpers.js';

function encodeRaw(records: Parameters<typeof normalize>[0]) {
  return encode(normalize(records, 'Session', 'Time'), 'Session', 'Action');
}

describe('encode', () => {
  it('produces one transaction per session with contiguous event ids', () => {
    const set = encodeRaw(SCENARIO_RECORDS);

    expect(set.transactions).toEqual([
      {
        sequence_id: 1,
        events: [
          { event_id: 1, symbol: 'click_A' },
          { event_id: 2, symbol: 'click_B' },
        ],
      },
      { sequence_id: 2, events: [{ event_id: 1, symbol: 'scroll' }] },
    ]);
  });

  it('maps session keys to dense sequence ids in sorted key order', () => {
    const set = encodeRaw(SCENARIO_RECORDS);

    expect(set.sessions).toEqual([
      { session_key: 'S1', sequence_id: 1 },
      { session_key: 'S2', sequence_id: 2 },
    ]);
  });

  it('builds a 1-based symbol code table in code-unit order', () => {
    const set = encodeRaw(SCENARIO_RECORDS);

    expect(set.symbols).toEqual([
      { symbol: 'click_A', code: 1 },
      { symbol: 'click_B', code: 2 },
      { symbol: 'scroll', code: 3 },
    ]);
  });

  it('gives the same result regardless of the order of the normalized input', () => {
    const normalized = normalize(SCENARIO_RECORDS, 'Session', 'Time');
    const reversed = [...normalized].reverse();

    expect(encode(reversed, 'Session', 'Action')).toEqual(encode(normalized, 'Session', 'Action'));
  });

  it('merges labels that differ only in whitespace into one symbol', () => {
    const set = encodeRaw([
      { Session: 'S1', Time: '2024-01-01 10:00:00', Action: 'open  menu' },
      { Session: 'S1', Time: '2024-01-01 10:00:01', Action: 'open\tmenu' },
    ]);

    expect(set.transactions[0]?.events.map((e) => e.symbol)).toEqual(['open_menu', 'open_menu']);
    expect(set.symbols).toEqual([{ symbol: 'open_menu', code: 1 }]);
  });

  it('stringifies numeric action labels', () => {
    const set = encodeRaw([{ Session: 'S1', Time: '2024-01-01 10:00:00', Action: 404 }]);
    expect(set.symbols).toEqual([{ symbol: '404', code: 1 }]);
  });

  it('returns an empty set for no records', () => {
    expect(encode([], 'Session', 'Action')).toEqual({ transactions: [], sessions: [], symbols: [] });
  });

  it('rejects an empty action label with the record position', () => {
    const records = [
      { Session: 'S1', Time: '2024-01-01 10:00:00', Action: 'view' },
      { Session: 'S1', Time: '2024-01-01 10:00:01', Action: '' },
    ];

    expect(() => encodeRaw(records)).toThrow(new ParseError(1, 'Action', '', 'action label is empty'));
  });

  it('throws ConfigurationError for an unknown action field', () => {
    const normalized = normalize(SCENARIO_RECORDS, 'Session', 'Time');
    expect(() => encode(normalized, 'Session', 'Verb')).toThrow(
      'Unknown action field "Verb" (looked up as "verb")',
    );
  });

  it('counts events across transactions', () => {
    expect(countEvents(encodeRaw(SCENARIO_RECORDS))).toBe(3);
  });
});

describe('sanitizeSymbol', () => {
  it('is idempotent', () => {
    const once = sanitizeSymbol(' add  to\ncart ');
    expect(once).toBe('_add_to_cart_');
    expect(sanitizeSymbol(once)).toBe(once);
  });
});
