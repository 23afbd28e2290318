import { describe, it, expect } from 'vitest';
import { formatRuleTableCsv } from '../../src/application/rule-csv.js';

describe('formatRuleTableCsv', () => {
  it('quotes strings, writes NA for a missing RHS and Inf for infinity', () => {
    const csv = formatRuleTableCsv({
      rows: [
        { LHS: '<click_A>', RHS: '<click_B>', support: 0.3, confidence: 0.6, lift: 1.2 },
        { LHS: 'say "hi"', RHS: null, support: 0.1, confidence: 1, lift: Infinity },
      ],
      warnings: [{ position: 1, rule: 'say "hi"', separator_count: 0 }],
    });

    expect(csv).toBe(
      '"LHS","RHS","support","confidence","lift"\n'
      + '"<click_A>","<click_B>",0.3,0.6,1.2\n'
      + '"say ""hi""",NA,0.1,1,Inf\n',
    );
  });

  it('writes only the header for an empty table', () => {
    expect(formatRuleTableCsv({ rows: [], warnings: [] })).toBe('"LHS","RHS","support","confidence","lift"\n');
  });

  it('writes -Inf and NaN as-is', () => {
    const csv = formatRuleTableCsv({
      rows: [{ LHS: 'a', RHS: 'b', support: Number.NaN, confidence: 0, lift: -Infinity }],
      warnings: [],
    });
    expect(csv.split('\n')[1]).toBe('"a","b",NaN,0,-Inf');
  });
});
