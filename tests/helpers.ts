import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { FieldNames, MinedRule, RawRecord } from '../src/domain/index.js';
import type { SequenceMiner } from '../src/application/miner.js';
import type { MiningDefaults } from '../src/application/run-settings.js';

/**
 * Three actions in two sessions; S2 happens earlier in the day but sorts
 * after S1 by session key.
 */
export const SCENARIO_RECORDS: readonly RawRecord[] = [
  { Session: 'S1', Time: '2024-01-01 10:00:00', Action: 'click A' },
  { Session: 'S1', Time: '2024-01-01 10:00:02', Action: 'click B' },
  { Session: 'S2', Time: '2024-01-01 09:00:00', Action: 'scroll' },
];

export const SCENARIO_FIELDS: FieldNames = {
  session_key: 'Session',
  action: 'Action',
  timestamp: 'Time',
};

/** Configured defaults pointing at the scenario's field names. */
export const SCENARIO_DEFAULTS: MiningDefaults = {
  fields: SCENARIO_FIELDS,
  mining: { min_support: 0.2, max_length: 4, min_gap: 1, max_gap: 2, min_confidence: 0.5 },
  output: { malformed_rules: 'keep', fractional_digits: 3, top_k: 5 },
};

export function makeRule(overrides: Partial<MinedRule> = {}): MinedRule {
  return {
    rule: overrides.rule ?? '<view> => <click>',
    support: overrides.support ?? 0.5,
    confidence: overrides.confidence ?? 0.8,
    lift: overrides.lift ?? 1.1,
  };
}

/** Miner stub resolving to a fixed rule list. */
export function fakeMiner(rules: readonly MinedRule[] = []) {
  const mine = vi.fn<SequenceMiner['mine']>().mockResolvedValue(rules);
  const miner: SequenceMiner = { mine };
  return { miner, mine };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}
