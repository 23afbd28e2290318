import { describe, it, expect, vi, beforeEach } from 'vitest';
import type Redis from 'ioredis';

vi.mock('../../src/infrastructure/db/index.js', () => ({
  insertRun: vi.fn(),
  findRunById: vi.fn(),
  findRuns: vi.fn(),
  findRuleRows: vi.fn(),
  markRunFailed: vi.fn(),
}));

vi.mock('../../src/infrastructure/redis/index.js', () => ({
  enqueueRun: vi.fn(),
}));

import {
  submitRun,
  getRun,
  listRuns,
  getRunRules,
  toRuleTable,
} from '../../src/application/run-service.js';
import type { RunRow } from '../../src/application/run-service.js';
import {
  insertRun,
  findRunById,
  findRuns,
  findRuleRows,
  markRunFailed,
} from '../../src/infrastructure/db/index.js';
import type { RuleRowRecord } from '../../src/infrastructure/db/index.js';
import { enqueueRun } from '../../src/infrastructure/redis/index.js';
import { SCENARIO_RECORDS } from '../helpers.js';

const mockInsertRun = vi.mocked(insertRun);
const mockFindRunById = vi.mocked(findRunById);
const mockFindRuns = vi.mocked(findRuns);
const mockFindRuleRows = vi.mocked(findRuleRows);
const mockMarkRunFailed = vi.mocked(markRunFailed);
const mockEnqueueRun = vi.mocked(enqueueRun);

const db = {} as Parameters<typeof submitRun>[0];
const redis = {} as Redis;

const RUN_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';

const SAMPLE_RUN: RunRow = {
  run_id: RUN_ID,
  status: 'queued',
  request: { records: SCENARIO_RECORDS },
  sequence_count: null,
  event_count: null,
  rule_count: null,
  malformed_count: null,
  error: null,
  created_at: new Date('2026-01-05T12:00:00Z'),
  started_at: null,
  finished_at: null,
};

function ruleRow(position: number, lhs: string, rhs: string | null, lift: number): RuleRowRecord {
  return {
    run_id: RUN_ID,
    position,
    lhs,
    rhs,
    separator_count: rhs === null ? 0 : 1,
    support: 0.25,
    confidence: 0.5,
    lift,
  };
}

const STORED_RULES = [
  ruleRow(0, '<a>', '<b>', 1.5),
  ruleRow(1, 'broken', null, 4),
  ruleRow(2, '<c>', '<d>', 2),
];

beforeEach(() => {
  vi.clearAllMocks();
  mockFindRuns.mockResolvedValue([]);
});

// ─── submitRun ───────────────────────────────────────────────

describe('submitRun', () => {
  it('stores the request and queues the run id', async () => {
    mockInsertRun.mockResolvedValue(SAMPLE_RUN);
    mockEnqueueRun.mockResolvedValue('1-0');
    const request = { records: [...SCENARIO_RECORDS] };

    const run = await submitRun(db, redis, request);

    expect(run).toBe(SAMPLE_RUN);
    expect(mockInsertRun).toHaveBeenCalledWith(db, request);
    expect(mockEnqueueRun).toHaveBeenCalledWith(redis, RUN_ID);
    expect(mockMarkRunFailed).not.toHaveBeenCalled();
  });

  it('marks the run failed and rethrows when queueing fails', async () => {
    mockInsertRun.mockResolvedValue(SAMPLE_RUN);
    mockEnqueueRun.mockRejectedValue(new Error('READONLY'));
    mockMarkRunFailed.mockResolvedValue(undefined);

    await expect(submitRun(db, redis, { records: [...SCENARIO_RECORDS] })).rejects.toThrow('READONLY');
    expect(mockMarkRunFailed).toHaveBeenCalledWith(db, RUN_ID, 'Could not queue run');
  });
});

// ─── getRun ──────────────────────────────────────────────────

describe('getRun', () => {
  it('returns the run when found', async () => {
    mockFindRunById.mockResolvedValue(SAMPLE_RUN);
    expect(await getRun(db, RUN_ID)).toBe(SAMPLE_RUN);
  });

  it('returns null when not found', async () => {
    mockFindRunById.mockResolvedValue(undefined);
    expect(await getRun(db, RUN_ID)).toBeNull();
  });
});

// ─── listRuns ────────────────────────────────────────────────

describe('listRuns', () => {
  it('uses default limit=20, offset=0', async () => {
    await listRuns(db, {});
    expect(mockFindRuns).toHaveBeenCalledWith(db, { limit: 20, offset: 0 });
  });

  it('clamps limit to [1, 100] and offset to >= 0', async () => {
    await listRuns(db, { limit: 0, offset: -3 });
    expect(mockFindRuns).toHaveBeenLastCalledWith(db, { limit: 1, offset: 0 });

    await listRuns(db, { limit: 500 });
    expect(mockFindRuns).toHaveBeenLastCalledWith(db, { limit: 100, offset: 0 });
  });

  it('reports the page size in pagination', async () => {
    mockFindRuns.mockResolvedValue([SAMPLE_RUN]);

    const result = await listRuns(db, { limit: 10, offset: 30 });

    expect(result).toEqual({
      data: [SAMPLE_RUN],
      pagination: { limit: 10, offset: 30, count: 1 },
    });
  });
});

// ─── rules ───────────────────────────────────────────────────

describe('toRuleTable', () => {
  it('rebuilds rows and warnings from stored rows', () => {
    expect(toRuleTable(STORED_RULES)).toEqual({
      rows: [
        { LHS: '<a>', RHS: '<b>', support: 0.25, confidence: 0.5, lift: 1.5 },
        { LHS: 'broken', RHS: null, support: 0.25, confidence: 0.5, lift: 4 },
        { LHS: '<c>', RHS: '<d>', support: 0.25, confidence: 0.5, lift: 2 },
      ],
      warnings: [{ position: 1, rule: 'broken', separator_count: 0 }],
    });
  });
});

describe('getRunRules', () => {
  it('returns null for an unknown run', async () => {
    mockFindRunById.mockResolvedValue(undefined);

    expect(await getRunRules(db, RUN_ID, {})).toBeNull();
    expect(mockFindRuleRows).not.toHaveBeenCalled();
  });

  it('returns the full table in stored order without top', async () => {
    mockFindRunById.mockResolvedValue(SAMPLE_RUN);
    mockFindRuleRows.mockResolvedValue(STORED_RULES);

    const table = await getRunRules(db, RUN_ID, {});

    expect(table?.rows.map((r) => r.LHS)).toEqual(['<a>', 'broken', '<c>']);
  });

  it('ranks by lift and cuts to top rows', async () => {
    mockFindRunById.mockResolvedValue(SAMPLE_RUN);
    mockFindRuleRows.mockResolvedValue(STORED_RULES);

    const table = await getRunRules(db, RUN_ID, { top: 2 });

    expect(table?.rows.map((r) => r.LHS)).toEqual(['broken', '<c>']);
    expect(table?.warnings).toEqual([{ position: 0, rule: 'broken', separator_count: 0 }]);
  });

  it('ranks by the requested metric', async () => {
    mockFindRunById.mockResolvedValue(SAMPLE_RUN);
    mockFindRuleRows.mockResolvedValue([
      { ...ruleRow(0, '<a>', '<b>', 9), support: 0.1 },
      { ...ruleRow(1, '<c>', '<d>', 1), support: 0.9 },
    ]);

    const table = await getRunRules(db, RUN_ID, { top: 1, by: 'support' });

    expect(table?.rows.map((r) => r.LHS)).toEqual(['<c>']);
  });
});
