import type Redis from 'ioredis';
import type { DecomposedRuleTable, MalformedRuleWarning, RankMetric } from '../domain/index.js';
import type { Database, RunRow, RuleRowRecord } from '../infrastructure/db/index.js';
import {
  insertRun,
  findRunById,
  findRuns,
  findRuleRows,
  markRunFailed,
} from '../infrastructure/db/index.js';
import { enqueueRun } from '../infrastructure/redis/index.js';
import { topK } from './decomposer.js';
import type { RunRequest } from './mining-schema.js';

export type { RunRow };

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * Use case: store a validated run request and queue it for the worker.
 *
 * If queueing fails the run is marked failed before the error propagates,
 * so no run stays `queued` without a stream entry.
 */
export async function submitRun(db: Database, redis: Redis, request: RunRequest): Promise<RunRow> {
  const run = await insertRun(db, request);

  try {
    await enqueueRun(redis, run.run_id);
  } catch (err: unknown) {
    await markRunFailed(db, run.run_id, 'Could not queue run');
    throw err;
  }

  return run;
}

/** Fetch a single run by ID. Returns null if not found. */
export async function getRun(db: Database, runId: string): Promise<RunRow | null> {
  const row = await findRunById(db, runId);
  return row ?? null;
}

export interface ListRunsParams {
  limit?: number;
  offset?: number;
}

/**
 * Use case: list runs, newest first.
 * Clamps limit to [1, 100], defaults to 20.
 */
export async function listRuns(db: Database, params: ListRunsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const data = await findRuns(db, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/** Rebuilds a decomposed table from stored rows (already in position order). */
export function toRuleTable(rows: readonly RuleRowRecord[]): DecomposedRuleTable {
  const warnings: MalformedRuleWarning[] = [];

  const tableRows = rows.map((row, position) => {
    if (row.separator_count !== 1) {
      warnings.push({ position, rule: row.lhs, separator_count: row.separator_count });
    }
    return {
      LHS: row.lhs,
      RHS: row.rhs,
      support: row.support,
      confidence: row.confidence,
      lift: row.lift,
    };
  });

  return { rows: tableRows, warnings };
}

export interface RunRulesParams {
  top?: number;
  by?: RankMetric;
}

/**
 * Use case: the stored rule table of a run, optionally ranked top-K.
 * Returns null if the run does not exist.
 */
export async function getRunRules(
  db: Database,
  runId: string,
  params: RunRulesParams,
): Promise<DecomposedRuleTable | null> {
  const run = await findRunById(db, runId);
  if (run === undefined) return null;

  const table = toRuleTable(await findRuleRows(db, runId));
  if (params.top === undefined) return table;

  return topK(table, { by: params.by, k: params.top });
}
