import type {
  DecomposedRuleTable,
  EncodedTransactionSet,
  FieldNames,
  NormalizedRecord,
  RawRecord,
  RecordFilter,
} from '../domain/index.js';
import { columnsOf, resolveField } from './field-names.js';
import { normalize } from './normalizer.js';
import { encode } from './encoder.js';
import { decompose, dropMalformed } from './decomposer.js';
import type { FractionalDigits } from './timestamp.js';
import type { SequenceMiner } from './miner.js';
import type { MalformedRulePolicy, MiningParams } from './mining-schema.js';
import type { RunSettings } from './run-settings.js';

/** Minimal structured logger accepted by the pipeline. */
export type PipelineLog = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
};

/**
 * Keeps the normalized records whose `filter.field` strictly equals
 * `filter.equals` (e.g. one experimental condition of a study).
 */
export function selectRecords(
  records: readonly NormalizedRecord[],
  filter: RecordFilter,
): NormalizedRecord[] {
  if (records.length === 0) return [];

  const column = resolveField(columnsOf(records.map((r) => r.fields)), filter.field, 'filter');
  return records.filter((record) => record.fields[column] === filter.equals);
}

export interface PrepareOptions {
  fields: FieldNames;
  filter?: RecordFilter | undefined;
  fractionalDigits?: FractionalDigits;
}

export interface PreparedTransactions {
  readonly normalized: readonly NormalizedRecord[];
  readonly transactions: EncodedTransactionSet;
}

/** normalize → (filter) → encode. */
export function prepareTransactions(
  records: readonly RawRecord[],
  options: PrepareOptions,
): PreparedTransactions {
  const normalized = normalize(records, options.fields.session_key, options.fields.timestamp, {
    fractionalDigits: options.fractionalDigits,
  });

  const selected = options.filter ? selectRecords(normalized, options.filter) : normalized;
  const transactions = encode(selected, options.fields.session_key, options.fields.action);

  return { normalized: selected, transactions };
}

export interface MineOptions {
  malformedRules: MalformedRulePolicy;
  log?: PipelineLog;
}

export interface MinedRuleTable {
  readonly table: DecomposedRuleTable;
  /** Malformed rules the engine returned, counted before the policy applies. */
  readonly malformedCount: number;
}

/**
 * Hands the transactions to the engine and decomposes what comes back.
 *
 * Each malformed rule is logged; with the `drop` policy those rows are
 * removed from the returned table.
 */
export async function mineRules(
  transactions: EncodedTransactionSet,
  params: MiningParams,
  miner: SequenceMiner,
  options: MineOptions,
): Promise<MinedRuleTable> {
  const rules = await miner.mine(transactions, params);
  const table = decompose(rules);

  options.log?.debug(
    { ruleCount: table.rows.length, malformedCount: table.warnings.length },
    'Rules decomposed',
  );

  for (const warning of table.warnings) {
    options.log?.warn(
      { position: warning.position, rule: warning.rule, separator_count: warning.separator_count },
      'Malformed rule: separator " => " not found exactly once',
    );
  }

  return {
    table: options.malformedRules === 'drop' ? dropMalformed(table) : table,
    malformedCount: table.warnings.length,
  };
}

export interface PipelineResult extends MinedRuleTable {
  readonly transactions: EncodedTransactionSet;
}

/**
 * Full pipeline for one batch: prepare, mine, decompose.
 *
 * An empty transaction set (e.g. the filter matched nothing) short-circuits
 * to an empty table without calling the engine.
 */
export async function runPipeline(
  records: readonly RawRecord[],
  settings: RunSettings,
  miner: SequenceMiner,
  log?: PipelineLog,
): Promise<PipelineResult> {
  const { transactions } = prepareTransactions(records, {
    fields: settings.fields,
    filter: settings.filter,
    fractionalDigits: settings.fractionalDigits,
  });

  if (transactions.transactions.length === 0) {
    log?.debug({}, 'No transactions to mine');
    return { transactions, table: { rows: [], warnings: [] }, malformedCount: 0 };
  }

  const mined = await mineRules(transactions, settings.params, miner, {
    malformedRules: settings.malformedRules,
    log,
  });

  return { transactions, ...mined };
}
