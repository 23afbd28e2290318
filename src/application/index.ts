export {
  canonicalizeFieldName,
  canonicalizeFieldNames,
  canonicalizeRecords,
  columnsOf,
  resolveField,
} from './field-names.js';
export { parseTimestamp, DEFAULT_FRACTIONAL_DIGITS } from './timestamp.js';
export type { FractionalDigits } from './timestamp.js';
export { compareSessionKeys, sortBySessionAndTime, toSessionKey } from './session-order.js';
export { normalize } from './normalizer.js';
export type { NormalizeOptions } from './normalizer.js';
export { sanitizeSymbol, toActionLabel, buildSymbolCodes, SYMBOL_JOINER } from './symbols.js';
export { encode, countEvents } from './encoder.js';
export { decompose, splitRule, topK, dropMalformed, RULE_SEPARATOR } from './decomposer.js';
export type { TopKOptions } from './decomposer.js';
export { formatRuleTableCsv } from './rule-csv.js';
export {
  miningParamsSchema,
  miningParamsOverrideSchema,
  normalizeRequestSchema,
  encodeRequestSchema,
  runRequestSchema,
  decomposeRequestSchema,
  minedRuleSchema,
  rankMetricSchema,
} from './mining-schema.js';
export type { MiningParams, MiningParamsOverride, RunRequest, MalformedRulePolicy } from './mining-schema.js';
export type { SequenceMiner } from './miner.js';
export { resolveRunSettings } from './run-settings.js';
export type { MiningDefaults, RunSettings, RunSettingsResult } from './run-settings.js';
export { selectRecords, prepareTransactions, mineRules, runPipeline } from './pipeline.js';
export type { PipelineLog, PrepareOptions, PreparedTransactions, MineOptions, MinedRuleTable, PipelineResult } from './pipeline.js';
export { executeRun } from './run-executor.js';
export type { RunExecutionDeps, RunOutcome } from './run-executor.js';
export { submitRun, getRun, listRuns, getRunRules, toRuleTable } from './run-service.js';
export type { ListRunsParams, RunRulesParams } from './run-service.js';
