export type {
  RawRecord,
  SessionKey,
  NormalizedRecord,
  FieldNames,
  RecordFilter,
} from './event-record.js';
export type {
  EncodedEvent,
  EncodedTransaction,
  EncodedTransactionSet,
  SessionMapping,
  SymbolCode,
} from './transaction.js';
export type {
  RankMetric,
  MinedRule,
  DecomposedRule,
  DecomposedRuleTable,
  MalformedRuleWarning,
} from './mined-rule.js';
export { RANK_METRICS } from './mined-rule.js';
export {
  PipelineError,
  ConfigurationError,
  ParseError,
  InvariantViolationError,
} from './errors.js';
export type { PipelineErrorCode } from './errors.js';
