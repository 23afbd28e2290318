export { miningRuns, minedRules } from './schema.js';
export type { RunStatus } from './schema.js';
export { createDbClient, ensureTables, DEFAULT_DATABASE_URL } from './client.js';
export type { Database, Sql } from './client.js';
export {
  insertRun,
  findRunById,
  findRuns,
  markRunRunning,
  markRunSucceeded,
  markRunFailed,
} from './run-repository.js';
export type { RunRow, RunCounts } from './run-repository.js';
export { replaceRuleRows, findRuleRows } from './rule-row-repository.js';
export type { RuleRowRecord } from './rule-row-repository.js';
export { default as dbPlugin } from './db-plugin.js';
