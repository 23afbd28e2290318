import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

export type RunStatus = 'queued' | 'running' | 'succeeded' | 'failed';

/**
 * Drizzle schema for the `mining_runs` table.
 *
 * `request` holds the validated POST body verbatim; the worker re-validates
 * it before execution. Counts stay null until the run succeeds.
 */
export const miningRuns = pgTable('mining_runs', {
  run_id: uuid('run_id').primaryKey(),
  status: varchar('status', { length: 20 }).$type<RunStatus>().notNull(),
  request: jsonb('request').$type<Record<string, unknown>>().notNull(),
  sequence_count: integer('sequence_count'),
  event_count: integer('event_count'),
  rule_count: integer('rule_count'),
  malformed_count: integer('malformed_count'),
  error: varchar('error', { length: 1024 }),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  started_at: timestamp('started_at', { withTimezone: true }),
  finished_at: timestamp('finished_at', { withTimezone: true }),
}, (table) => [
  index('idx_mining_runs_status').on(table.status),
  index('idx_mining_runs_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `mined_rules` table: one decomposed rule per row.
 *
 * `position` preserves the engine's output order so stable ranking can be
 * reproduced on read. `separator_count` ≠ 1 marks a malformed rule.
 */
export const minedRules = pgTable('mined_rules', {
  run_id: uuid('run_id').notNull(),
  position: integer('position').notNull(),
  lhs: text('lhs').notNull(),
  rhs: text('rhs'),
  separator_count: integer('separator_count').notNull(),
  support: doublePrecision('support').notNull(),
  confidence: doublePrecision('confidence').notNull(),
  lift: doublePrecision('lift').notNull(),
}, (table) => [
  primaryKey({ columns: [table.run_id, table.position] }),
  index('idx_mined_rules_run_id').on(table.run_id),
]);
