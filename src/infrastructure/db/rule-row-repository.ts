import { asc, eq } from 'drizzle-orm';
import type { DecomposedRuleTable } from '../../domain/index.js';
import type { Database } from './client.js';
import { minedRules } from './schema.js';

export type RuleRowRecord = typeof minedRules.$inferSelect;

// 8 bound parameters per row; stays well under the 65535 limit.
const INSERT_CHUNK = 1000;

/**
 * Replaces the stored rule table of a run.
 *
 * Runs in one transaction and deletes first, so a redelivered run never
 * leaves duplicate or partial tables behind.
 */
export async function replaceRuleRows(
  db: Database,
  runId: string,
  table: DecomposedRuleTable,
): Promise<void> {
  const separatorCounts = new Map(table.warnings.map((w) => [w.position, w.separator_count]));

  const values = table.rows.map((row, position) => ({
    run_id: runId,
    position,
    lhs: row.LHS,
    rhs: row.RHS,
    separator_count: separatorCounts.get(position) ?? 1,
    support: row.support,
    confidence: row.confidence,
    lift: row.lift,
  }));

  await db.transaction(async (tx) => {
    await tx.delete(minedRules).where(eq(minedRules.run_id, runId));
    for (let i = 0; i < values.length; i += INSERT_CHUNK) {
      await tx.insert(minedRules).values(values.slice(i, i + INSERT_CHUNK));
    }
  });
}

/** All rule rows of a run in engine output order. */
export async function findRuleRows(db: Database, runId: string): Promise<RuleRowRecord[]> {
  return db
    .select()
    .from(minedRules)
    .where(eq(minedRules.run_id, runId))
    .orderBy(asc(minedRules.position));
}
