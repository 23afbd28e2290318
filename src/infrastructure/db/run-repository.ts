import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { miningRuns } from './schema.js';

/** Row shape returned by run queries. */
export type RunRow = typeof miningRuns.$inferSelect;

export interface RunCounts {
  sequence_count: number;
  event_count: number;
  rule_count: number;
  /** Malformed engine rules, including any the drop policy removed. */
  malformed_count: number;
}

/** Inserts a new run in `queued` state. Server assigns run_id + created_at. */
export async function insertRun(db: Database, request: Record<string, unknown>): Promise<RunRow> {
  const [row] = await db.insert(miningRuns).values({
    run_id: randomUUID(),
    status: 'queued',
    request,
    created_at: new Date(),
  }).returning();

  if (row === undefined) {
    throw new Error('Insert into mining_runs returned no row');
  }
  return row;
}

export async function findRunById(db: Database, runId: string): Promise<RunRow | undefined> {
  const rows = await db.select().from(miningRuns).where(eq(miningRuns.run_id, runId)).limit(1);
  return rows[0];
}

/** Newest first. */
export async function findRuns(
  db: Database,
  pagination: { limit: number; offset: number },
): Promise<RunRow[]> {
  return db
    .select()
    .from(miningRuns)
    .orderBy(desc(miningRuns.created_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

export async function markRunRunning(db: Database, runId: string): Promise<void> {
  await db.update(miningRuns).set({
    status: 'running',
    started_at: new Date(),
    error: null,
  }).where(eq(miningRuns.run_id, runId));
}

export async function markRunSucceeded(db: Database, runId: string, counts: RunCounts): Promise<void> {
  await db.update(miningRuns).set({
    status: 'succeeded',
    ...counts,
    finished_at: new Date(),
  }).where(eq(miningRuns.run_id, runId));
}

/** Error messages are cut to the column width. */
export async function markRunFailed(db: Database, runId: string, error: string): Promise<void> {
  await db.update(miningRuns).set({
    status: 'failed',
    error: error.slice(0, 1024),
    finished_at: new Date(),
  }).where(eq(miningRuns.run_id, runId));
}
