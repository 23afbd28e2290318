import type { Logger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import {
  findRunById,
  markRunRunning,
  markRunSucceeded,
  markRunFailed,
  replaceRuleRows,
} from '../infrastructure/db/index.js';
import { runRequestSchema } from './mining-schema.js';
import { resolveRunSettings } from './run-settings.js';
import type { MiningDefaults } from './run-settings.js';
import { runPipeline } from './pipeline.js';
import type { PipelineResult } from './pipeline.js';
import { countEvents } from './encoder.js';
import type { SequenceMiner } from './miner.js';

export interface RunExecutionDeps {
  db: Database;
  miner: SequenceMiner;
  config: MiningDefaults;
  log: Logger;
}

export type RunOutcome = 'succeeded' | 'failed' | 'skipped';

/**
 * Executes one queued run end to end.
 *
 * 1. Load the run; unknown or already finished runs are skipped.
 * 2. Mark it running and re-validate the stored request.
 * 3. Run the pipeline against the engine.
 * 4. Persist the rule table and the counts.
 *
 * Anything that goes wrong while computing (bad fields, unparseable
 * timestamps, engine failures) fails the run; there are no retries.
 * Repository errors propagate so the caller can leave the stream entry
 * pending.
 */
export async function executeRun(deps: RunExecutionDeps, runId: string): Promise<RunOutcome> {
  const { db, log } = deps;

  const run = await findRunById(db, runId);
  if (run === undefined) {
    log.warn({ run_id: runId }, 'Run not found, skipping');
    return 'skipped';
  }
  if (run.status === 'succeeded' || run.status === 'failed') {
    log.debug({ run_id: runId, status: run.status }, 'Run already finished, skipping');
    return 'skipped';
  }

  await markRunRunning(db, runId);

  const request = runRequestSchema.safeParse(run.request);
  if (!request.success) {
    await markRunFailed(db, runId, 'Stored request failed validation');
    log.error({ run_id: runId, issues: request.error.issues }, 'Stored run request is invalid');
    return 'failed';
  }

  const resolved = resolveRunSettings(request.data, deps.config);
  if (!resolved.success) {
    await markRunFailed(db, runId, resolved.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    return 'failed';
  }

  let result: PipelineResult;
  try {
    result = await runPipeline(request.data.records, resolved.settings, deps.miner, log);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ err, run_id: runId }, 'Run failed');
    await markRunFailed(db, runId, message);
    return 'failed';
  }

  await replaceRuleRows(db, runId, result.table);
  await markRunSucceeded(db, runId, {
    sequence_count: result.transactions.transactions.length,
    event_count: countEvents(result.transactions),
    rule_count: result.table.rows.length,
    malformed_count: result.malformedCount,
  });

  log.info(
    { run_id: runId, ruleCount: result.table.rows.length, malformedCount: result.malformedCount },
    'Run succeeded',
  );

  return 'succeeded';
}
