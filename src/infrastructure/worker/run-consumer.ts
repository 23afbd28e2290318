import type Redis from 'ioredis';
import type { Logger } from 'pino';
import { RUN_STREAM_KEY } from '../redis/run-producer.js';
import { executeRun } from '../../application/run-executor.js';
import type { RunExecutionDeps } from '../../application/run-executor.js';

const GROUP_NAME = 'run_executors';
const CONSUMER_NAME = process.env['WORKER_ID'] ?? 'worker-1';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Runs are heavy; read a few at a time
const BATCH_SIZE = 10;

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "0" so runs queued while no worker was up are still executed.
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', RUN_STREAM_KEY, GROUP_NAME, '0', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: RUN_STREAM_KEY }, 'Consumer group created');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Reads the run id out of a flat [field, value, field, value, ...] entry.
 * Returns null when the entry carries no run id.
 */
export function parseRunEntry(fields: readonly string[]): string | null {
  for (let i = 0; i < fields.length; i += 2) {
    if (fields[i] === 'run_id') {
      const value = fields[i + 1];
      return value !== undefined && value !== '' ? value : null;
    }
  }
  return null;
}

type StreamEntry = [streamId: string, fields: string[]];

/**
 * Flattens an XREADGROUP reply (`[[stream, [[id, fields], ...]], ...]`)
 * into `[id, fields]` pairs. Entries deleted while pending come back with
 * nil fields and are returned with an empty field list.
 */
export function toStreamEntries(response: unknown): StreamEntry[] {
  if (!Array.isArray(response)) return [];

  const entries: StreamEntry[] = [];
  for (const stream of response) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      const fields = Array.isArray(entry[1])
        ? entry[1].filter((f: unknown): f is string => typeof f === 'string')
        : [];
      entries.push([entry[0], fields]);
    }
  }
  return entries;
}

interface ConsumerDeps extends RunExecutionDeps {
  redis: Redis;
}

/**
 * Main consumer loop.
 *
 * XREADGROUP with BLOCK → execute each run → XACK.
 *
 * A run is acknowledged once it reached a final state (succeeded or
 * failed). If persisting the outcome throws, the entry is NOT acknowledged
 * and stays in the pending list for redelivery.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startRunConsumer(
  deps: ConsumerDeps,
  signal: AbortSignal,
): Promise<void> {
  await ensureConsumerGroup(deps.redis, deps.log);

  deps.log.info(
    { consumer: CONSUMER_NAME, group: GROUP_NAME, stream: RUN_STREAM_KEY },
    'Run consumer started',
  );

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, CONSUMER_NAME,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', RUN_STREAM_KEY,
        '>',
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [streamId, fields] of toStreamEntries(response)) {
        await processEntry(deps, streamId, fields);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      deps.log.error({ err }, 'Run consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  deps.log.info('Run consumer stopped');
}

/**
 * Re-reads this consumer's pending entries (delivered, never acknowledged)
 * after a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, CONSUMER_NAME,
    'COUNT', BATCH_SIZE,
    'STREAMS', RUN_STREAM_KEY,
    '0',
  );

  if (response === null) return;

  let count = 0;
  for (const [streamId, fields] of toStreamEntries(response)) {
    if (fields.length === 0) continue;
    await processEntry(deps, streamId, fields);
    count++;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending runs');
  }
}

async function processEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: readonly string[],
): Promise<void> {
  const runId = parseRunEntry(fields);

  if (runId === null) {
    deps.log.warn({ streamId }, 'Stream entry without run_id, acknowledging and skipping');
    await deps.redis.xack(RUN_STREAM_KEY, GROUP_NAME, streamId);
    return;
  }

  try {
    const outcome = await executeRun(deps, runId);
    await deps.redis.xack(RUN_STREAM_KEY, GROUP_NAME, streamId);
    deps.log.info({ run_id: runId, streamId, outcome }, 'Run processed');
  } catch (err: unknown) {
    // Do NOT ack: entry stays in the pending list for redelivery
    deps.log.error({ err, run_id: runId, streamId }, 'Failed to process run');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
