import type Redis from 'ioredis';

export const RUN_STREAM_KEY = 'mining_runs_stream';

/**
 * Appends a run id to the Redis Stream consumed by the worker.
 *
 * Only the id travels through the stream; the request itself lives in
 * Postgres so large record batches never sit in Redis.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueRun(redis: Redis, runId: string): Promise<string> {
  const entryId = await redis.xadd(
    RUN_STREAM_KEY,
    '*',
    'run_id', runId,
    'enqueued_at', new Date().toISOString(),
  );

  if (entryId === null) {
    throw new Error(`XADD for run ${runId} returned no entry id`);
  }
  return entryId;
}
