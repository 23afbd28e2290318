import Redis from 'ioredis';
import { RUN_STREAM_KEY } from './run-producer.js';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/**
 * Redis client shared by the API and the worker.
 *
 * `maxRetriesPerRequest: null` keeps blocking XREADGROUP calls alive across
 * reconnects; `lazyConnect` leaves the connect to the caller so failures
 * surface at boot.
 */
export function createRedisClient(url: string = process.env['REDIS_URL'] ?? DEFAULT_REDIS_URL): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

export interface RunQueueStatus {
  /** Reply to PING. */
  readonly redis: string;
  /** Entries in the run stream, acknowledged or not. */
  readonly queued: number;
}

/** Pings Redis and reads the length of the run stream. */
export async function inspectRunQueue(redis: Redis): Promise<RunQueueStatus> {
  const pong = await redis.ping();
  const queued = await redis.xlen(RUN_STREAM_KEY);
  return { redis: pong, queued };
}
