export { default as redisPlugin } from './redis-plugin.js';
export { enqueueRun, RUN_STREAM_KEY } from './run-producer.js';
export { createRedisClient, inspectRunQueue, DEFAULT_REDIS_URL } from './connection.js';
export type { RunQueueStatus } from './connection.js';
