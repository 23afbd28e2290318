export {
  redisPlugin,
  enqueueRun,
  createRedisClient,
  inspectRunQueue,
  RUN_STREAM_KEY,
} from './redis/index.js';
export {
  createDbClient,
  ensureTables,
  dbPlugin,
  DEFAULT_DATABASE_URL,
} from './db/index.js';
export type { Database, RunRow, RunStatus } from './db/index.js';
export { HttpSequenceMiner, MiningEngineError } from './mining/index.js';
export { loadMiningConfig, miningConfigPlugin } from './config/index.js';
export type { MiningConfig } from './config/index.js';
export { startRunConsumer } from './worker/index.js';
