export { HttpSequenceMiner, MiningEngineError } from './http-miner.js';
export type { HttpSequenceMinerOptions } from './http-miner.js';
