import type { EncodedTransactionSet, MinedRule } from '../domain/index.js';
import type { MiningParams } from './mining-schema.js';

/**
 * Contract with the external sequential-pattern-mining engine.
 *
 * The engine receives the encoded transactions and parameters and returns
 * induced rules. Nothing in this repository looks at how it finds them.
 */
export interface SequenceMiner {
  mine(transactions: EncodedTransactionSet, params: MiningParams): Promise<readonly MinedRule[]>;
}
