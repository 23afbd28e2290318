import { InvariantViolationError } from '../domain/index.js';
import type {
  EncodedEvent,
  EncodedTransaction,
  EncodedTransactionSet,
  NormalizedRecord,
  SessionKey,
} from '../domain/index.js';
import { columnsOf, resolveField } from './field-names.js';
import { sortBySessionAndTime, toSessionKey } from './session-order.js';
import { buildSymbolCodes, sanitizeSymbol, toActionLabel } from './symbols.js';

/**
 * Encodes normalized records into the mining engine's transaction format.
 *
 * Field resolution and the (session_key, timestamp) sort are redone here
 * so the result never depends on how the caller ordered or produced the
 * records. Sequence ids are assigned densely in sorted session-key order;
 * event ids restart at 1 for every session.
 */
export function encode(
  records: readonly NormalizedRecord[],
  sessionKeyField: string,
  actionField: string,
): EncodedTransactionSet {
  if (records.length === 0) {
    return { transactions: [], sessions: [], symbols: [] };
  }

  const columns = columnsOf(records.map((r) => r.fields));
  const sessionColumn = resolveField(columns, sessionKeyField, 'session key');
  const actionColumn = resolveField(columns, actionField, 'action');

  const items = records.map((record) => ({
    position: record.position,
    timestamp_ms: record.timestamp_ms,
    session_key: toSessionKey(record.fields[sessionColumn], record.position, sessionKeyField),
    symbol: sanitizeSymbol(toActionLabel(record.fields[actionColumn], record.position, actionField)),
  }));

  const sequenceIds = new Map<SessionKey, number>();
  const groups: EncodedEvent[][] = [];

  for (const item of sortBySessionAndTime(items)) {
    let sequenceId = sequenceIds.get(item.session_key);
    if (sequenceId === undefined) {
      sequenceId = sequenceIds.size + 1;
      sequenceIds.set(item.session_key, sequenceId);
      groups.push([]);
    }

    const group = groups[sequenceId - 1];
    if (group === undefined) {
      throw new InvariantViolationError(`No event group allocated for sequence ${sequenceId}`);
    }
    group.push({ event_id: group.length + 1, symbol: item.symbol });
  }

  const transactions = groups.map((events, i): EncodedTransaction => {
    if (events.length === 0) {
      throw new InvariantViolationError(`Sequence ${i + 1} has no events`);
    }
    return { sequence_id: i + 1, events };
  });

  return {
    transactions,
    sessions: Array.from(sequenceIds, ([session_key, sequence_id]) => ({ session_key, sequence_id })),
    symbols: buildSymbolCodes(items.map((item) => item.symbol)),
  };
}

/** Total number of encoded events across all transactions. */
export function countEvents(set: EncodedTransactionSet): number {
  let total = 0;
  for (const transaction of set.transactions) total += transaction.events.length;
  return total;
}
