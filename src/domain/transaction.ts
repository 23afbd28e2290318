import type { SessionKey } from './event-record.js';

/** One item of a session, ready for the mining engine. */
export interface EncodedEvent {
  /** 1-based, contiguous ordinal within the session. */
  readonly event_id: number;
  readonly symbol: string;
}

export interface EncodedTransaction {
  readonly sequence_id: number;
  readonly events: readonly EncodedEvent[];
}

export interface SessionMapping {
  readonly session_key: SessionKey;
  readonly sequence_id: number;
}

export interface SymbolCode {
  readonly symbol: string;
  readonly code: number;
}

/**
 * Mining-engine input: one transaction per session.
 *
 * `sessions` is the bijection between original session keys and the dense
 * `sequence_id`s; `symbols` is the categorical code table built for this
 * encoding.
 */
export interface EncodedTransactionSet {
  readonly transactions: readonly EncodedTransaction[];
  readonly sessions: readonly SessionMapping[];
  readonly symbols: readonly SymbolCode[];
}
