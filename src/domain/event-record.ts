/**
 * Record types for the normalization stage.
 *
 * Raw records arrive as loosely-typed rows (one per user action). The
 * normalizer turns them into `NormalizedRecord`s keyed by canonical field
 * names. Nothing here depends on a framework.
 */

/** One raw row: field name → value, exactly as supplied by the caller. */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Value grouping records into a session.
 *
 * `null` collects every record whose session field is missing.
 */
export type SessionKey = string | number | boolean | null;

export interface NormalizedRecord {
  /** 0-based index of the record in the caller's input. */
  readonly position: number;
  /** All original fields, keyed by canonical field name. */
  readonly fields: Readonly<Record<string, unknown>>;
  readonly session_key: SessionKey;
  /** Epoch milliseconds, truncated to the configured sub-second precision. */
  readonly timestamp_ms: number;
  /** Seconds since the previous record of the same session; null for the first. */
  readonly time_diff: number | null;
}

/** User-facing field names, before canonicalization. */
export interface FieldNames {
  readonly session_key: string;
  readonly action: string;
  readonly timestamp: string;
}

/** Keeps only records whose `field` equals `equals`. */
export interface RecordFilter {
  readonly field: string;
  readonly equals: string | number | boolean;
}
