/**
 * Error taxonomy of the transformation pipeline.
 *
 * `ConfigurationError` and `ParseError` abort a run and are safe to show to
 * the caller. `InvariantViolationError` means a stage broke its contract
 * with the previous one and is never user-correctable.
 */
export type PipelineErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PARSE_ERROR'
  | 'INVARIANT_VIOLATION';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  /** Structured details for HTTP responses and logs. */
  abstract details(): Record<string, unknown>;
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(
    /** Field name as supplied by the caller. */
    readonly field: string,
    /** The canonical form that failed to resolve. */
    readonly canonical: string,
    readonly role: string,
  ) {
    super(`Unknown ${role} field "${field}" (looked up as "${canonical}")`);
    this.name = 'ConfigurationError';
  }

  details(): Record<string, unknown> {
    return { field: this.field, canonical: this.canonical, role: this.role };
  }
}

export class ParseError extends PipelineError {
  readonly code = 'PARSE_ERROR' as const;

  constructor(
    /** 0-based index of the offending record in the caller's input. */
    readonly position: number,
    readonly field: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Record ${position}: ${reason}`);
    this.name = 'ParseError';
  }

  details(): Record<string, unknown> {
    return { position: this.position, field: this.field, value: this.value };
  }
}

export class InvariantViolationError extends PipelineError {
  readonly code = 'INVARIANT_VIOLATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }

  details(): Record<string, unknown> {
    return {};
  }
}
