import type { ZodIssue } from 'zod';
import type { FieldNames, RecordFilter } from '../domain/index.js';
import { miningParamsSchema } from './mining-schema.js';
import type {
  MalformedRulePolicy,
  MiningParams,
  MiningParamsOverride,
  RunRequest,
} from './mining-schema.js';
import type { FractionalDigits } from './timestamp.js';

/** Defaults a request is merged over (loaded from config/mining.yaml). */
export interface MiningDefaults {
  readonly fields: FieldNames;
  readonly mining: MiningParams;
  readonly output: {
    readonly malformed_rules: MalformedRulePolicy;
    readonly fractional_digits: FractionalDigits;
    readonly top_k: number;
  };
}

/** Everything one pipeline execution needs, fully resolved. */
export interface RunSettings {
  readonly fields: FieldNames;
  readonly params: MiningParams;
  readonly filter: RecordFilter | undefined;
  readonly fractionalDigits: FractionalDigits;
  readonly malformedRules: MalformedRulePolicy;
}

export type RunSettingsResult =
  | { readonly success: true; readonly settings: RunSettings }
  | { readonly success: false; readonly issues: ZodIssue[] };

function mergeParams(defaults: MiningParams, overrides: MiningParamsOverride | undefined): MiningParams {
  return {
    min_support: overrides?.min_support ?? defaults.min_support,
    max_length: overrides?.max_length ?? defaults.max_length,
    min_gap: overrides?.min_gap ?? defaults.min_gap,
    // null is a meaningful override (unbounded gap)
    max_gap: overrides?.max_gap !== undefined ? overrides.max_gap : defaults.max_gap,
    min_confidence: overrides?.min_confidence ?? defaults.min_confidence,
  };
}

/**
 * Merges a run request over configured defaults, field by field.
 *
 * Mining parameters are re-validated after merging so cross-field
 * constraints (max_gap ≥ min_gap) hold for the combination.
 */
export function resolveRunSettings(request: RunRequest, defaults: MiningDefaults): RunSettingsResult {
  const params = miningParamsSchema.safeParse(mergeParams(defaults.mining, request.params));
  if (!params.success) {
    return { success: false, issues: params.error.issues };
  }

  return {
    success: true,
    settings: {
      fields: {
        session_key: request.fields?.session_key ?? defaults.fields.session_key,
        action: request.fields?.action ?? defaults.fields.action,
        timestamp: request.fields?.timestamp ?? defaults.fields.timestamp,
      },
      params: params.data,
      filter: request.filter,
      fractionalDigits: request.fractional_digits ?? defaults.output.fractional_digits,
      malformedRules: request.malformed_rules ?? defaults.output.malformed_rules,
    },
  };
}
