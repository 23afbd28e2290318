import { z } from 'zod';

// ── Mining parameters ──────────────────────────────────────────────
// Passed through untouched to the external engine.

const minSupport = z.number().gt(0).max(1);
const maxLength = z.number().int().min(1);
const minGap = z.number().int().min(1);
const maxGap = z.number().int().min(1).nullable();
const minConfidence = z.number().min(0).max(1);

/**
 * Full parameter set with defaults.
 *
 * - `min_support`: fraction of sessions a sequence must occur in.
 * - `max_length`: maximum items in a mined sequence.
 * - `min_gap` / `max_gap`: ordinal distance bounds between consecutive
 *   items (`max_gap: null` = unbounded).
 * - `min_confidence`: minimum confidence for an induced rule.
 */
export const miningParamsSchema = z.object({
  min_support: minSupport.default(0.2),
  max_length: maxLength.default(4),
  min_gap: minGap.default(1),
  max_gap: maxGap.default(2),
  min_confidence: minConfidence.default(0.5),
}).refine(
  (p) => p.max_gap === null || p.max_gap >= p.min_gap,
  { message: 'max_gap must be greater than or equal to min_gap', path: ['max_gap'] },
);

export type MiningParams = z.output<typeof miningParamsSchema>;

/** Per-request overrides; unset keys fall back to configured defaults. */
export const miningParamsOverrideSchema = z.object({
  min_support: minSupport.optional(),
  max_length: maxLength.optional(),
  min_gap: minGap.optional(),
  max_gap: maxGap.optional(),
  min_confidence: minConfidence.optional(),
});

export type MiningParamsOverride = z.infer<typeof miningParamsOverrideSchema>;

// ── Records and field names ────────────────────────────────────────

export const recordsSchema = z
  .array(z.record(z.string(), z.unknown()))
  .min(1, 'At least one record is required');

const fieldName = z.string().min(1).max(255);

export const fieldNamesSchema = z.object({
  session_key: fieldName,
  action: fieldName,
  timestamp: fieldName,
});

export const fieldOverridesSchema = fieldNamesSchema.partial();

export const recordFilterSchema = z.object({
  field: fieldName,
  equals: z.union([z.string(), z.number(), z.boolean()]),
});

export const fractionalDigitsSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
]);

export const malformedRulePolicySchema = z.enum(['keep', 'drop']);

export type MalformedRulePolicy = z.infer<typeof malformedRulePolicySchema>;

// ── Request bodies ─────────────────────────────────────────────────

/** Body of POST /api/v1/normalize. */
export const normalizeRequestSchema = z.object({
  records: recordsSchema,
  fields: fieldNamesSchema.pick({ session_key: true, timestamp: true }).partial().optional(),
  fractional_digits: fractionalDigitsSchema.optional(),
});

/** Body of POST /api/v1/encode. */
export const encodeRequestSchema = z.object({
  records: recordsSchema,
  fields: fieldOverridesSchema.optional(),
  filter: recordFilterSchema.optional(),
  fractional_digits: fractionalDigitsSchema.optional(),
});

/**
 * Body of POST /api/v1/runs. Stored verbatim with the run and re-validated
 * by the worker before execution.
 */
export const runRequestSchema = z.object({
  records: recordsSchema,
  fields: fieldOverridesSchema.optional(),
  params: miningParamsOverrideSchema.optional(),
  filter: recordFilterSchema.optional(),
  fractional_digits: fractionalDigitsSchema.optional(),
  malformed_rules: malformedRulePolicySchema.optional(),
});

export type RunRequest = z.infer<typeof runRequestSchema>;

// ── Engine output ──────────────────────────────────────────────────

export const minedRuleSchema = z.object({
  rule: z.string(),
  support: z.number(),
  confidence: z.number(),
  lift: z.number(),
});

export const rankMetricSchema = z.enum(['support', 'confidence', 'lift']);

/** Body of POST /api/v1/rules/decompose. */
export const decomposeRequestSchema = z.object({
  rules: z.array(minedRuleSchema),
  top_k: z.number().int().min(0).optional(),
  by: rankMetricSchema.default('lift'),
});
