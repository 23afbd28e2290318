/** Metrics a rule table can be ranked by. */
export type RankMetric = 'support' | 'confidence' | 'lift';

export const RANK_METRICS: readonly RankMetric[] = ['support', 'confidence', 'lift'];

/**
 * A rule as returned by the mining engine.
 *
 * `rule` is formatted as `<antecedent> => <consequent>`.
 */
export interface MinedRule {
  readonly rule: string;
  readonly support: number;
  readonly confidence: number;
  readonly lift: number;
}

export interface DecomposedRule {
  readonly LHS: string;
  /** null when the rule string could not be split. */
  readonly RHS: string | null;
  readonly support: number;
  readonly confidence: number;
  readonly lift: number;
}

/**
 * Non-fatal data-quality signal for a rule string whose separator did not
 * occur exactly once. `position` indexes the owning table's `rows`.
 */
export interface MalformedRuleWarning {
  readonly position: number;
  readonly rule: string;
  readonly separator_count: number;
}

export interface DecomposedRuleTable {
  readonly rows: readonly DecomposedRule[];
  readonly warnings: readonly MalformedRuleWarning[];
}
