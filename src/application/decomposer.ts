import type {
  DecomposedRule,
  DecomposedRuleTable,
  MalformedRuleWarning,
  MinedRule,
  RankMetric,
} from '../domain/index.js';

/** Separator between antecedent and consequent in a formatted rule. */
export const RULE_SEPARATOR = ' => ';

/** Non-overlapping occurrences of the separator. */
function countSeparators(rule: string): number {
  let count = 0;
  let from = rule.indexOf(RULE_SEPARATOR);
  while (from !== -1) {
    count++;
    from = rule.indexOf(RULE_SEPARATOR, from + RULE_SEPARATOR.length);
  }
  return count;
}

/**
 * Splits a formatted rule into LHS and RHS.
 *
 * Only a rule with exactly one separator splits; anything else keeps the
 * whole string as LHS and a null RHS.
 */
export function splitRule(rule: string): { LHS: string; RHS: string | null; separator_count: number } {
  const separator_count = countSeparators(rule);
  if (separator_count !== 1) {
    return { LHS: rule, RHS: null, separator_count };
  }

  const at = rule.indexOf(RULE_SEPARATOR);
  return {
    LHS: rule.slice(0, at),
    RHS: rule.slice(at + RULE_SEPARATOR.length),
    separator_count,
  };
}

/**
 * Decomposes engine rules into a table with separate LHS/RHS columns.
 *
 * Malformed rule strings are kept (RHS = null) and reported in `warnings`
 * rather than thrown.
 */
export function decompose(rules: readonly MinedRule[]): DecomposedRuleTable {
  const rows: DecomposedRule[] = [];
  const warnings: MalformedRuleWarning[] = [];

  rules.forEach((rule, position) => {
    const { LHS, RHS, separator_count } = splitRule(rule.rule);
    if (RHS === null) {
      warnings.push({ position, rule: rule.rule, separator_count });
    }
    rows.push({
      LHS,
      RHS,
      support: rule.support,
      confidence: rule.confidence,
      lift: rule.lift,
    });
  });

  return { rows, warnings };
}

// Descending; NaN sorts after every number.
function compareDescending(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return Number(aNaN) - Number(bNaN);
  return a > b ? -1 : a < b ? 1 : 0;
}

export interface TopKOptions {
  /** Metric to rank by (default `lift`). */
  by?: RankMetric;
  k: number;
}

/**
 * Returns the `k` best rows by `by`, descending. Ties keep table order.
 *
 * `k` is floored and clamped at 0; a `k` past the table size returns every
 * row. Warnings follow their rows and are re-indexed to the new positions.
 */
export function topK(table: DecomposedRuleTable, options: TopKOptions): DecomposedRuleTable {
  const by = options.by ?? 'lift';
  const count = Number.isNaN(options.k) ? 0 : Math.max(0, Math.floor(options.k));

  const selected = table.rows
    .map((row, position) => ({ row, position }))
    .sort((a, b) => compareDescending(a.row[by], b.row[by]) || a.position - b.position)
    .slice(0, count);

  const newPosition = new Map(selected.map((entry, i) => [entry.position, i]));
  const warnings = table.warnings
    .flatMap((warning) => {
      const position = newPosition.get(warning.position);
      return position === undefined ? [] : [{ ...warning, position }];
    })
    .sort((a, b) => a.position - b.position);

  return { rows: selected.map((entry) => entry.row), warnings };
}

/** Removes every row flagged as malformed. */
export function dropMalformed(table: DecomposedRuleTable): DecomposedRuleTable {
  const malformed = new Set(table.warnings.map((w) => w.position));
  return {
    rows: table.rows.filter((row, position) => row.RHS !== null && !malformed.has(position)),
    warnings: [],
  };
}
