import type { DecomposedRuleTable } from '../domain/index.js';

const COLUMNS = ['LHS', 'RHS', 'support', 'confidence', 'lift'] as const;

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function formatNumber(value: number): string {
  if (value === Infinity) return 'Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

/**
 * Renders a rule table as CSV: quoted header and strings, `NA` for a
 * missing RHS, one newline-terminated line per row.
 */
export function formatRuleTableCsv(table: DecomposedRuleTable): string {
  const lines = [COLUMNS.map(quote).join(',')];

  for (const row of table.rows) {
    lines.push([
      quote(row.LHS),
      row.RHS === null ? 'NA' : quote(row.RHS),
      formatNumber(row.support),
      formatNumber(row.confidence),
      formatNumber(row.lift),
    ].join(','));
  }

  return lines.join('\n') + '\n';
}
