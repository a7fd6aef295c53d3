/**
 * CPLEX LP format generator.
 *
 * Converts a dense linear program to an LP format string
 * that can be solved by HiGHS.
 */

import type { Bound, LinearProgram } from '../problem.js';

/**
 * Result of LP format generation.
 */
export interface LPFormatResult {
  /** LP format string */
  readonly lpString: string;
  /** Ordered variable names (for solution extraction) */
  readonly varNames: string[];
}

/**
 * Format a coefficient for LP format.
 * Returns string like "+ 3.5 x_0" or "- 2 x_1"
 */
function formatCoeff(coeff: number, varName: string, isFirst: boolean): string {
  if (coeff === 0) return '';

  const sign = coeff >= 0 ? '+' : '-';
  const absCoeff = Math.abs(coeff);

  // For first term, don't include leading +
  const signStr = isFirst ? (coeff < 0 ? '- ' : '') : ` ${sign} `;

  if (absCoeff === 1) {
    return `${signStr}${varName}`;
  }
  return `${signStr}${absCoeff} ${varName}`;
}

/**
 * Convert a dense coefficient row to LP format terms.
 * An all-zero row is written as `0 x_0` so the section stays well-formed.
 */
function rowToTerms(coeffs: Float64Array, varNames: readonly string[]): string {
  const terms: string[] = [];
  let isFirst = true;

  for (let i = 0; i < coeffs.length; i++) {
    const term = formatCoeff(coeffs[i]!, varNames[i]!, isFirst);
    if (term) {
      terms.push(term);
      isFirst = false;
    }
  }

  return terms.join('') || `0 ${varNames[0]}`;
}

function formatBound(bound: Bound, name: string): string {
  const lowerOpen = bound.lower === -Infinity;
  const upperOpen = bound.upper === Infinity;

  if (lowerOpen && upperOpen) {
    return `  ${name} free`;
  }
  const lower = lowerOpen ? '-inf' : String(bound.lower);
  const upper = upperOpen ? '+inf' : String(bound.upper);
  return `  ${lower} <= ${name} <= ${upper}`;
}

/**
 * Generate LP format string from a linear program.
 *
 * Variables are named `x_<column>`; equality rows are named after the
 * constraint when it carries a name, `c<row>` otherwise.
 */
export function generateLP(program: LinearProgram): LPFormatResult {
  const lines: string[] = [];
  const varNames = Array.from({ length: program.c.length }, (_, i) => `x_${i}`);

  lines.push('Minimize');
  lines.push(`  obj: ${rowToTerms(program.c, varNames)}`);

  lines.push('Subject To');
  program.equalities.forEach((constraint, row) => {
    const label = constraint.name ?? `c${row}`;
    lines.push(`  ${label}: ${rowToTerms(constraint.coeffs, varNames)} = ${constraint.rhs}`);
  });

  lines.push('Bounds');
  program.bounds.forEach((bound, i) => {
    lines.push(formatBound(bound, varNames[i]!));
  });

  lines.push('End');

  return {
    lpString: lines.join('\n'),
    varNames,
  };
}
