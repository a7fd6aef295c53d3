import type { Bound, EqualityConstraint } from '../problem.js';
import { DomainError } from '../error.js';
import type { Equity } from './equity.js';

/**
 * Total market value of the holdings, Σ avgPrice × qty.
 */
export function portfolioValue(equities: readonly Equity[]): number {
  return equities.reduce((total, equity) => total + equity.avgPrice * equity.qty, 0);
}

/**
 * The budget row: Σ avgPrice[i] × x[i] = Σ avgPrice[i] × qty[i].
 *
 * Value may move freely between positions; no single position is capped.
 */
export function budgetConstraint(equities: readonly Equity[]): EqualityConstraint {
  const coeffs = new Float64Array(equities.length);
  equities.forEach((equity, i) => {
    if (equity.avgPrice === 0) {
      throw new DomainError(
        `avgPrice of ${equity.symbol ?? `equity ${i}`} is zero; the budget constraint is degenerate`
      );
    }
    coeffs[i] = equity.avgPrice;
  });

  return { name: 'budget', coeffs, rhs: portfolioValue(equities) };
}

/**
 * Quantities are bounded below by zero and unbounded above.
 */
export function nonnegativeBounds(n: number): Bound[] {
  return Array.from({ length: n }, () => ({ lower: 0, upper: Infinity }));
}
