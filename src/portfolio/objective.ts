/**
 * Objective vectors for the rebalancing programs. The solver always
 * minimizes, so maximizing goals are negated here.
 */

import { DomainError } from '../error.js';
import type { Equity, MarketParams, PricedEquity } from './equity.js';

/**
 * Linear Sharpe proxy: each equity contributes its excess return per unit
 * of beta-scaled market premium,
 *
 *   c[i] = -((r[i] - rf) / (beta[i] * (bm - rf)))
 *
 * Portfolio Sharpe ratio is not linear in the quantities; this is the
 * approximation the rebalancer optimizes.
 */
export function sharpeObjective(equities: readonly PricedEquity[], market: MarketParams): Float64Array {
  const premium = market.benchmarkReturn - market.riskFreeRate;
  if (premium === 0) {
    throw new DomainError('benchmarkReturn equals riskFreeRate; the market premium is zero');
  }

  const c = new Float64Array(equities.length);
  equities.forEach((equity, i) => {
    if (equity.beta === 0) {
      throw new DomainError(`beta of ${equity.symbol ?? `equity ${i}`} is zero`);
    }
    const coeff = -((equity.returnRate - market.riskFreeRate) / (equity.beta * premium));
    if (!Number.isFinite(coeff)) {
      throw new DomainError(`Sharpe coefficient of ${equity.symbol ?? `equity ${i}`} is not finite`);
    }
    c[i] = coeff;
  });
  return c;
}

/**
 * c[i] = beta[i]
 */
export function minBetaObjective(equities: readonly Equity[]): Float64Array {
  return Float64Array.from(equities, (equity) => equity.beta);
}
