/**
 * Single-factor (CAPM) portfolio metrics.
 */

import { DomainError } from '../error.js';
import { portfolioValue } from './constraints.js';
import {
  validateMarketParams,
  validatePricedPortfolio,
  type Equity,
  type MarketParams,
} from './equity.js';

export interface PortfolioMetrics {
  /** Value-weighted beta */
  readonly beta: number;
  /** Return not explained by systematic risk */
  readonly alpha: number;
  /** Excess return over the beta-scaled market premium */
  readonly sharpeRatio: number;
  readonly portfolioReturn: number;
  readonly totalInvestment: number;
  /** qty × avgPrice / totalInvestment, in input order; sums to 1 */
  readonly weights: number[];
}

/**
 * Compute value-weighted beta, alpha and the approximate Sharpe ratio.
 *
 * The Sharpe denominator is Σ weight[i] × beta[i] × (bm - rf), which is
 * portfolio beta times the market premium rather than a standard deviation.
 *
 * @throws DomainError when total investment, portfolio beta or the market
 * premium is zero
 */
export function computePortfolioMetrics(
  equities: readonly Equity[],
  market: MarketParams
): PortfolioMetrics {
  const priced = validatePricedPortfolio(equities);
  const { benchmarkReturn, riskFreeRate } = validateMarketParams(market);
  const premium = benchmarkReturn - riskFreeRate;

  const totalInvestment = portfolioValue(priced);
  if (totalInvestment === 0) {
    throw new DomainError('Total investment is zero; weights are undefined');
  }

  const weights = priced.map((equity) => (equity.qty * equity.avgPrice) / totalInvestment);

  let beta = 0;
  let portfolioReturn = 0;
  let stdDevProxy = 0;
  priced.forEach((equity, i) => {
    const weight = weights[i] ?? 0;
    beta += weight * equity.beta;
    portfolioReturn += weight * equity.returnRate;
    stdDevProxy += weight * equity.beta * premium;
  });

  const alpha = portfolioReturn - riskFreeRate - beta * premium;

  if (beta === 0 || premium === 0 || stdDevProxy === 0) {
    throw new DomainError('Sharpe ratio is undefined: portfolio beta or market premium is zero');
  }
  const sharpeRatio = (portfolioReturn - riskFreeRate) / stdDevProxy;

  if (![beta, alpha, sharpeRatio, portfolioReturn].every(Number.isFinite)) {
    throw new DomainError('Portfolio metrics are not finite');
  }

  return { beta, alpha, sharpeRatio, portfolioReturn, totalInvestment, weights };
}

/**
 * CAPM expected return: rf + beta × (market - rf).
 */
export function capmExpectedReturn(riskFreeRate: number, beta: number, marketReturn: number): number {
  return riskFreeRate + beta * (marketReturn - riskFreeRate);
}
