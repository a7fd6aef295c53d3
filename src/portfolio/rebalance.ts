/**
 * Budget-preserving rebalancers.
 *
 * Both goals share one program shape:
 *
 *   minimize    c' x
 *   subject to  avgPrice' x = avgPrice' qty
 *               x >= 0
 *
 * and map the optimum back onto whole-unit quantities.
 */

import { LinearProblem, type LpSolver, type SolverSettings } from '../problem.js';
import { HighsSolver } from '../solver/highs.js';
import { budgetConstraint, nonnegativeBounds, portfolioValue } from './constraints.js';
import {
  validateMarketParams,
  validatePortfolio,
  validatePricedPortfolio,
  type Equity,
  type MarketParams,
} from './equity.js';
import { minBetaObjective, sharpeObjective } from './objective.js';

export interface RebalanceOptions {
  /** LP collaborator; defaults to {@link HighsSolver} */
  solver?: LpSolver;
  settings?: SolverSettings;
}

/**
 * Outcome of a rebalance. The input portfolio is never modified.
 */
export interface RebalancedPortfolio<E extends Equity = Equity> {
  /** Input records, in input order, carrying the rounded quantities */
  readonly equities: E[];
  readonly quantities: number[];
  /** The solver's un-rounded optimum */
  readonly continuous: Float64Array;
  readonly valueBefore: number;
  /** May drift from valueBefore by up to half a unit price per position */
  readonly valueAfter: number;
  readonly objectiveValue: number;
  /** Solve time in seconds */
  readonly solveTime: number;
}

/**
 * Solve the budget-preserving program for `c` and map the optimum onto
 * `equities`. Throws before anything is returned, so callers either get
 * every quantity updated or none.
 */
export async function rebalance<E extends Equity>(
  equities: readonly E[],
  c: Float64Array,
  options: RebalanceOptions = {}
): Promise<RebalancedPortfolio<E>> {
  const budget = budgetConstraint(equities);

  const solution = await LinearProblem.minimize(c)
    .subjectTo([budget])
    .bounds(nonnegativeBounds(equities.length))
    .settings(options.settings ?? {})
    .solve(options.solver ?? new HighsSolver());

  const quantities = Array.from(solution.x, roundQuantity);
  const rebalanced = equities.map((equity, i) => ({ ...equity, qty: quantities[i] ?? 0 }));

  return {
    equities: rebalanced,
    quantities,
    continuous: solution.x,
    valueBefore: budget.rhs,
    valueAfter: portfolioValue(rebalanced),
    objectiveValue: solution.value,
    solveTime: solution.solveTime,
  };
}

/**
 * Reallocate quantities to maximize the linear Sharpe proxy while keeping
 * total value fixed. Every equity must carry a `returnRate`. Fields the
 * caller attaches to its records are carried into the result.
 *
 * @example
 * ```ts
 * const { equities } = await optimizeForSharpe(
 *   [
 *     { beta: 1.2, qty: 100, avgPrice: 50, returnRate: 0.08 },
 *     { beta: 0.9, qty: 150, avgPrice: 30, returnRate: 0.06 },
 *   ],
 *   { benchmarkReturn: 0.07, riskFreeRate: 0.02 }
 * );
 * ```
 */
export async function optimizeForSharpe<E extends Equity>(
  equities: readonly E[],
  market: MarketParams,
  options: RebalanceOptions = {}
): Promise<RebalancedPortfolio<E>> {
  const priced = validatePricedPortfolio(equities);
  const c = sharpeObjective(priced, validateMarketParams(market));
  return rebalance(equities, c, options);
}

/**
 * Reallocate quantities to minimize Σ beta[i] × qty[i] while keeping total
 * value fixed.
 */
export async function optimizeForMinBeta<E extends Equity>(
  equities: readonly E[],
  options: RebalanceOptions = {}
): Promise<RebalancedPortfolio<E>> {
  const validated = validatePortfolio(equities);
  return rebalance(equities, minBetaObjective(validated), options);
}

/**
 * Nearest whole unit, ties to even. Solver noise just below zero becomes +0.
 */
export function roundQuantity(value: number): number {
  const rounded = Math.round(value);
  const tie = Math.abs(value % 1) === 0.5;
  return Math.max(0, tie && rounded % 2 !== 0 ? rounded - 1 : rounded);
}
