/**
 * capm-rebalancer - budget-preserving portfolio rebalancing as linear programs
 *
 * @example
 * ```ts
 * import { optimizeForMinBeta, computePortfolioMetrics } from 'capm-rebalancer';
 *
 * const equities = [
 *   { symbol: 'AAA', beta: 1.2, qty: 100, avgPrice: 50, returnRate: 0.08 },
 *   { symbol: 'BBB', beta: 0.9, qty: 150, avgPrice: 30, returnRate: 0.06 },
 * ];
 * const market = { benchmarkReturn: 0.07, riskFreeRate: 0.02 };
 *
 * const rebalanced = await optimizeForMinBeta(equities);
 * const metrics = computePortfolioMetrics(rebalanced.equities, market);
 *
 * console.log('Quantities:', rebalanced.quantities);
 * console.log('Beta:', metrics.beta, 'Sharpe:', metrics.sharpeRatio);
 * ```
 *
 * @packageDocumentation
 */

// === Portfolio ===
export type {
  Equity,
  PricedEquity,
  MarketParams,
  RebalanceOptions,
  RebalancedPortfolio,
  PortfolioMetrics,
} from './portfolio/index.js';
export {
  equitySchema,
  pricedEquitySchema,
  portfolioSchema,
  pricedPortfolioSchema,
  marketParamsSchema,
  validatePortfolio,
  validatePricedPortfolio,
  validateMarketParams,
  sharpeObjective,
  minBetaObjective,
  budgetConstraint,
  nonnegativeBounds,
  portfolioValue,
  rebalance,
  optimizeForSharpe,
  optimizeForMinBeta,
  roundQuantity,
  computePortfolioMetrics,
  capmExpectedReturn,
} from './portfolio/index.js';

// === Problem ===
export type {
  SolveStatus,
  EqualityConstraint,
  Bound,
  LinearProgram,
  SolverSettings,
  LpSolveResult,
  LpSolver,
  Solution,
} from './problem.js';
export { LinearProblem } from './problem.js';

// === Solver ===
export {
  loadHiGHS,
  resetHiGHS,
  generateLP,
  HighsSolver,
} from './solver/index.js';
export type { LPFormatResult } from './solver/index.js';

// === Errors ===
export type { ValidationIssue } from './error.js';
export {
  RebalanceError,
  ValidationError,
  DomainError,
  ShapeError,
  SolverError,
  OptimizationError,
  InfeasibleError,
  UnboundedError,
} from './error.js';
