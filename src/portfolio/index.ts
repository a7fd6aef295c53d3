export type { Equity, PricedEquity, MarketParams } from './equity.js';
export {
  equitySchema,
  pricedEquitySchema,
  portfolioSchema,
  pricedPortfolioSchema,
  marketParamsSchema,
  validatePortfolio,
  validatePricedPortfolio,
  validateMarketParams,
} from './equity.js';

export { sharpeObjective, minBetaObjective } from './objective.js';
export { budgetConstraint, nonnegativeBounds, portfolioValue } from './constraints.js';

export type { RebalanceOptions, RebalancedPortfolio } from './rebalance.js';
export { rebalance, optimizeForSharpe, optimizeForMinBeta, roundQuantity } from './rebalance.js';

export type { PortfolioMetrics } from './metrics.js';
export { computePortfolioMetrics, capmExpectedReturn } from './metrics.js';
