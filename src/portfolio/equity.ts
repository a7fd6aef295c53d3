import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../error.js';

/**
 * One portfolio position.
 */
export interface Equity {
  /** Label used in examples and error messages */
  readonly symbol?: string;
  /** Sensitivity to the benchmark */
  readonly beta: number;
  /** Units held */
  readonly qty: number;
  /** Cost basis per unit; also the per-unit market value in the budget */
  readonly avgPrice: number;
  /** Realized or expected return */
  readonly returnRate?: number;
}

/**
 * An equity whose return is known, as the Sharpe objective and the
 * metrics calculator require.
 */
export interface PricedEquity extends Equity {
  readonly returnRate: number;
}

export interface MarketParams {
  /** Return of the broad benchmark index */
  readonly benchmarkReturn: number;
  readonly riskFreeRate: number;
}

const finiteNumber = z.number().finite();

export const equitySchema = z
  .object({
    symbol: z.string().min(1).optional(),
    beta: finiteNumber,
    qty: finiteNumber.nonnegative('qty must not be negative'),
    avgPrice: finiteNumber.nonnegative('avgPrice must not be negative'),
    returnRate: finiteNumber.optional(),
  })
  .passthrough();

export const pricedEquitySchema = equitySchema
  .extend({
    returnRate: finiteNumber,
  })
  .passthrough();

export const portfolioSchema = z
  .array(equitySchema)
  .min(1, 'portfolio must hold at least one equity');

export const pricedPortfolioSchema = z
  .array(pricedEquitySchema)
  .min(1, 'portfolio must hold at least one equity');

export const marketParamsSchema = z.object({
  benchmarkReturn: finiteNumber,
  riskFreeRate: finiteNumber,
});

function formatPath(path: readonly (string | number)[]): string {
  return path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
    .join('')
    .replace(/^\./, '');
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}

/**
 * Validate a portfolio for the beta-minimizing objective.
 * Returns fresh records; the input is left untouched.
 */
export function validatePortfolio(equities: readonly Equity[]): Equity[] {
  return parseOrThrow(portfolioSchema, equities, 'portfolio');
}

/**
 * Validate a portfolio whose equities must all carry a return.
 */
export function validatePricedPortfolio(equities: readonly Equity[]): PricedEquity[] {
  return parseOrThrow(pricedPortfolioSchema, equities, 'portfolio');
}

export function validateMarketParams(market: MarketParams): MarketParams {
  return parseOrThrow(marketParamsSchema, market, 'market parameters');
}
