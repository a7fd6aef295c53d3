/**
 * Portfolio Rebalancing Example
 *
 * Rebalances a two-stock portfolio twice, once for the Sharpe proxy and
 * once for minimum beta, keeping total value fixed:
 *
 *   minimize    c' x
 *   subject to  price' x = price' qty   (value unchanged)
 *               x >= 0                  (no short positions)
 *
 * and reports single-factor metrics before and after.
 */

import {
  optimizeForSharpe,
  optimizeForMinBeta,
  computePortfolioMetrics,
  capmExpectedReturn,
  type Equity,
  type PortfolioMetrics,
} from '../src/index.js';

function printMetrics(label: string, metrics: PortfolioMetrics) {
  console.log(`${label}:`);
  console.log(`  Portfolio Beta: ${metrics.beta.toFixed(4)}`);
  console.log(`  Portfolio Alpha: ${metrics.alpha.toFixed(4)}`);
  console.log(`  Portfolio Sharpe Ratio: ${metrics.sharpeRatio.toFixed(4)}`);
}

async function rebalanceExample() {
  console.log('=== Portfolio Rebalancing ===\n');

  const equities: Equity[] = [
    { symbol: 'AAA', beta: 1.2, qty: 100, avgPrice: 50, returnRate: 0.08 },
    { symbol: 'BBB', beta: 0.9, qty: 150, avgPrice: 30, returnRate: 0.06 },
  ];
  const market = {
    benchmarkReturn: 0.07, // broad index return
    riskFreeRate: 0.02, // short-term treasury bill rate
  };

  printMetrics('Current portfolio', computePortfolioMetrics(equities, market));
  console.log();

  console.log('--- Maximize Sharpe proxy ---');
  {
    const result = await optimizeForSharpe(equities, market, { settings: { verbose: false } });
    for (const equity of result.equities) {
      console.log(
        `Equity with Return ${(equity.returnRate ?? 0).toFixed(2)} has an adjusted quantity of ${equity.qty}`
      );
    }
    console.log(`Value: ${result.valueBefore} -> ${result.valueAfter}`);
    printMetrics('Rebalanced', computePortfolioMetrics(result.equities, market));
    console.log();
  }

  console.log('--- Minimize beta ---');
  {
    const result = await optimizeForMinBeta(equities, { settings: { verbose: false } });
    for (const equity of result.equities) {
      console.log(`Equity with Beta ${equity.beta.toFixed(2)} has an adjusted quantity of ${equity.qty}`);
    }
    console.log(`Value: ${result.valueBefore} -> ${result.valueAfter}`);
    printMetrics('Rebalanced', computePortfolioMetrics(result.equities, market));
    console.log();
  }

  console.log('--- CAPM expected returns ---');
  for (const equity of equities) {
    const expected = capmExpectedReturn(market.riskFreeRate, equity.beta, market.benchmarkReturn);
    console.log(`  ${equity.symbol}: ${(expected * 100).toFixed(2)}%`);
  }

  console.log('\n=== Rebalancing complete ===\n');
}

rebalanceExample().catch(console.error);
