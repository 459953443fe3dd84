/**
 * Update portfolio indicators script
 *
 * Reads a portfolio growth history file and writes the indicator summary
 * (EMAs, EMA50/EMA200 crossover, trend, value time series) as JSON.
 *
 * This script:
 * 1. Resolves PORTFOLIO_HISTORY_PATH / PORTFOLIO_OUTPUT_DIR / PORTFOLIO_EXTERNAL_BALANCE
 * 2. Loads and sanitizes the growth history
 * 3. Computes indicators
 * 4. Writes <outputDir>/indicators.<portfolio>.json
 */

import './load-env';

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { getGrowthHistory, getHistoryConfig } from '../src/modules/portfolio/data';
import { computePortfolioIndicators, MIN_CROSSOVER_BARS } from '../src/modules/portfolio/engine';

function toFileSlug(name: string): string {
  return name.trim().replace(/[^A-Za-z0-9_-]+/g, '_');
}

function main(): void {
  const config = getHistoryConfig();

  console.log(`📂 Loading growth history from ${config.historyPath}`);
  const history = getGrowthHistory(config.historyPath);
  if (!history) {
    console.error(`❌ No usable growth history at ${config.historyPath}`);
    process.exit(1);
  }

  const portfolio =
    config.externalBalanceOverride === undefined
      ? history.portfolio
      : { ...history.portfolio, externalBalanceTotal: config.externalBalanceOverride };

  const indicators = computePortfolioIndicators(portfolio, history.growth);

  console.log(`  Portfolio: ${portfolio.name}`);
  console.log(`  Data points: ${indicators.dataPoints}`);
  console.log(`  Trend: ${indicators.trend}`);
  if (indicators.dataPoints < MIN_CROSSOVER_BARS) {
    console.log(
      `  EMA50/EMA200 crossover: none (need ${MIN_CROSSOVER_BARS} points, have ${indicators.dataPoints})`
    );
  } else {
    console.log(`  EMA50/EMA200 crossover: ${indicators.ema50CrossEma200}`);
  }

  mkdirSync(config.outputDir, { recursive: true });
  const outPath = join(config.outputDir, `indicators.${toFileSlug(portfolio.name)}.json`);
  writeFileSync(outPath, JSON.stringify(indicators, null, 2) + '\n', 'utf-8');

  console.log(`✅ Wrote ${outPath}`);
}

main();
