/**
 * Portfolio indicator summary
 *
 * Composes bar/time-series conversion, moving averages, crossover detection
 * and trend classification into one summary for a portfolio.
 */

import type {
  GrowthDataPoint,
  PortfolioIndicators,
  PortfolioSummary,
} from '../types';
import { convertToBars } from './convertToBars';
import { convertToTimeSeries } from './convertToTimeSeries';
import { emaOfBars, smaOfBars } from './movingAverages';
import { detectCrossover } from './detectCrossover';
import {
  determineTrend,
  describeTrend,
  INSUFFICIENT_HISTORY_DESCRIPTION,
} from './classifyTrend';

export interface ComputeIndicatorsOptions {
  now?: () => Date;
}

/**
 * Computes indicators on the daily portfolio value series.
 *
 * Steps:
 * 1. Convert growth to newest-first bars and oldest-first time series
 *    (both adjusted by the external balance)
 * 2. EMA20/50/200 where enough bars exist
 * 3. EMA50/EMA200 crossover on the latest bar
 * 4. SMA20/50/200 trend classification against the holdings value
 */
export function computePortfolioIndicators(
  portfolio: PortfolioSummary,
  growth: readonly GrowthDataPoint[] | null | undefined,
  options: ComputeIndicatorsOptions = {}
): PortfolioIndicators {
  const now = options.now ?? (() => new Date());
  const computeDate = now().toISOString();
  const currentValue = portfolio.totalValue;

  if (!growth || growth.length === 0) {
    // Freshly synced portfolio: the current state counts as one point
    return {
      portfolioName: portfolio.name,
      computeDate,
      currentValue,
      dataPoints: currentValue > 0 ? 1 : 0,
      ema20: 0,
      ema50: 0,
      ema200: 0,
      aboveEma20: false,
      aboveEma50: false,
      aboveEma200: false,
      ema50CrossEma200: 'none',
      trend: 'neutral',
      trendDescription: INSUFFICIENT_HISTORY_DESCRIPTION,
    };
  }

  const bars = convertToBars(growth, portfolio.externalBalanceTotal);
  const timeSeries = convertToTimeSeries(growth, portfolio.externalBalanceTotal);

  const ema20 = emaOfBars(bars, 20);
  const ema50 = emaOfBars(bars, 50);
  const ema200 = emaOfBars(bars, 200);

  const trend = determineTrend({
    price: currentValue,
    sma20: smaOfBars(bars, 20),
    sma50: smaOfBars(bars, 50),
    sma200: smaOfBars(bars, 200),
  });

  return {
    portfolioName: portfolio.name,
    computeDate,
    currentValue,
    dataPoints: bars.length,
    ema20,
    ema50,
    ema200,
    aboveEma20: bars.length >= 20 && currentValue > ema20,
    aboveEma50: bars.length >= 50 && currentValue > ema50,
    aboveEma200: bars.length >= 200 && currentValue > ema200,
    ema50CrossEma200: detectCrossover(bars),
    trend,
    trendDescription: describeTrend(trend),
    timeSeries,
  };
}
