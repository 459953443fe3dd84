/**
 * Trend classification engine
 *
 * Pure function that classifies portfolio trend from current value and
 * simple moving averages.
 */

import type { PortfolioTrend } from '../types';

export interface TrendInputs {
  price: number;
  sma20: number;
  sma50: number;
  sma200: number;
}

/**
 * Classifies trend:
 * - bullish: price > 200 SMA AND 20 SMA > 50 SMA
 * - bearish: price < 200 SMA AND 20 SMA < 50 SMA
 * - neutral: mixed signals
 *
 * SMAs that could not be computed arrive as 0.
 */
export function determineTrend(inputs: TrendInputs): PortfolioTrend {
  const { price, sma20, sma50, sma200 } = inputs;

  if (price > sma200 && sma20 > sma50) {
    return 'bullish';
  }

  if (price < sma200 && sma20 < sma50) {
    return 'bearish';
  }

  return 'neutral';
}

export const INSUFFICIENT_HISTORY_DESCRIPTION =
  'Portfolio value trend is neutral: insufficient historical data for indicator computation';

export function describeTrend(trend: PortfolioTrend): string {
  switch (trend) {
    case 'bullish':
      return 'Portfolio value is in an uptrend: above key moving averages';
    case 'bearish':
      return 'Portfolio value is in a downtrend: below key moving averages';
    default:
      return 'Portfolio value trend is neutral: mixed signals from moving averages';
  }
}
