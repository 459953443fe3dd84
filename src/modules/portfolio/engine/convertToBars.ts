/**
 * Growth -> price bar conversion
 *
 * Pure function - no side effects.
 */

import type { GrowthDataPoint, PriceBar } from '../types';

/**
 * Converts growth snapshots into synthetic OHLC bars.
 *
 * Each bar carries totalValue + externalBalance in every price field.
 * Input is oldest-first; output is newest-first (bars[0] is the latest point),
 * which is the order bar consumers and the crossover detector expect.
 *
 * @param points Growth snapshots, ascending by date (may be empty or absent)
 * @param externalBalance Value held outside tracked holdings (any sign)
 */
export function convertToBars(
  points: readonly GrowthDataPoint[] | null | undefined,
  externalBalance: number
): PriceBar[] {
  if (!points || points.length === 0) {
    return [];
  }

  const bars: PriceBar[] = [];

  // Walk backwards so the newest point lands first
  for (let i = points.length - 1; i >= 0; i--) {
    const point = points[i]!;
    const value = point.totalValue + externalBalance;
    bars.push({
      date: point.date,
      open: value,
      high: value,
      low: value,
      close: value,
      adjClose: value,
    });
  }

  return bars;
}
