/**
 * Growth -> time series conversion
 */

import type { GrowthDataPoint, TimeSeriesPoint } from '../types';

/**
 * Converts growth snapshots into analytic time series points.
 *
 * Order is preserved (oldest first, no reversal). Only the value is adjusted
 * by the external balance; cost, returns and holding count pass through.
 */
export function convertToTimeSeries(
  points: readonly GrowthDataPoint[] | null | undefined,
  externalBalance: number
): TimeSeriesPoint[] {
  if (!points) {
    return [];
  }

  return points.map((point) => ({
    date: point.date,
    value: point.totalValue + externalBalance,
    cost: point.totalCost,
    netReturn: point.netReturn,
    netReturnPct: point.netReturnPct,
    holdingCount: point.holdingCount,
  }));
}
