/**
 * Test fixtures for the portfolio module
 */

import type { GrowthDataPoint, PriceBar } from './types';

/**
 * Shift a YYYY-MM-DD date by whole days (UTC)
 */
export function addDays(dateStr: string, days: number): string {
  const date = new Date(dateStr + 'T00:00:00Z');
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().split('T')[0] ?? dateStr;
}

/**
 * Growth points, oldest first, one per calendar day from startDate
 */
export function makeGrowthPoints(
  values: number[],
  startDate = '2024-01-01'
): GrowthDataPoint[] {
  return values.map((totalValue, i) => ({
    date: addDays(startDate, i),
    totalValue,
    totalCost: 1000,
    netReturn: totalValue - 1000,
    netReturnPct: (totalValue - 1000) / 10, // cost is 1000
    holdingCount: 5,
  }));
}

/**
 * Price bars, newest first: closes[0] is the most recent bar (dated latestDate)
 */
export function makeBars(closes: number[], latestDate = '2024-12-31'): PriceBar[] {
  return closes.map((close, i) => ({
    date: addDays(latestDate, -i),
    open: close,
    high: close,
    low: close,
    close,
    adjClose: close,
  }));
}

/**
 * Newest-first bars at a constant close, with per-index overrides
 */
export function makeFlatBars(
  count: number,
  close: number,
  overrides: Record<number, number> = {}
): PriceBar[] {
  const closes = Array.from({ length: count }, (_, i) => overrides[i] ?? close);
  return makeBars(closes);
}
