/**
 * Growth history sanitization utilities
 *
 * Removes partial-schema points and duplicate dates from growth history arrays.
 */

import type { GrowthDataPoint } from '../types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a growth point with the full required schema
 *
 * Requires ALL of:
 * - date (YYYY-MM-DD string)
 * - totalValue, totalCost, netReturn, netReturnPct (number)
 * - holdingCount (non-negative integer)
 *
 * Non-finite numbers are accepted; they flow through the recurrences as-is.
 */
export function hasFullGrowthSchema(point: unknown): point is GrowthDataPoint {
  if (!isRecord(point)) {
    return false;
  }

  if (typeof point.date !== 'string' || !ISO_DATE.test(point.date)) {
    return false;
  }

  for (const key of ['totalValue', 'totalCost', 'netReturn', 'netReturnPct'] as const) {
    if (typeof point[key] !== 'number') {
      return false;
    }
  }

  const { holdingCount } = point;
  if (typeof holdingCount !== 'number' || !Number.isInteger(holdingCount) || holdingCount < 0) {
    return false;
  }

  return true;
}

/**
 * Sanitize growth history by removing partial-schema points
 *
 * @param history Raw history array (parsed JSON)
 * @returns Sanitized history (sorted by date ascending, deduped keeping the last occurrence)
 */
export function sanitizeGrowthHistory(history: readonly unknown[]): {
  sanitized: GrowthDataPoint[];
  removedPartial: number;
  removedDuplicate: number;
} {
  let removedPartial = 0;

  const valid: GrowthDataPoint[] = [];
  for (const point of history) {
    if (!hasFullGrowthSchema(point)) {
      removedPartial++;
      continue;
    }
    valid.push({
      date: point.date,
      totalValue: point.totalValue,
      totalCost: point.totalCost,
      netReturn: point.netReturn,
      netReturnPct: point.netReturnPct,
      holdingCount: point.holdingCount,
    });
  }

  // Dedupe by date (last occurrence wins), then sort ascending
  const byDate = new Map<string, GrowthDataPoint>();
  for (const point of valid) {
    byDate.set(point.date, point);
  }
  const sanitized = Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));

  return {
    sanitized,
    removedPartial,
    removedDuplicate: valid.length - sanitized.length,
  };
}
