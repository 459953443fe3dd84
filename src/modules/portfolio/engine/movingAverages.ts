/**
 * Moving average calculations
 *
 * Pure functions for computing SMA and EMA, both over plain value arrays
 * (oldest first) and over price bars (newest first).
 */

import type { PriceBar } from '../types';

/**
 * Calculate EMA smoothing factor
 */
export function emaMultiplier(period: number): number {
  return 2 / (period + 1);
}

/**
 * Rolling SMA over oldest-first values.
 *
 * Slots before the first full window are undefined; a non-positive window
 * yields no averages at all.
 */
export function calcSMA(values: readonly number[], window: number): (number | undefined)[] {
  const result: (number | undefined)[] = values.map(() => undefined);
  if (window <= 0) {
    return result;
  }

  let sum = 0;
  values.forEach((value, i) => {
    sum += value;
    if (i >= window) {
      sum -= values[i - window] ?? 0;
    }
    if (i >= window - 1) {
      result[i] = sum / window;
    }
  });

  return result;
}

/**
 * Calculate Exponential Moving Average (EMA)
 *
 * Seeded with the SMA of the first `window` values.
 *
 * @param values Array of numeric values (oldest first)
 * @param window Window size (number of periods)
 * @returns Array of EMA values (same length as input, undefined for first window-1 values)
 */
export function calcEMA(values: number[], window: number): (number | undefined)[] {
  if (window <= 0 || values.length < window) {
    return values.map(() => undefined);
  }

  const result: (number | undefined)[] = [];
  const multiplier = emaMultiplier(window);

  let ema = values.slice(0, window).reduce((a, b) => a + b, 0) / window;
  for (let i = 0; i < window - 1; i++) {
    result.push(undefined);
  }
  result.push(ema);

  for (const value of values.slice(window)) {
    ema = (value - ema) * multiplier + ema;
    result.push(ema);
  }

  return result;
}

/**
 * SMA of the newest `period` closes.
 *
 * @param bars Price bars, newest first
 * @returns Average, or 0 if fewer than `period` bars
 */
export function smaOfBars(bars: readonly PriceBar[], period: number): number {
  if (period <= 0 || bars.length < period) {
    return 0;
  }

  let sum = 0;
  for (const bar of bars.slice(0, period)) {
    sum += bar.close;
  }
  return sum / period;
}

/**
 * EMA of closes over newest-first bars.
 *
 * Seed: SMA of the oldest `period` bars in the slice.
 * Then the recurrence runs oldest -> newest across the newest `period` bars.
 *
 * @param bars Price bars, newest first
 * @returns Latest EMA value, or 0 if fewer than `period` bars
 */
export function emaOfBars(bars: readonly PriceBar[], period: number): number {
  if (period <= 0 || bars.length < period) {
    return 0;
  }

  const multiplier = emaMultiplier(period);
  let ema = smaOfBars(bars.slice(bars.length - period), period);

  for (let i = period - 1; i >= 0; i--) {
    ema = (bars[i]!.close - ema) * multiplier + ema;
  }

  return ema;
}
