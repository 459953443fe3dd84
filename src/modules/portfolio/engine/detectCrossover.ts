/**
 * EMA crossover detection engine
 *
 * Pure function that classifies the fast/slow EMA relationship between the
 * two most recent bars. No I/O, no state.
 */

import type { CrossoverResult, PriceBar } from '../types';
import { emaOfBars } from './movingAverages';

export const FAST_EMA_PERIOD = 50;
export const SLOW_EMA_PERIOD = 200;

// Slow EMA for the current bar plus one prior bar for the previous value
export const MIN_CROSSOVER_BARS = SLOW_EMA_PERIOD + 1;

export interface EmaPair {
  fast: number;
  slow: number;
}

/**
 * Classifies the move between two fast/slow samples.
 * The previous sample counts a tie (<= / >=); the current one must be strict.
 */
export function classifyCrossover(previous: EmaPair, current: EmaPair): CrossoverResult {
  if (current.fast > current.slow && previous.fast <= previous.slow) {
    return 'golden_cross';
  }

  if (current.fast < current.slow && previous.fast >= previous.slow) {
    return 'death_cross';
  }

  return 'none';
}

/**
 * Detects an EMA50 / EMA200 crossover on the latest bar.
 *
 * - golden_cross: fast <= slow on the previous bar AND fast > slow now
 * - death_cross: fast >= slow on the previous bar AND fast < slow now
 * - none: anything else, including fewer than 201 bars
 *
 * Callers that need to tell "not enough history" apart from "no cross"
 * must check bars.length themselves.
 *
 * @param bars Price bars, newest first (bars[0] is the most recent)
 */
export function detectCrossover(bars: readonly PriceBar[]): CrossoverResult {
  if (bars.length < MIN_CROSSOVER_BARS) {
    return 'none';
  }

  const previousBars = bars.slice(1);

  return classifyCrossover(
    {
      fast: emaOfBars(previousBars, FAST_EMA_PERIOD),
      slow: emaOfBars(previousBars, SLOW_EMA_PERIOD),
    },
    {
      fast: emaOfBars(bars, FAST_EMA_PERIOD),
      slow: emaOfBars(bars, SLOW_EMA_PERIOD),
    }
  );
}
