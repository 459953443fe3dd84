import { describe, it, expect } from 'vitest';
import { calcEMA, calcSMA, emaMultiplier, emaOfBars, smaOfBars } from './movingAverages';
import { makeBars, makeFlatBars } from '../test-fixtures';

describe('calcSMA', () => {
  it('leaves the warm-up slots undefined', () => {
    expect(calcSMA([1, 2, 3, 4], 2)).toEqual([undefined, 1.5, 2.5, 3.5]);
  });

  it('drops values that leave the window', () => {
    expect(calcSMA([10, 20, 30, 40, 50], 3)).toEqual([undefined, undefined, 20, 30, 40]);
  });

  it('returns all undefined for a non-positive window or a short series', () => {
    expect(calcSMA([1, 2], 0)).toEqual([undefined, undefined]);
    expect(calcSMA([1, 2], 3)).toEqual([undefined, undefined]);
    expect(calcSMA([], 2)).toEqual([]);
  });
});

describe('calcEMA', () => {
  it('seeds with the SMA of the first window', () => {
    const result = calcEMA([1, 2, 3, 4], 2);

    expect(result[0]).toBeUndefined();
    expect(result[1]).toBe(1.5);
    expect(result[2]).toBeCloseTo(2.5, 10);
    expect(result[3]).toBeCloseTo(3.5, 10);
  });

  it('returns all undefined when the series is shorter than the window', () => {
    expect(calcEMA([1, 2, 3], 5)).toEqual([undefined, undefined, undefined]);
  });
});

describe('emaMultiplier', () => {
  it('is 2 / (period + 1)', () => {
    expect(emaMultiplier(50)).toBe(2 / 51);
    expect(emaMultiplier(1)).toBe(1);
  });
});

describe('smaOfBars', () => {
  it('averages the newest closes', () => {
    // Newest first: 4 is the latest close
    expect(smaOfBars(makeBars([4, 3, 2, 1]), 2)).toBe(3.5);
  });

  it('returns 0 when there are too few bars', () => {
    expect(smaOfBars(makeBars([4, 3]), 3)).toBe(0);
  });
});

describe('emaOfBars', () => {
  it('seeds from the oldest bars and walks to the newest', () => {
    // seed = avg(2, 1) = 1.5, then 3 -> 2.5, then 4 -> 3.5
    expect(emaOfBars(makeBars([4, 3, 2, 1]), 2)).toBeCloseTo(3.5, 10);
  });

  it('only walks the newest period bars', () => {
    // seed = avg(10, 10) = 10; walk 0 then 0
    // 10 + (0 - 10) * 2/3 = 3.333..., then 3.333... * 1/3 = 1.111...
    expect(emaOfBars(makeBars([0, 0, 10, 10]), 2)).toBeCloseTo(10 / 9, 10);
  });

  it('returns the constant for flat data', () => {
    expect(emaOfBars(makeFlatBars(250, 100), 50)).toBe(100);
    expect(emaOfBars(makeFlatBars(250, 100), 200)).toBe(100);
  });

  it('returns 0 when there are too few bars', () => {
    expect(emaOfBars(makeFlatBars(199, 100), 200)).toBe(0);
  });
});
