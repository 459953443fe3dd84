import { describe, it, expect } from 'vitest';
import { convertToTimeSeries } from './convertToTimeSeries';
import { convertToBars } from './convertToBars';
import type { GrowthDataPoint } from '../types';
import { makeGrowthPoints } from '../test-fixtures';

describe('convertToTimeSeries', () => {
  it('keeps input order and passes metrics through', () => {
    const points: GrowthDataPoint[] = [
      { date: '2024-01-01', totalValue: 100, totalCost: 90, netReturn: 10, netReturnPct: 11.1, holdingCount: 3 },
      { date: '2024-01-02', totalValue: 110, totalCost: 95, netReturn: 15, netReturnPct: 15.8, holdingCount: 4 },
    ];

    expect(convertToTimeSeries(points, 25)).toEqual([
      { date: '2024-01-01', value: 125, cost: 90, netReturn: 10, netReturnPct: 11.1, holdingCount: 3 },
      { date: '2024-01-02', value: 135, cost: 95, netReturn: 15, netReturnPct: 15.8, holdingCount: 4 },
    ]);
  });

  it('leaves values unchanged with a zero balance', () => {
    const points = makeGrowthPoints([100, 110, 120]);
    const series = convertToTimeSeries(points, 0);

    expect(series.map((p) => [p.date, p.value])).toEqual([
      ['2024-01-01', 100],
      ['2024-01-02', 110],
      ['2024-01-03', 120],
    ]);
  });

  it('returns an empty array for empty or absent input', () => {
    expect(convertToTimeSeries([], 10)).toEqual([]);
    expect(convertToTimeSeries(undefined, 10)).toEqual([]);
    expect(convertToTimeSeries(null, 10)).toEqual([]);
  });

  it('subtracts a negative balance from the value only', () => {
    const [point] = convertToTimeSeries(makeGrowthPoints([500]), -200);
    expect(point).toEqual({
      date: '2024-01-01',
      value: 300,
      cost: 1000,
      netReturn: -500,
      netReturnPct: -50,
      holdingCount: 5,
    });
  });

  it('does not reorder unsorted input', () => {
    const points = makeGrowthPoints([1, 2, 3]).reverse();
    const series = convertToTimeSeries(points, 0);
    expect(series.map((p) => p.date)).toEqual(['2024-01-03', '2024-01-02', '2024-01-01']);
  });

  it('propagates NaN values', () => {
    const [point] = convertToTimeSeries(makeGrowthPoints([Number.NaN]), 10);
    expect(point?.value).toBeNaN();
  });

  it('matches bar closes in reverse order', () => {
    const points = makeGrowthPoints([100, 150, 125]);

    const series = convertToTimeSeries(points, 30).map((p) => p.value);
    const closes = convertToBars(points, 30).map((b) => b.close);

    expect(closes).toEqual([...series].reverse());
  });
});
