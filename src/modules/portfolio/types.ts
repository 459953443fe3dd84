/**
 * Portfolio module types
 *
 * Core type definitions for portfolio growth history, price bars and indicators.
 */

// Calendar date (YYYY-MM-DD), passed through untouched
export type IsoDate = string;

// Daily growth snapshot (ascending by date, oldest first)
export interface GrowthDataPoint {
  date: IsoDate;
  totalValue: number;
  totalCost: number;
  netReturn: number;
  netReturnPct: number;
  holdingCount: number;
}

// Synthetic OHLC bar - all price fields carry the same value
export interface PriceBar {
  date: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number;
}

// Analytic point (same order as the growth input)
export interface TimeSeriesPoint {
  date: IsoDate;
  value: number; // totalValue + external balance
  cost: number;
  netReturn: number;
  netReturnPct: number;
  holdingCount: number;
}

export type CrossoverResult = 'golden_cross' | 'death_cross' | 'none';

export type PortfolioTrend = 'bullish' | 'bearish' | 'neutral';

// Portfolio-level figures supplied alongside the growth history
export interface PortfolioSummary {
  name: string;
  totalValue: number; // holdings only
  externalBalanceTotal: number; // cash and accounts outside tracked holdings
}

export interface PortfolioIndicators {
  portfolioName: string;
  computeDate: string; // ISO timestamp
  currentValue: number;
  dataPoints: number;
  ema20: number; // 0 when fewer than 20 bars
  ema50: number;
  ema200: number;
  aboveEma20: boolean;
  aboveEma50: boolean;
  aboveEma200: boolean;
  ema50CrossEma200: CrossoverResult;
  trend: PortfolioTrend;
  trendDescription: string;
  timeSeries?: TimeSeriesPoint[];
}

// On-disk growth history document
export interface PortfolioHistoryFile {
  portfolio: PortfolioSummary;
  growth: GrowthDataPoint[];
}
