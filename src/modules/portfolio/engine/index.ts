/**
 * Portfolio engine exports
 *
 * Pure engine functions - no React, no DOM, no file system.
 */

export { convertToBars } from './convertToBars';
export { convertToTimeSeries } from './convertToTimeSeries';
export {
  detectCrossover,
  classifyCrossover,
  FAST_EMA_PERIOD,
  SLOW_EMA_PERIOD,
  MIN_CROSSOVER_BARS,
} from './detectCrossover';
export { calcSMA, calcEMA, smaOfBars, emaOfBars, emaMultiplier } from './movingAverages';
export { determineTrend, describeTrend } from './classifyTrend';
export type { TrendInputs } from './classifyTrend';
export type { EmaPair } from './detectCrossover';
export { computePortfolioIndicators } from './portfolioIndicators';
export type { ComputeIndicatorsOptions } from './portfolioIndicators';
