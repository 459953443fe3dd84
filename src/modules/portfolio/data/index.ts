/**
 * Portfolio data layer exports
 */

export { getGrowthHistory } from './getGrowthHistory';
export type { GrowthHistory } from './getGrowthHistory';
export { sanitizeGrowthHistory, hasFullGrowthSchema } from './growthHistorySanitize';
export { getHistoryConfig, getExternalBalanceOverride } from './historyConfig';
export type { HistoryConfig } from './historyConfig';
