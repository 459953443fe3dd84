/**
 * Get growth history API
 *
 * Loads a portfolio's growth history document from disk.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';
import type { GrowthDataPoint, PortfolioSummary } from '../types';
import { isRecord, sanitizeGrowthHistory } from './growthHistorySanitize';

export interface GrowthHistory {
  portfolio: PortfolioSummary;
  growth: GrowthDataPoint[];
  removedPartial: number;
  removedDuplicate: number;
}

function parsePortfolioSummary(raw: unknown): PortfolioSummary | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { name, totalValue, externalBalanceTotal } = raw;
  if (typeof name !== 'string' || name.trim() === '' || typeof totalValue !== 'number') {
    return null;
  }
  // Portfolios without external accounts may omit the balance
  if (externalBalanceTotal === undefined) {
    return { name, totalValue, externalBalanceTotal: 0 };
  }
  if (typeof externalBalanceTotal !== 'number') {
    return null;
  }
  return { name, totalValue, externalBalanceTotal };
}

/**
 * Returns the growth history stored at filePath.
 *
 * The file holds `{ portfolio: { name, totalValue, externalBalanceTotal }, growth: [...] }`.
 * Growth points are sanitized (partial entries dropped, sorted, deduped).
 *
 * @returns History, or null if the file is missing or malformed
 */
export function getGrowthHistory(filePath: string): GrowthHistory | null {
  const fileName = basename(filePath);

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Could not read ${fileName}: ${message}`);
    return null;
  }

  if (!isRecord(document)) {
    console.warn(`${fileName} is not an object`);
    return null;
  }

  const { portfolio: rawPortfolio, growth: rawGrowth } = document;

  const portfolio = parsePortfolioSummary(rawPortfolio);
  if (!portfolio) {
    console.warn(`${fileName} has an invalid portfolio summary`);
    return null;
  }

  if (!Array.isArray(rawGrowth)) {
    console.warn(`${fileName} growth is not an array`);
    return null;
  }

  const { sanitized, removedPartial, removedDuplicate } = sanitizeGrowthHistory(rawGrowth);
  if (removedPartial > 0 || removedDuplicate > 0) {
    console.warn(
      `${fileName}: dropped ${removedPartial} partial and ${removedDuplicate} duplicate point(s)`
    );
  }

  return { portfolio, growth: sanitized, removedPartial, removedDuplicate };
}
