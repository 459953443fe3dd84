/**
 * Growth history configuration
 *
 * Resolves file locations and the external balance override from the environment.
 */

import { isAbsolute, join } from 'path';

type Env = Record<string, string | undefined>;

export interface HistoryConfig {
  historyPath: string;
  outputDir: string;
  externalBalanceOverride?: number;
}

const DEFAULT_HISTORY_PATH = join('data', 'portfolio-history.json');
const DEFAULT_OUTPUT_DIR = 'public';

// Plain signed decimal: no hex, binary or exponent forms
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function resolveFromCwd(raw: string | undefined, fallback: string, cwd: string): string {
  const value = raw && raw.trim() !== '' ? raw.trim() : fallback;
  return isAbsolute(value) ? value : join(cwd, value);
}

/**
 * Get external balance override.
 *
 * - If unset or blank: undefined (use the history file's value)
 * - If not a plain decimal number: warns and returns undefined
 */
export function getExternalBalanceOverride(env: Env = process.env): number | undefined {
  const raw = env.PORTFOLIO_EXTERNAL_BALANCE;
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const trimmed = raw.trim();
  const parsed = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    console.warn(
      `⚠️  Invalid PORTFOLIO_EXTERNAL_BALANCE="${raw}". Using the history file's external balance.`
    );
    return undefined;
  }
  return parsed;
}

export function getHistoryConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): HistoryConfig {
  return {
    historyPath: resolveFromCwd(env.PORTFOLIO_HISTORY_PATH, DEFAULT_HISTORY_PATH, cwd),
    outputDir: resolveFromCwd(env.PORTFOLIO_OUTPUT_DIR, DEFAULT_OUTPUT_DIR, cwd),
    externalBalanceOverride: getExternalBalanceOverride(env),
  };
}
