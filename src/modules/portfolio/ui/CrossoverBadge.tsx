/**
 * CrossoverBadge component
 *
 * Shows the latest EMA50/EMA200 crossover, if any.
 */

import type { CrossoverResult } from '../types';

interface CrossoverBadgeProps {
  result: CrossoverResult;
}

export function CrossoverBadge({ result }: CrossoverBadgeProps) {
  if (result === 'none') {
    return null;
  }

  if (result === 'golden_cross') {
    return (
      <span className="inline-flex items-center gap-1 rounded border border-green-500/30 bg-green-600/20 px-2 py-0.5 text-xs font-semibold text-green-300">
        GOLDEN CROSS
      </span>
    );
  }

  return (
    <span className="inline-flex items-center gap-1 rounded border border-red-500/30 bg-red-600/20 px-2 py-0.5 text-xs font-semibold text-red-300">
      DEATH CROSS
    </span>
  );
}
