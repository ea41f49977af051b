// =============================================================================
// @cadence/shared — Top-fraction selector
// =============================================================================

import type { ScoredItem } from "./types.js";

export const TOP_FRACTION = 0.05;
export const MIN_SELECTED = 3;

/**
 * Keeps the best max(3, floor(5% of n)) items, highest score first. Ties
 * keep their input order (Array.prototype.sort is stable).
 */
export function selectTopFraction(
  scored: readonly ScoredItem[],
): ScoredItem[] {
  if (scored.length === 0) return [];

  const count = Math.max(MIN_SELECTED, Math.floor(scored.length * TOP_FRACTION));
  return [...scored].sort((a, b) => b.score - a.score).slice(0, count);
}
