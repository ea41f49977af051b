// =============================================================================
// @cadence/shared — Context accumulator
// =============================================================================
// Shows a coarse report the recent summaries of the next-finer cadence:
// the weekly report sees the last 7 dailies, the monthly the last 4
// weeklies, and so on up to annual.
// =============================================================================

import { cadenceLabel, type Cadence } from "../cadence.js";
import type { HistoryStore } from "../types.js";

export interface ContextSource {
  cadence: Cadence;
  count: number;
}

export function contextSourceFor(cadence: Cadence): ContextSource | null {
  switch (cadence) {
    case "daily":
      return null;
    case "weekly":
      return { cadence: "daily", count: 7 };
    case "monthly":
      return { cadence: "weekly", count: 4 };
    case "quarterly":
      return { cadence: "monthly", count: 3 };
    case "semiAnnual":
      return { cadence: "quarterly", count: 2 };
    case "annual":
      return { cadence: "semiAnnual", count: 2 };
  }
}

/**
 * Renders the accumulated context block for `cadence`, or "" when the
 * cadence has no source or the source has no history yet.
 */
export function buildContext(cadence: Cadence, store: HistoryStore): string {
  const source = contextSourceFor(cadence);
  if (!source) return "";

  const entries = store[source.cadence].slice(-source.count);
  if (entries.length === 0) return "";

  return [
    `[Last ${entries.length} ${cadenceLabel(source.cadence)} report summaries]`,
    ...entries.map((entry) => `- ${entry.date}: ${entry.summary}`),
  ].join("\n");
}
