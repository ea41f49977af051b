// =============================================================================
// @cadence/shared — Report cadences
// =============================================================================
// The six report frequencies, finest first. Everything keyed by cadence
// (labels, templates, context sources, retention) switches over this union
// so the compiler flags a missing case.
// =============================================================================

export const CADENCES = [
  "daily",
  "weekly",
  "monthly",
  "quarterly",
  "semiAnnual",
  "annual",
] as const;

export type Cadence = (typeof CADENCES)[number];

export function isCadence(value: string): value is Cadence {
  return CADENCES.some((cadence) => cadence === value);
}

/** Human-readable name used in email subjects, banners and context headers. */
export function cadenceLabel(cadence: Cadence): string {
  switch (cadence) {
    case "daily":
      return "Daily Briefing";
    case "weekly":
      return "Weekly Strategy";
    case "monthly":
      return "Monthly Strategy";
    case "quarterly":
      return "Quarterly Strategy";
    case "semiAnnual":
      return "Semi-Annual Strategy";
    case "annual":
      return "Annual Strategy";
  }
}
