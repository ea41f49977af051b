// =============================================================================
// @cadence/shared — Schedule engine
// =============================================================================
// Decides which cadences fire on a given run. Pure: the caller supplies the
// instant, and the UTC calendar date of that instant decides.
//
//   daily       every run
//   weekly      Saturdays
//   monthly     1st of every month
//   quarterly   1st of Jan/Apr/Jul/Oct
//   semiAnnual  1st of Jan/Jul
//   annual      1st of Jan
// =============================================================================

import { CADENCES, type Cadence } from "./cadence.js";
import type { CivilDate, ScheduleDecision } from "./types.js";

const SATURDAY = 6;

export function toCivilDate(instant: Date): CivilDate {
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
    weekday: instant.getUTCDay(),
  };
}

export function isCadenceDue(cadence: Cadence, date: CivilDate): boolean {
  const firstOfMonth = date.day === 1;
  switch (cadence) {
    case "daily":
      return true;
    case "weekly":
      return date.weekday === SATURDAY;
    case "monthly":
      return firstOfMonth;
    case "quarterly":
      return firstOfMonth && [1, 4, 7, 10].includes(date.month);
    case "semiAnnual":
      return firstOfMonth && (date.month === 1 || date.month === 7);
    case "annual":
      return firstOfMonth && date.month === 1;
  }
}

/** Due cadences in fixed order, finest first; always starts with daily. */
export function dueCadences(now: Date): ScheduleDecision {
  const date = toCivilDate(now);
  return CADENCES.filter((cadence) => isCadenceDue(cadence, date));
}
