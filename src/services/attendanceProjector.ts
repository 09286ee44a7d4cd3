// src/services/attendanceProjector.ts
import type { ClassesNeeded } from "../types/attendance";

// Anything above this is treated as a computation fault, not a plan
const MAX_PLAUSIBLE_CLASSES = 1000;

const classes = (count: number): ClassesNeeded => ({ kind: "classes", count });

/**
 * Minimum number of consecutive classes to attend so that
 * (present + x) / (total + x) reaches targetPercentage.
 */
export function classesNeeded(
  present: number,
  total: number,
  targetPercentage: number
): ClassesNeeded {
  if (total === 0) return classes(0);

  const currentPercentage = (present / total) * 100;
  if (currentPercentage >= targetPercentage) return classes(0);

  // Every future class also counts toward the total, so 100% stays out of reach
  if (targetPercentage === 100) return { kind: "unreachable" };

  const needed = Math.ceil(
    (targetPercentage * total - 100 * present) / (100 - targetPercentage)
  );

  if (!Number.isFinite(needed) || needed < 0 || needed > MAX_PLAUSIBLE_CLASSES) {
    return classes(0);
  }
  return classes(needed);
}

/**
 * How many of the next `upcomingClasses` can be missed while the percentage
 * over all held classes stays at or above targetPercentage.
 */
export function classesCanMiss(
  present: number,
  total: number,
  targetPercentage: number,
  upcomingClasses: number
): number {
  if (total === 0) return upcomingClasses;
  if (upcomingClasses <= 0) return 0;

  const currentPercentage = (present / total) * 100;
  if (currentPercentage < targetPercentage) return 0;

  const futureTotal = total + upcomingClasses;
  const futurePresent = present + upcomingClasses;
  const maxSkip = Math.floor(futurePresent - (targetPercentage * futureTotal) / 100);

  if (!Number.isFinite(maxSkip)) return 0;
  return Math.max(0, Math.min(maxSkip, upcomingClasses));
}

export function isUnreachable(result: ClassesNeeded): result is { kind: "unreachable" } {
  return result.kind === "unreachable";
}
