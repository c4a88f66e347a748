// Weekdays and weekday-occurrence resolution.

import type { CalendarAdapter } from "./calendar.js";
import { RelativeDeltaError } from "./error.js";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * "The nth `weekday`": forward from the reference date when positive,
 * backward when negative.
 */
export interface WeekdaySpec {
  weekday: Weekday;
  occurrence: number;
}

export const ALL_WEEKDAYS: readonly Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

/** ISO 8601 day number: Monday=1, Sunday=7. */
export function weekdayNumber(day: Weekday): number {
  const map: Record<Weekday, number> = {
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
    sunday: 7,
  };
  return map[day];
}

export function weekdayFromNumber(n: number): Weekday | null {
  if (!Number.isInteger(n) || n < 1 || n > 7) return null;
  return ALL_WEEKDAYS[n - 1] ?? null;
}

export function parseWeekday(s: string): Weekday | null {
  const map: Record<string, Weekday> = {
    monday: "monday",
    mon: "monday",
    tuesday: "tuesday",
    tue: "tuesday",
    wednesday: "wednesday",
    wed: "wednesday",
    thursday: "thursday",
    thu: "thursday",
    friday: "friday",
    fri: "friday",
    saturday: "saturday",
    sat: "saturday",
    sunday: "sunday",
    sun: "sunday",
  };
  return map[s.trim().toLowerCase()] ?? null;
}

/** Euclidean modulo (always non-negative). */
function euclideanMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

export function nextWeekday(day: Weekday): Weekday {
  return ALL_WEEKDAYS[weekdayNumber(day) % 7];
}

export function previousWeekday(day: Weekday): Weekday {
  return ALL_WEEKDAYS[(weekdayNumber(day) + 5) % 7];
}

/** Days from `other` forward to `day`, in [0, 6]. */
export function daysSince(day: Weekday, other: Weekday): number {
  return euclideanMod(weekdayNumber(day) - weekdayNumber(other), 7);
}

export function isValidOccurrence(occurrence: number): boolean {
  return Number.isSafeInteger(occurrence) && occurrence !== 0;
}

/**
 * Signed day offset from a date falling on `current` to the requested
 * occurrence of `spec.weekday`. Occurrence 1 (or -1) includes the reference
 * date itself when it already matches.
 */
export function weekdayOffset(current: Weekday, spec: WeekdaySpec): number {
  if (!isValidOccurrence(spec.occurrence)) {
    throw RelativeDeltaError.invalidWeekdayOccurrence(spec.occurrence);
  }
  const n = spec.occurrence;
  if (n > 0) {
    return daysSince(spec.weekday, current) + 7 * (n - 1);
  }
  const back = daysSince(current, spec.weekday) + 7 * (-n - 1);
  return back === 0 ? 0 : -back;
}

/** Move `value` to the requested weekday occurrence, keeping its time. */
export function resolveWeekday<T>(
  calendar: CalendarAdapter<T>,
  value: T,
  spec: WeekdaySpec,
): T {
  const offset = weekdayOffset(calendar.dayOfWeek(value), spec);
  if (offset === 0) return value;
  return calendar.addDuration(value, { days: offset });
}
