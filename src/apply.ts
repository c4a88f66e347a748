// Applicator — combines delta fields with a concrete date-time through a
// CalendarAdapter.

import { negateRelative } from "./arithmetic.js";
import type { CalendarAdapter } from "./calendar.js";
import type { DeltaFields } from "./fields.js";
import { resolveWeekday } from "./weekday.js";

/** Floor division helpers for the month wraparound. */
function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

function euclideanMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

/**
 * Apply `delta` to `base`:
 *
 * 1. year: absolute override (or base year) plus relative years
 * 2. month: absolute override (or base month) plus relative months, wrapped
 *    into 1..12 with the excess carried into the year
 * 3. day: absolute override (or base day), clamped to the month's length
 * 4. relative days, added calendar-aware
 * 5. absolute time-of-day overrides, then relative hours to nanoseconds
 * 6. weekday occurrence, if any
 *
 * Throws `dateOutOfRange` when the calendar cannot represent a value along
 * the way.
 */
export function applyDelta<T>(
  calendar: CalendarAdapter<T>,
  delta: DeltaFields,
  base: T,
): T {
  const original = calendar.fields(base);

  let year = (delta.year ?? original.year) + delta.years;
  const monthIndex = (delta.month ?? original.month) - 1 + delta.months;
  year += floorDiv(monthIndex, 12);
  const month = euclideanMod(monthIndex, 12) + 1;

  const maxDay = calendar.daysInMonth(year, month);
  const day = Math.min(delta.day ?? original.day, maxDay);

  let result = calendar.with(base, { year, month, day });
  if (delta.days !== 0) {
    result = calendar.addDuration(result, { days: delta.days });
  }

  const provisional = calendar.fields(result);
  result = calendar.with(result, {
    hour: delta.hour ?? provisional.hour,
    minute: delta.minute ?? provisional.minute,
    second: delta.second ?? provisional.second,
    nanosecond: delta.nanosecond ?? provisional.nanosecond,
  });
  if (
    delta.hours !== 0 ||
    delta.minutes !== 0 ||
    delta.seconds !== 0 ||
    delta.nanoseconds !== 0
  ) {
    result = calendar.addDuration(result, {
      hours: delta.hours,
      minutes: delta.minutes,
      seconds: delta.seconds,
      nanoseconds: delta.nanoseconds,
    });
  }

  if (delta.weekday !== null) {
    result = resolveWeekday(calendar, result, delta.weekday);
  }
  return result;
}

/**
 * Subtract `delta` from `base`: the relative fields are applied with their
 * sign flipped while absolute overrides and the weekday still take effect.
 */
export function subtractDelta<T>(
  calendar: CalendarAdapter<T>,
  delta: DeltaFields,
  base: T,
): T {
  return applyDelta(calendar, { ...delta, ...negateRelative(delta) }, base);
}
