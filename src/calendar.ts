// Calendar collaborator: the small capability set the applicator needs from
// a concrete date-time type.

import type { Weekday } from "./weekday.js";

export interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
}

/** Signed offsets to add to a date-time. Omitted units are zero. */
export interface DurationParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  nanoseconds?: number;
}

/**
 * Adapter between the delta engine and one date-time type.
 *
 * Implementations must be calendar-aware: `addDuration` carries across
 * month and year boundaries, and every method throws a
 * `RelativeDeltaError` of kind `dateOutOfRange` when the result cannot be
 * represented.
 */
export interface CalendarAdapter<T> {
  fields(value: T): DateTimeFields;
  /** Replace the given fields, keeping the rest (and any zone) from `value`. */
  with(value: T, fields: Partial<DateTimeFields>): T;
  daysInMonth(year: number, month: number): number;
  dayOfWeek(value: T): Weekday;
  addDuration(value: T, duration: DurationParts): T;
}
