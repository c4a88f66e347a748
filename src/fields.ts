// Field model shared by the builder, the arithmetic engine and the applicator.

import { RelativeDeltaError } from "./error.js";
import {
  ALL_WEEKDAYS,
  isValidOccurrence,
  type WeekdaySpec,
} from "./weekday.js";

export const NANOS_PER_SECOND = 1_000_000_000;

export type RelativeUnit =
  | "years"
  | "months"
  | "days"
  | "hours"
  | "minutes"
  | "seconds"
  | "nanoseconds";

export type AbsoluteUnit =
  | "year"
  | "month"
  | "day"
  | "hour"
  | "minute"
  | "second"
  | "nanosecond";

/** Largest to smallest. */
export const RELATIVE_UNITS: readonly RelativeUnit[] = [
  "years",
  "months",
  "days",
  "hours",
  "minutes",
  "seconds",
  "nanoseconds",
];

export const ABSOLUTE_UNITS: readonly AbsoluteUnit[] = [
  "year",
  "month",
  "day",
  "hour",
  "minute",
  "second",
  "nanosecond",
];

export type RelativeFields = Record<RelativeUnit, number>;
export type AbsoluteFields = Record<AbsoluteUnit, number | null>;

export interface DeltaFields extends RelativeFields, AbsoluteFields {
  weekday: WeekdaySpec | null;
}

type BoundedUnit = Exclude<AbsoluteUnit, "year">;

const BOUNDED_UNITS: readonly BoundedUnit[] = [
  "month",
  "day",
  "hour",
  "minute",
  "second",
  "nanosecond",
];

/** Inclusive bounds for absolute fields; `year` is any safe integer. */
export const ABSOLUTE_BOUNDS: Record<BoundedUnit, readonly [number, number]> = {
  month: [1, 12],
  day: [1, 31],
  hour: [0, 23],
  minute: [0, 59],
  second: [0, 59],
  nanosecond: [0, NANOS_PER_SECOND - 1],
};

export function zeroRelative(): RelativeFields {
  return {
    years: 0,
    months: 0,
    days: 0,
    hours: 0,
    minutes: 0,
    seconds: 0,
    nanoseconds: 0,
  };
}

export function emptyAbsolute(): AbsoluteFields {
  return {
    year: null,
    month: null,
    day: null,
    hour: null,
    minute: null,
    second: null,
    nanosecond: null,
  };
}

export function emptyFields(): DeltaFields {
  return { ...zeroRelative(), ...emptyAbsolute(), weekday: null };
}

/** Collapse `-0` to `0`; field-wise equality compares with `===`. */
export function clean(n: number): number {
  return n === 0 ? 0 : n;
}

function cleanOptional(n: number | null): number | null {
  return n === null ? null : clean(n);
}

export function relativeOf(fields: RelativeFields): RelativeFields {
  return {
    years: clean(fields.years),
    months: clean(fields.months),
    days: clean(fields.days),
    hours: clean(fields.hours),
    minutes: clean(fields.minutes),
    seconds: clean(fields.seconds),
    nanoseconds: clean(fields.nanoseconds),
  };
}

export function absoluteOf(fields: AbsoluteFields): AbsoluteFields {
  return {
    year: cleanOptional(fields.year),
    month: cleanOptional(fields.month),
    day: cleanOptional(fields.day),
    hour: cleanOptional(fields.hour),
    minute: cleanOptional(fields.minute),
    second: cleanOptional(fields.second),
    nanosecond: cleanOptional(fields.nanosecond),
  };
}

/**
 * Check every field against the model's input rules. Relative fields must be
 * safe integers, absolute fields integers within their bounds and the weekday
 * occurrence a nonzero integer.
 */
export function validateFields(fields: DeltaFields): void {
  for (const unit of RELATIVE_UNITS) {
    const value = fields[unit];
    if (!Number.isSafeInteger(value)) {
      throw RelativeDeltaError.invalidField(
        unit,
        `${unit} must be a safe integer, got ${value}`,
      );
    }
  }

  if (fields.year !== null && !Number.isSafeInteger(fields.year)) {
    throw RelativeDeltaError.invalidField(
      "year",
      `invalid year ${fields.year}`,
    );
  }
  for (const unit of BOUNDED_UNITS) {
    const value = fields[unit];
    if (value === null) continue;
    const [min, max] = ABSOLUTE_BOUNDS[unit];
    if (!Number.isInteger(value) || value < min || value > max) {
      throw RelativeDeltaError.invalidField(unit, `invalid ${unit} ${value}`);
    }
  }

  if (fields.weekday !== null) {
    const { weekday, occurrence } = fields.weekday;
    if (!ALL_WEEKDAYS.includes(weekday)) {
      throw RelativeDeltaError.invalidField(
        "weekday",
        `unknown weekday ${weekday}`,
      );
    }
    if (!isValidOccurrence(occurrence)) {
      throw RelativeDeltaError.invalidWeekdayOccurrence(occurrence);
    }
  }
}

export function fieldsEqual(a: DeltaFields, b: DeltaFields): boolean {
  for (const unit of RELATIVE_UNITS) {
    if (a[unit] !== b[unit]) return false;
  }
  for (const unit of ABSOLUTE_UNITS) {
    if (a[unit] !== b[unit]) return false;
  }
  if (a.weekday === null || b.weekday === null) {
    return a.weekday === b.weekday;
  }
  return (
    a.weekday.weekday === b.weekday.weekday &&
    a.weekday.occurrence === b.weekday.occurrence
  );
}
