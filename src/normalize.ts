// Normalization — folds out-of-range relative units into their parent unit.

import { RelativeDeltaError } from "./error.js";
import {
  clean,
  NANOS_PER_SECOND,
  RELATIVE_UNITS,
  type RelativeFields,
  type RelativeUnit,
  relativeOf,
} from "./fields.js";

interface Carry {
  child: RelativeUnit;
  parent: RelativeUnit;
  base: number;
}

// Smallest unit first so every carry sees the previous one's contribution.
const CARRIES: readonly Carry[] = [
  { child: "nanoseconds", parent: "seconds", base: NANOS_PER_SECOND },
  { child: "seconds", parent: "minutes", base: 60 },
  { child: "minutes", parent: "hours", base: 60 },
  { child: "hours", parent: "days", base: 24 },
  { child: "months", parent: "years", base: 12 },
];

/**
 * Fold each relative unit into its parent with a truncating quotient and a
 * remainder that keeps the dividend's sign, so `-25 hours` becomes
 * `-1 day, -1 hour`. Throws `overflow` when a parent leaves the safe integer
 * range.
 */
export function normalizeRelative(fields: RelativeFields): RelativeFields {
  const out = relativeOf(fields);
  for (const { child, parent, base } of CARRIES) {
    const value = out[child];
    const remainder = value % base;
    // Exact for safe integers, unlike Math.trunc(value / base).
    const quotient = (value - remainder) / base;
    if (quotient === 0) continue;
    const carried = out[parent] + quotient;
    if (!Number.isSafeInteger(carried)) {
      throw RelativeDeltaError.overflow(
        parent,
        `carrying ${child} into ${parent} overflows the safe integer range`,
      );
    }
    out[child] = clean(remainder);
    out[parent] = carried;
  }
  return out;
}

export type FractionalParts = Partial<RelativeFields>;

function finite(parts: FractionalParts, unit: RelativeUnit): number {
  const value = parts[unit] ?? 0;
  if (!Number.isFinite(value)) {
    throw RelativeDeltaError.conversion(
      unit,
      `${unit} must be a finite number, got ${value}`,
    );
  }
  return value;
}

/**
 * Convert real-valued offsets to integer fields, pushing each unit's fraction
 * down to the next smaller unit: years to months, days to hours, hours to
 * minutes, minutes to seconds, seconds to nanoseconds. The fraction of a
 * month is dropped, as a month has no fixed length in days.
 *
 * The cascade runs in floating point, so results can differ by a unit in the
 * last place from an exact rational computation.
 */
export function cascadeFractional(parts: FractionalParts): RelativeFields {
  const years = finite(parts, "years");
  const months = finite(parts, "months");
  const days = finite(parts, "days");
  const hours = finite(parts, "hours");
  const minutes = finite(parts, "minutes");
  const seconds = finite(parts, "seconds");
  const nanoseconds = finite(parts, "nanoseconds");

  const wholeYears = Math.trunc(years);
  const monthsTotal = (years - wholeYears) * 12 + months;
  const wholeMonths = Math.trunc(monthsTotal);

  const wholeDays = Math.trunc(days);
  const hoursTotal = (days - wholeDays) * 24 + hours;
  const wholeHours = Math.trunc(hoursTotal);

  const minutesTotal = (hoursTotal - wholeHours) * 60 + minutes;
  const wholeMinutes = Math.trunc(minutesTotal);

  const secondsTotal = (minutesTotal - wholeMinutes) * 60 + seconds;
  const wholeSeconds = Math.trunc(secondsTotal);

  const nanosTotal =
    Math.trunc((secondsTotal - wholeSeconds) * NANOS_PER_SECOND) +
    Math.trunc(nanoseconds);

  const out: RelativeFields = {
    years: clean(wholeYears),
    months: clean(wholeMonths),
    days: clean(wholeDays),
    hours: clean(wholeHours),
    minutes: clean(wholeMinutes),
    seconds: clean(wholeSeconds),
    nanoseconds: clean(nanosTotal),
  };
  for (const unit of RELATIVE_UNITS) {
    if (!Number.isSafeInteger(out[unit])) {
      throw RelativeDeltaError.conversion(
        unit,
        `${unit} ${out[unit]} cannot be represented as a safe integer`,
      );
    }
  }
  return out;
}
