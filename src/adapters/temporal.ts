// Calendar adapters for the Temporal polyfill's PlainDateTime and
// ZonedDateTime.

import { Temporal } from "@js-temporal/polyfill";
import type {
  CalendarAdapter,
  DateTimeFields,
  DurationParts,
} from "../calendar.js";
import { RelativeDeltaError } from "../error.js";
import type { AbsoluteFields } from "../fields.js";
import { ALL_WEEKDAYS, type Weekday } from "../weekday.js";

type PDT = Temporal.PlainDateTime;
type ZDT = Temporal.ZonedDateTime;

interface TemporalSubsecond {
  millisecond: number;
  microsecond: number;
  nanosecond: number;
}

type RangeFailure = (
  message: string,
  cause: RangeError,
) => RelativeDeltaError;

const outOfRange: RangeFailure = (message, cause) =>
  RelativeDeltaError.dateOutOfRange(message, cause);

/**
 * Run a Temporal operation, reporting its RangeErrors through `fail`
 * (`dateOutOfRange` by default).
 */
function inRange<R>(
  what: string,
  fn: () => R,
  fail: RangeFailure = outOfRange,
): R {
  try {
    return fn();
  } catch (err) {
    if (err instanceof RangeError) {
      throw fail(`${what}: ${err.message}`, err);
    }
    throw err;
  }
}

function splitSubsecond(nanosecond: number): TemporalSubsecond {
  return {
    millisecond: Math.floor(nanosecond / 1_000_000),
    microsecond: Math.floor(nanosecond / 1_000) % 1_000,
    nanosecond: nanosecond % 1_000,
  };
}

function joinSubsecond(value: TemporalSubsecond): number {
  return (
    value.millisecond * 1_000_000 + value.microsecond * 1_000 + value.nanosecond
  );
}

function toTemporalFields(fields: Partial<DateTimeFields>) {
  const { nanosecond, ...rest } = fields;
  if (nanosecond === undefined) return rest;
  return { ...rest, ...splitSubsecond(nanosecond) };
}

function readFields(value: PDT | ZDT): DateTimeFields {
  return {
    year: value.year,
    month: value.month,
    day: value.day,
    hour: value.hour,
    minute: value.minute,
    second: value.second,
    nanosecond: joinSubsecond(value),
  };
}

function isoWeekday(value: PDT | ZDT): Weekday {
  return ALL_WEEKDAYS[value.dayOfWeek - 1];
}

function daysInIsoMonth(year: number, month: number): number {
  return inRange(`no month ${year}-${month}`, () =>
    Temporal.PlainYearMonth.from({ year, month }, { overflow: "reject" })
      .daysInMonth,
  );
}

// Temporal rejects durations whose fields have mixed signs, so each unit is
// added on its own.
const SINGLE_UNIT: Record<
  keyof DurationParts,
  (amount: number) => Temporal.DurationLike
> = {
  days: (days) => ({ days }),
  hours: (hours) => ({ hours }),
  minutes: (minutes) => ({ minutes }),
  seconds: (seconds) => ({ seconds }),
  nanoseconds: (nanoseconds) => ({ nanoseconds }),
};

const DURATION_UNITS: readonly (keyof DurationParts)[] = [
  "days",
  "hours",
  "minutes",
  "seconds",
  "nanoseconds",
];

function addEach<V>(
  value: V,
  duration: DurationParts,
  add: (value: V, duration: Temporal.DurationLike) => V,
): V {
  let result = value;
  for (const unit of DURATION_UNITS) {
    const amount = duration[unit] ?? 0;
    if (amount !== 0) {
      result = inRange(`cannot add ${amount} ${unit}`, () =>
        add(result, SINGLE_UNIT[unit](amount)),
      );
    }
  }
  return result;
}

export const plainDateTimeCalendar: CalendarAdapter<PDT> = {
  fields: readFields,
  with(value, fields) {
    return inRange("cannot build date-time", () =>
      value.with(toTemporalFields(fields), { overflow: "reject" }),
    );
  },
  daysInMonth: daysInIsoMonth,
  dayOfWeek: isoWeekday,
  addDuration(value, duration) {
    return addEach(value, duration, (v, d) => v.add(d));
  },
};

/**
 * Wall-clock fields and calendar days follow the value's own time zone;
 * hours and smaller units are exact elapsed time. Wall-clock times that fall
 * in a DST gap or fold resolve with the "compatible" disambiguation.
 */
export const zonedDateTimeCalendar: CalendarAdapter<ZDT> = {
  fields: readFields,
  with(value, fields) {
    return inRange("cannot build date-time", () =>
      value.with(toTemporalFields(fields), {
        overflow: "reject",
        disambiguation: "compatible",
        offset: "prefer",
      }),
    );
  },
  daysInMonth: daysInIsoMonth,
  dayOfWeek: isoWeekday,
  addDuration(value, duration) {
    return addEach(value, duration, (v, d) => v.add(d));
  },
};

/**
 * Build a PlainDateTime from the absolute fields alone. Year, month and day
 * are required; missing time fields default to midnight.
 */
export function toPlainDateTime(fields: AbsoluteFields): PDT {
  if (fields.year === null) throw RelativeDeltaError.missingField("year");
  if (fields.month === null) throw RelativeDeltaError.missingField("month");
  if (fields.day === null) throw RelativeDeltaError.missingField("day");
  const like = {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    ...splitSubsecond(fields.nanosecond ?? 0),
  };
  return inRange(
    `${like.year}-${like.month}-${like.day} is not a valid date-time`,
    () => Temporal.PlainDateTime.from(like, { overflow: "reject" }),
    (message, cause) =>
      new RelativeDeltaError("invalidField", message, { field: "day", cause }),
  );
}
