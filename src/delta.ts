// RelativeDelta and its builder — the public value type.

import { applyDelta, subtractDelta } from "./apply.js";
import {
  addFields,
  negateFields,
  scaleFields,
  subtractFields,
} from "./arithmetic.js";
import type { CalendarAdapter } from "./calendar.js";
import { display } from "./display.js";
import { RelativeDeltaError } from "./error.js";
import {
  ABSOLUTE_UNITS,
  absoluteOf,
  type DeltaFields,
  emptyFields,
  fieldsEqual,
  RELATIVE_UNITS,
  relativeOf,
  validateFields,
} from "./fields.js";
import {
  cascadeFractional,
  type FractionalParts,
  normalizeRelative,
} from "./normalize.js";
import {
  decodeFields,
  encodeFields,
  type RelativeDeltaJson,
} from "./schema.js";
import type { Weekday, WeekdaySpec } from "./weekday.js";

/**
 * Any subset of a delta's fields. `null` clears an absolute field or the
 * weekday.
 */
export interface DeltaInit {
  years?: number;
  months?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  nanoseconds?: number;
  year?: number | null;
  month?: number | null;
  day?: number | null;
  hour?: number | null;
  minute?: number | null;
  second?: number | null;
  nanosecond?: number | null;
  weekday?: WeekdaySpec | null;
}

export type DatePartsInit = Pick<
  DeltaInit,
  "year" | "years" | "month" | "months" | "day" | "days"
>;

export type TimePartsInit = Pick<
  DeltaInit,
  "hour" | "hours" | "minute" | "minutes" | "second" | "seconds"
>;

function copyWeekday(spec: WeekdaySpec | null): WeekdaySpec | null {
  return spec === null
    ? null
    : { weekday: spec.weekday, occurrence: spec.occurrence };
}

function copyFields(fields: DeltaFields): DeltaFields {
  return {
    ...relativeOf(fields),
    ...absoluteOf(fields),
    weekday: copyWeekday(fields.weekday),
  };
}

function patchFrom(init: DeltaInit): Partial<DeltaFields> {
  const patch: Partial<DeltaFields> = {};
  for (const unit of RELATIVE_UNITS) {
    const value = init[unit];
    if (value !== undefined) patch[unit] = value;
  }
  for (const unit of ABSOLUTE_UNITS) {
    const value = init[unit];
    if (value !== undefined) patch[unit] = value;
  }
  if (init.weekday !== undefined) patch.weekday = copyWeekday(init.weekday);
  return patch;
}

/**
 * Accumulates field assignments for a {@link RelativeDelta}.
 *
 * A builder is an immutable value: every setter returns a new builder and
 * leaves the receiver untouched, so partially built deltas can be shared and
 * extended independently. Setting a field twice keeps the last value.
 * Nothing is validated or normalized until {@link build}.
 */
export class RelativeDeltaBuilder {
  private readonly fields: Readonly<DeltaFields>;

  constructor(fields: DeltaFields = emptyFields()) {
    this.fields = Object.freeze(copyFields(fields));
  }

  private patch(patch: Partial<DeltaFields>): RelativeDeltaBuilder {
    return new RelativeDeltaBuilder({ ...this.fields, ...patch });
  }

  // Relative offsets

  years(years: number): RelativeDeltaBuilder {
    return this.patch({ years });
  }

  months(months: number): RelativeDeltaBuilder {
    return this.patch({ months });
  }

  days(days: number): RelativeDeltaBuilder {
    return this.patch({ days });
  }

  hours(hours: number): RelativeDeltaBuilder {
    return this.patch({ hours });
  }

  minutes(minutes: number): RelativeDeltaBuilder {
    return this.patch({ minutes });
  }

  seconds(seconds: number): RelativeDeltaBuilder {
    return this.patch({ seconds });
  }

  nanoseconds(nanoseconds: number): RelativeDeltaBuilder {
    return this.patch({ nanoseconds });
  }

  // Absolute overrides. `null` keeps the base date-time's value.

  year(year: number | null): RelativeDeltaBuilder {
    return this.patch({ year });
  }

  month(month: number | null): RelativeDeltaBuilder {
    return this.patch({ month });
  }

  /** Clamped to the last day of the resulting month when applied. */
  day(day: number | null): RelativeDeltaBuilder {
    return this.patch({ day });
  }

  hour(hour: number | null): RelativeDeltaBuilder {
    return this.patch({ hour });
  }

  minute(minute: number | null): RelativeDeltaBuilder {
    return this.patch({ minute });
  }

  second(second: number | null): RelativeDeltaBuilder {
    return this.patch({ second });
  }

  nanosecond(nanosecond: number | null): RelativeDeltaBuilder {
    return this.patch({ nanosecond });
  }

  /**
   * The `occurrence`th `weekday` on or after (positive) or on or before
   * (negative) the date the rest of the delta produces.
   */
  weekday(weekday: Weekday | null, occurrence = 1): RelativeDeltaBuilder {
    return this.patch({
      weekday: weekday === null ? null : { weekday, occurrence },
    });
  }

  dateParts(init: DatePartsInit): RelativeDeltaBuilder {
    return this.set(init);
  }

  timeParts(init: TimePartsInit): RelativeDeltaBuilder {
    return this.set(init);
  }

  /** Assign every field present in `init`, as if by the individual setters. */
  set(init: DeltaInit): RelativeDeltaBuilder {
    return this.patch(patchFrom(init));
  }

  /** Validate and normalize into an immutable delta. */
  build(): RelativeDelta {
    return RelativeDelta.fromFields(this.fields);
  }
}

/**
 * A relative date/time delta: relative offsets, absolute field overrides and
 * an optional weekday occurrence.
 *
 * Deltas are immutable and always normalized: `months(14)` is stored as one
 * year and two months, so deltas with the same meaning compare equal.
 *
 * ```ts
 * const endOfMonth = RelativeDelta.day(1).months(1).days(-1).build();
 * const base = Temporal.PlainDateTime.from("2020-01-15T00:00");
 * endOfMonth.applyTo(plainDateTimeCalendar, base);
 * // 2020-01-31T00:00:00
 * ```
 */
export class RelativeDelta {
  private readonly data: Readonly<DeltaFields>;

  private constructor(data: DeltaFields) {
    this.data = Object.freeze(data);
  }

  /**
   * Validate and normalize a complete set of fields. Throws `invalidField`,
   * `invalidWeekdayOccurrence` or `overflow`.
   */
  static fromFields(fields: DeltaFields): RelativeDelta {
    validateFields(fields);
    return new RelativeDelta({
      ...normalizeRelative(fields),
      ...absoluteOf(fields),
      weekday: copyWeekday(fields.weekday),
    });
  }

  static builder(): RelativeDeltaBuilder {
    return new RelativeDeltaBuilder();
  }

  static zero(): RelativeDelta {
    return new RelativeDelta(emptyFields());
  }

  static years(years: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().years(years);
  }

  static months(months: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().months(months);
  }

  static days(days: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().days(days);
  }

  static hours(hours: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().hours(hours);
  }

  static minutes(minutes: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().minutes(minutes);
  }

  static seconds(seconds: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().seconds(seconds);
  }

  static nanoseconds(nanoseconds: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().nanoseconds(nanoseconds);
  }

  static year(year: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().year(year);
  }

  static month(month: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().month(month);
  }

  static day(day: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().day(day);
  }

  static hour(hour: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().hour(hour);
  }

  static minute(minute: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().minute(minute);
  }

  static second(second: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().second(second);
  }

  static nanosecond(nanosecond: number): RelativeDeltaBuilder {
    return RelativeDelta.builder().nanosecond(nanosecond);
  }

  static weekday(weekday: Weekday, occurrence = 1): RelativeDeltaBuilder {
    return RelativeDelta.builder().weekday(weekday, occurrence);
  }

  static dateParts(init: DatePartsInit): RelativeDeltaBuilder {
    return RelativeDelta.builder().dateParts(init);
  }

  static timeParts(init: TimePartsInit): RelativeDeltaBuilder {
    return RelativeDelta.builder().timeParts(init);
  }

  /** Every field in one call; the same as chaining the setters and building. */
  static of(init: DeltaInit): RelativeDelta {
    return RelativeDelta.builder().set(init).build();
  }

  /**
   * Start a builder from real-valued relative offsets. Fractions cascade to
   * the next smaller unit (`1.5 years` is one year and six months); see
   * {@link cascadeFractional}. Throws `conversion` for non-finite input.
   */
  static fromFloat(parts: FractionalParts): RelativeDeltaBuilder {
    return new RelativeDeltaBuilder({
      ...emptyFields(),
      ...cascadeFractional(parts),
    });
  }

  /** Parse the serialized object form. Throws `invalidField` on bad input. */
  static fromJSON(value: unknown): RelativeDelta {
    return RelativeDelta.fromFields(decodeFields(value));
  }

  /** Parse a JSON string produced by {@link serialize}. */
  static deserialize(text: string): RelativeDelta {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RelativeDeltaError(
        "invalidField",
        `invalid relative delta JSON: ${reason}`,
        { cause: err },
      );
    }
    return RelativeDelta.fromJSON(value);
  }

  /** Check whether `value` is an acceptable serialized delta. */
  static validate(value: unknown): boolean {
    try {
      RelativeDelta.fromJSON(value);
      return true;
    } catch {
      return false;
    }
  }

  get years(): number {
    return this.data.years;
  }

  get months(): number {
    return this.data.months;
  }

  get days(): number {
    return this.data.days;
  }

  get hours(): number {
    return this.data.hours;
  }

  get minutes(): number {
    return this.data.minutes;
  }

  get seconds(): number {
    return this.data.seconds;
  }

  get nanoseconds(): number {
    return this.data.nanoseconds;
  }

  get year(): number | null {
    return this.data.year;
  }

  get month(): number | null {
    return this.data.month;
  }

  get day(): number | null {
    return this.data.day;
  }

  get hour(): number | null {
    return this.data.hour;
  }

  get minute(): number | null {
    return this.data.minute;
  }

  get second(): number | null {
    return this.data.second;
  }

  get nanosecond(): number | null {
    return this.data.nanosecond;
  }

  get weekday(): WeekdaySpec | null {
    return copyWeekday(this.data.weekday);
  }

  /** `years * 12 + months`. */
  totalMonths(): number {
    return this.data.years * 12 + this.data.months;
  }

  isEmpty(): boolean {
    return RelativeDelta.zero().equals(this);
  }

  /** Whether any time-of-day offset or override is set. */
  hasTime(): boolean {
    const d = this.data;
    return (
      d.hours !== 0 ||
      d.minutes !== 0 ||
      d.seconds !== 0 ||
      d.nanoseconds !== 0 ||
      d.hour !== null ||
      d.minute !== null ||
      d.second !== null ||
      d.nanosecond !== null
    );
  }

  equals(other: RelativeDelta): boolean {
    return fieldsEqual(this.data, other.data);
  }

  /** A builder pre-populated with this delta's fields. */
  builder(): RelativeDeltaBuilder {
    return new RelativeDeltaBuilder(this.toFields());
  }

  toFields(): DeltaFields {
    return copyFields(this.data);
  }

  /** Sum of the relative fields. Absolute fields and weekday are not kept. */
  add(other: RelativeDelta): RelativeDelta {
    return new RelativeDelta(addFields(this.data, other.data));
  }

  /** `this.add(other.negate())`. */
  subtract(other: RelativeDelta): RelativeDelta {
    return new RelativeDelta(subtractFields(this.data, other.data));
  }

  /** Relative fields sign-flipped. Absolute fields and weekday are not kept. */
  negate(): RelativeDelta {
    return new RelativeDelta(negateFields(this.data));
  }

  /**
   * Relative fields multiplied by `factor`; absolute fields and weekday are
   * kept. Fractions cascade as in {@link RelativeDelta.fromFloat}, except
   * that a fraction of a month is dropped: `months(1).build().scale(0.5)` is
   * the empty delta. Throws `overflow` when a product leaves the safe
   * integer range.
   */
  scale(factor: number): RelativeDelta {
    return new RelativeDelta(scaleFields(this.data, factor));
  }

  /** `value` moved by this delta. */
  applyTo<T>(calendar: CalendarAdapter<T>, value: T): T {
    return applyDelta(calendar, this.data, value);
  }

  /** `value` moved back by this delta's offsets; overrides still apply. */
  subtractFrom<T>(calendar: CalendarAdapter<T>, value: T): T {
    return subtractDelta(calendar, this.data, value);
  }

  toJSON(): RelativeDeltaJson {
    return encodeFields(this.data);
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }

  toString(): string {
    return display(this.data);
  }
}
