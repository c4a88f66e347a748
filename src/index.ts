// relative-delta — Public API

export { applyDelta, subtractDelta } from "./apply.js";
export {
  plainDateTimeCalendar,
  toPlainDateTime,
  zonedDateTimeCalendar,
} from "./adapters/temporal.js";
export type {
  CalendarAdapter,
  DateTimeFields,
  DurationParts,
} from "./calendar.js";
export type {
  DatePartsInit,
  DeltaInit,
  TimePartsInit,
} from "./delta.js";
export { RelativeDelta, RelativeDeltaBuilder } from "./delta.js";
export { display } from "./display.js";
export type {
  RelativeDeltaErrorKind,
  RelativeDeltaErrorOptions,
} from "./error.js";
export { RelativeDeltaError } from "./error.js";
export type {
  AbsoluteFields,
  AbsoluteUnit,
  DeltaFields,
  RelativeFields,
  RelativeUnit,
} from "./fields.js";
export { NANOS_PER_SECOND } from "./fields.js";
export type { FractionalParts } from "./normalize.js";
export type { RelativeDeltaJson } from "./schema.js";
export { RelativeDeltaJsonSchema, WeekdaySpecSchema } from "./schema.js";
export type { Weekday, WeekdaySpec } from "./weekday.js";
export {
  ALL_WEEKDAYS,
  daysSince,
  nextWeekday,
  parseWeekday,
  previousWeekday,
  resolveWeekday,
  weekdayFromNumber,
  weekdayNumber,
} from "./weekday.js";
export { Temporal } from "@js-temporal/polyfill";
