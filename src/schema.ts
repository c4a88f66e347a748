/**
 * Zod schemas for the serialized form of a relative delta.
 *
 * Only non-default fields are written: relative offsets when nonzero,
 * absolute fields when set, the weekday when present. Reading accepts the
 * same shape with explicit zeros and nulls allowed, and weekday names in any
 * form `parseWeekday` understands.
 */

import { z } from "zod";
import { RelativeDeltaError } from "./error.js";
import {
  ABSOLUTE_UNITS,
  type AbsoluteUnit,
  type DeltaFields,
  RELATIVE_UNITS,
  type RelativeUnit,
} from "./fields.js";
import { parseWeekday, type WeekdaySpec } from "./weekday.js";

export const WeekdayNameSchema = z.string().transform((value, ctx) => {
  const weekday = parseWeekday(value);
  if (weekday === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown weekday "${value}"`,
    });
    return z.NEVER;
  }
  return weekday;
});

// A zero occurrence is left to the field validator, which reports it as
// `invalidWeekdayOccurrence`.
export const WeekdaySpecSchema = z.object({
  weekday: WeekdayNameSchema,
  occurrence: z.number().int(),
});

const relative = z.number().int().optional();
const absolute = z.number().int().nullable().optional();

export const RelativeDeltaJsonSchema = z
  .object({
    years: relative,
    months: relative,
    days: relative,
    hours: relative,
    minutes: relative,
    seconds: relative,
    nanoseconds: relative,
    year: absolute,
    month: absolute,
    day: absolute,
    hour: absolute,
    minute: absolute,
    second: absolute,
    nanosecond: absolute,
    weekday: WeekdaySpecSchema.nullable().optional(),
  })
  .strict();

export interface RelativeDeltaJson
  extends Partial<Record<RelativeUnit | AbsoluteUnit, number>> {
  weekday?: WeekdaySpec;
}

export function encodeFields(fields: DeltaFields): RelativeDeltaJson {
  const out: RelativeDeltaJson = {};
  for (const unit of RELATIVE_UNITS) {
    if (fields[unit] !== 0) out[unit] = fields[unit];
  }
  for (const unit of ABSOLUTE_UNITS) {
    const value = fields[unit];
    if (value !== null) out[unit] = value;
  }
  if (fields.weekday !== null) {
    out.weekday = {
      weekday: fields.weekday.weekday,
      occurrence: fields.weekday.occurrence,
    };
  }
  return out;
}

/** Validate untrusted input and turn it into (not yet normalized) fields. */
export function decodeFields(value: unknown): DeltaFields {
  const result = RelativeDeltaJsonSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues;
    const message = issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    const field = issues.length > 0 ? String(issues[0].path[0] ?? "") : "";
    throw RelativeDeltaError.invalidField(
      field,
      `invalid relative delta: ${message}`,
    );
  }
  const data = result.data;
  return {
    years: data.years ?? 0,
    months: data.months ?? 0,
    days: data.days ?? 0,
    hours: data.hours ?? 0,
    minutes: data.minutes ?? 0,
    seconds: data.seconds ?? 0,
    nanoseconds: data.nanoseconds ?? 0,
    year: data.year ?? null,
    month: data.month ?? null,
    day: data.day ?? null,
    hour: data.hour ?? null,
    minute: data.minute ?? null,
    second: data.second ?? null,
    nanosecond: data.nanosecond ?? null,
    weekday: data.weekday ?? null,
  };
}
