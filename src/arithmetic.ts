// Arithmetic over delta fields. Every operation returns fresh fields.

import { RelativeDeltaError } from "./error.js";
import {
  absoluteOf,
  clean,
  type DeltaFields,
  emptyAbsolute,
  RELATIVE_UNITS,
  type RelativeFields,
  zeroRelative,
} from "./fields.js";
import { cascadeFractional, normalizeRelative } from "./normalize.js";

/**
 * Field-wise sum of the relative fields, normalized. Absolute fields and the
 * weekday of both operands are dropped.
 */
export function addFields(a: DeltaFields, b: DeltaFields): DeltaFields {
  const sum = zeroRelative();
  for (const unit of RELATIVE_UNITS) {
    const value = a[unit] + b[unit];
    if (!Number.isSafeInteger(value)) {
      throw RelativeDeltaError.overflow(unit);
    }
    sum[unit] = clean(value);
  }
  return { ...normalizeRelative(sum), ...emptyAbsolute(), weekday: null };
}

/** Sign-flip every relative field; absolute fields and weekday are dropped. */
export function negateFields(a: DeltaFields): DeltaFields {
  return { ...negateRelative(a), ...emptyAbsolute(), weekday: null };
}

export function negateRelative(a: RelativeFields): RelativeFields {
  const out = zeroRelative();
  for (const unit of RELATIVE_UNITS) {
    out[unit] = clean(-a[unit]);
  }
  return out;
}

export function subtractFields(a: DeltaFields, b: DeltaFields): DeltaFields {
  return addFields(a, negateFields(b));
}

/**
 * Multiply every relative field by `factor`, cascading fractions downward the
 * same way fractional construction does. Absolute fields and weekday are
 * kept.
 */
export function scaleFields(a: DeltaFields, factor: number): DeltaFields {
  if (!Number.isFinite(factor)) {
    throw RelativeDeltaError.conversion(
      "factor",
      `scale factor must be a finite number, got ${factor}`,
    );
  }
  const scaled: Partial<RelativeFields> = {};
  for (const unit of RELATIVE_UNITS) {
    const value = a[unit] * factor;
    if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
      throw RelativeDeltaError.overflow(unit);
    }
    scaled[unit] = value;
  }
  return {
    ...normalizeRelative(cascadeFractional(scaled)),
    ...absoluteOf(a),
    weekday: a.weekday === null ? null : { ...a.weekday },
  };
}
