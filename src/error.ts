export type RelativeDeltaErrorKind =
  | "overflow"
  | "invalidWeekdayOccurrence"
  | "dateOutOfRange"
  | "conversion"
  | "invalidField"
  | "missingField";

export interface RelativeDeltaErrorOptions {
  field?: string;
  cause?: unknown;
}

/** All errors produced by relative-delta. */
export class RelativeDeltaError extends Error {
  readonly kind: RelativeDeltaErrorKind;
  /** Name of the field the error is about, when there is one. */
  readonly field?: string;

  constructor(
    kind: RelativeDeltaErrorKind,
    message: string,
    options: RelativeDeltaErrorOptions = {},
  ) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "RelativeDeltaError";
    this.kind = kind;
    this.field = options.field;
  }

  static overflow(field: string, message?: string): RelativeDeltaError {
    return new RelativeDeltaError(
      "overflow",
      message ?? `${field} overflows the safe integer range`,
      { field },
    );
  }

  static invalidWeekdayOccurrence(occurrence: number): RelativeDeltaError {
    return new RelativeDeltaError(
      "invalidWeekdayOccurrence",
      `weekday occurrence must be a nonzero integer, got ${occurrence}`,
      { field: "weekday" },
    );
  }

  static dateOutOfRange(message: string, cause?: unknown): RelativeDeltaError {
    return new RelativeDeltaError("dateOutOfRange", message, { cause });
  }

  static conversion(field: string, message: string): RelativeDeltaError {
    return new RelativeDeltaError("conversion", message, { field });
  }

  static invalidField(field: string, message: string): RelativeDeltaError {
    return new RelativeDeltaError("invalidField", message, { field });
  }

  static missingField(field: string): RelativeDeltaError {
    return new RelativeDeltaError(
      "missingField",
      `expected an absolute value for ${field}`,
      { field },
    );
  }
}
