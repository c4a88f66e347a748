import { Temporal } from "@js-temporal/polyfill";
import { RelativeDeltaError } from "../src/error.js";

export function parsePlain(s: string): Temporal.PlainDateTime {
  return Temporal.PlainDateTime.from(s);
}

export function parseZoned(s: string): Temporal.ZonedDateTime {
  return Temporal.ZonedDateTime.from(s);
}

/** Run `fn` and return the RelativeDeltaError it throws. */
export function catchDeltaError(fn: () => unknown): RelativeDeltaError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RelativeDeltaError) return err;
    throw err;
  }
  throw new Error("expected a RelativeDeltaError to be thrown");
}
