import { describe, expect, it } from "vitest";
import { RelativeDelta } from "../src/delta.js";
import { catchDeltaError } from "./helpers.js";

const left = { year: 2020, years: -4, month: 1, months: 3 };
const right = { year: 2020, years: 1, month: 1, months: 42 };

describe("add", () => {
  it("sums relative fields", () => {
    const lhs = RelativeDelta.years(1).build();
    const rhs = RelativeDelta.years(2).build();
    expect(lhs.add(rhs).equals(RelativeDelta.years(3).build())).toBe(true);
    expect(lhs.add(rhs).equals(rhs.add(lhs))).toBe(true);
  });

  it("normalizes the sum", () => {
    const twenty = RelativeDelta.hours(20).build();
    const sum = twenty.add(RelativeDelta.hours(6).build());
    expect(sum.days).toBe(1);
    expect(sum.hours).toBe(2);
  });

  it("drops absolute fields and weekday", () => {
    const lhs = RelativeDelta.dateParts(left).build();
    const rhs = RelativeDelta.dateParts(right).weekday("monday").build();
    const sum = lhs.add(rhs);
    expect(sum.equals(RelativeDelta.years(-3).months(45).build())).toBe(true);
    expect(sum.year).toBeNull();
    expect(sum.month).toBeNull();
    expect(sum.weekday).toBeNull();
  });

  it("cancels a delta with its negation", () => {
    const a = RelativeDelta.of({
      years: 3,
      months: -7,
      days: 12,
      hours: -5,
      minutes: 44,
      seconds: -3,
      nanoseconds: 17,
      day: 1,
    });
    expect(a.add(a.negate()).isEmpty()).toBe(true);
  });

  it("reports a sum past the safe integer range as overflow", () => {
    const big = RelativeDelta.years(Number.MAX_SAFE_INTEGER).build();
    const err = catchDeltaError(() => big.add(RelativeDelta.years(1).build()));
    expect(err.kind).toBe("overflow");
    expect(err.field).toBe("years");
  });
});

describe("subtract", () => {
  it("adds the negation of the right-hand side", () => {
    const lhs = RelativeDelta.dateParts(left).build();
    const rhs = RelativeDelta.dateParts(right).build();
    const diff = RelativeDelta.years(-5).months(-39).build();
    expect(lhs.subtract(rhs).equals(diff)).toBe(true);
    expect(lhs.negate().add(rhs).equals(diff.negate())).toBe(true);
  });

  it("borrows across units", () => {
    const day = RelativeDelta.days(1).build();
    const diff = day.subtract(RelativeDelta.hours(1).build());
    expect(diff.days).toBe(1);
    expect(diff.hours).toBe(-1);
  });
});

describe("negate", () => {
  it("flips relative fields and drops absolute fields", () => {
    const d = RelativeDelta.day(1).months(2).weekday("friday").build().negate();
    expect(d.months).toBe(-2);
    expect(d.day).toBeNull();
    expect(d.weekday).toBeNull();
  });

  it("leaves zero fields as positive zero", () => {
    const d = RelativeDelta.zero().negate();
    expect(Object.is(d.years, 0)).toBe(true);
    expect(Object.is(d.nanoseconds, 0)).toBe(true);
  });
});

describe("scale", () => {
  it("cascades fractions down to smaller units", () => {
    const d = RelativeDelta.years(10).months(6).days(-15).hours(23).build();
    const expected = RelativeDelta.dateParts({ years: 5, months: 3, days: -7 })
      .minutes(-30)
      .build();
    expect(d.scale(0.5).equals(expected)).toBe(true);
  });

  it("keeps absolute fields", () => {
    const d = RelativeDelta.dateParts(right).build();
    const expected = RelativeDelta.years(2)
      .year(2020)
      .months(3)
      .month(1)
      .build();
    expect(d.scale(0.5).equals(expected)).toBe(true);
  });

  it("keeps the weekday", () => {
    const d = RelativeDelta.weekday("friday", -1).days(3).build().scale(2);
    expect(d.days).toBe(6);
    expect(d.weekday).toEqual({ weekday: "friday", occurrence: -1 });
  });

  it("keeps absolute fields when scaling by zero", () => {
    const d = RelativeDelta.day(1).months(5).build().scale(0);
    expect(d.months).toBe(0);
    expect(d.day).toBe(1);
  });

  it("matches negation for a factor of -1", () => {
    const d = RelativeDelta.years(1).months(2).days(-3).build();
    const expected = RelativeDelta.years(-1).months(-2).days(3).build();
    expect(d.scale(-1).equals(expected)).toBe(true);
  });

  it("rejects a non-finite factor", () => {
    const d = RelativeDelta.years(1).build();
    const err = catchDeltaError(() => d.scale(Number.NaN));
    expect(err.kind).toBe("conversion");
    expect(err.field).toBe("factor");
  });

  it("reports a product past the safe integer range as overflow", () => {
    const d = RelativeDelta.years(Number.MAX_SAFE_INTEGER).build();
    const err = catchDeltaError(() => d.scale(2));
    expect(err.kind).toBe("overflow");
    expect(err.field).toBe("years");
  });

  it("drops the fraction of a month", () => {
    expect(RelativeDelta.months(1).build().scale(0.5).isEmpty()).toBe(true);
    expect(RelativeDelta.months(3).build().scale(0.5).months).toBe(1);
  });
});
