import { describe, expect, it } from "vitest";
import { plainDateTimeCalendar } from "../src/adapters/temporal.js";
import {
  daysSince,
  nextWeekday,
  parseWeekday,
  previousWeekday,
  resolveWeekday,
  weekdayFromNumber,
  weekdayNumber,
  type Weekday,
  weekdayOffset,
} from "../src/weekday.js";
import { catchDeltaError, parsePlain } from "./helpers.js";

describe("weekday numbering", () => {
  it("uses ISO numbers from Monday=1", () => {
    expect(weekdayNumber("monday")).toBe(1);
    expect(weekdayNumber("sunday")).toBe(7);
  });

  it("maps numbers back to weekdays", () => {
    expect(weekdayFromNumber(3)).toBe("wednesday");
    expect(weekdayFromNumber(0)).toBeNull();
    expect(weekdayFromNumber(8)).toBeNull();
    expect(weekdayFromNumber(2.5)).toBeNull();
  });

  it("parses full names and abbreviations case-insensitively", () => {
    expect(parseWeekday("Mon")).toBe("monday");
    expect(parseWeekday("THURSDAY")).toBe("thursday");
    expect(parseWeekday(" sun ")).toBe("sunday");
    expect(parseWeekday("thurs")).toBeNull();
    expect(parseWeekday("mond")).toBeNull();
  });

  it("wraps around the week", () => {
    expect(nextWeekday("sunday")).toBe("monday");
    expect(nextWeekday("monday")).toBe("tuesday");
    expect(previousWeekday("monday")).toBe("sunday");
    expect(previousWeekday("wednesday")).toBe("tuesday");
  });

  it("counts days since another weekday", () => {
    expect(daysSince("monday", "monday")).toBe(0);
    expect(daysSince("sunday", "tuesday")).toBe(5);
    expect(daysSince("wednesday", "sunday")).toBe(3);
  });
});

describe("weekdayOffset", () => {
  const offset = (current: Weekday, weekday: Weekday, occurrence: number) =>
    weekdayOffset(current, { weekday, occurrence });

  it("searches forward for positive occurrences", () => {
    expect(offset("wednesday", "monday", 1)).toBe(5);
    expect(offset("wednesday", "wednesday", 1)).toBe(0);
    expect(offset("wednesday", "wednesday", 2)).toBe(7);
  });

  it("searches backward for negative occurrences", () => {
    expect(offset("wednesday", "monday", -1)).toBe(-2);
    expect(offset("wednesday", "wednesday", -1)).toBe(0);
    expect(offset("wednesday", "friday", -2)).toBe(-12);
  });

  it("rejects a zero occurrence", () => {
    const err = catchDeltaError(() =>
      weekdayOffset("monday", { weekday: "friday", occurrence: 0 }),
    );
    expect(err.kind).toBe("invalidWeekdayOccurrence");
    expect(err.field).toBe("weekday");
  });
});

describe("resolveWeekday", () => {
  // 2020-01-01 is a Wednesday.
  const wednesday = parsePlain("2020-01-01T10:30:00");

  it("moves forward to the first match, keeping the time of day", () => {
    const result = resolveWeekday(plainDateTimeCalendar, wednesday, {
      weekday: "monday",
      occurrence: 1,
    });
    expect(result.toString()).toBe("2020-01-06T10:30:00");
  });

  it("keeps a date that already matches", () => {
    const result = resolveWeekday(plainDateTimeCalendar, wednesday, {
      weekday: "wednesday",
      occurrence: 1,
    });
    expect(result.toString()).toBe("2020-01-01T10:30:00");
  });

  it("counts later occurrences in whole weeks", () => {
    const result = resolveWeekday(plainDateTimeCalendar, wednesday, {
      weekday: "tuesday",
      occurrence: 3,
    });
    expect(result.toString()).toBe("2020-01-21T10:30:00");
  });

  it("searches backward across a year boundary", () => {
    const result = resolveWeekday(plainDateTimeCalendar, wednesday, {
      weekday: "sunday",
      occurrence: -1,
    });
    expect(result.toString()).toBe("2019-12-29T10:30:00");
  });
});
