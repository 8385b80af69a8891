import { describe, it, expect } from "vitest";
import { DATE_RANGE_DAYS, DATE_RANGES, toIsoDay, windowStart } from "../date-range.js";

describe("date-range", () => {
  it("has a day count for every range", () => {
    expect(DATE_RANGES.map((r) => DATE_RANGE_DAYS[r])).toEqual([7, 14, 30, 90, 180, 365]);
  });

  it("formats the UTC calendar day", () => {
    expect(toIsoDay(new Date("2026-03-10T23:59:59Z"))).toBe("2026-03-10");
  });

  it("computes the first day of the window", () => {
    const now = new Date("2026-03-10T12:00:00Z");
    expect(windowStart("1 Week", now)).toBe("2026-03-03");
    expect(windowStart("1 Month", now)).toBe("2026-02-08");
    expect(windowStart("1 Year", now)).toBe("2025-03-10");
  });
});
