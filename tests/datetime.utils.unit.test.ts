import { describe, expect, it } from "vitest";
import {
  addDays,
  dayOfWeekOf,
  intersectWindows,
  normalizeEndMinutes,
  resolveDaysFromWindow,
  weekStartOf,
} from "../src/datetime.utils.js";
import { DayStringSchema, PlanningWindowSchema } from "../src/types.js";

describe("resolveDaysFromWindow", () => {
  it("should return all days in the window (inclusive)", () => {
    const days = resolveDaysFromWindow({ start: "2025-02-27", end: "2025-03-02" });
    expect(days).toEqual(["2025-02-27", "2025-02-28", "2025-03-01", "2025-03-02"]);
  });

  it("should return a single day when start equals end", () => {
    expect(resolveDaysFromWindow({ start: "2025-03-03", end: "2025-03-03" })).toEqual([
      "2025-03-03",
    ]);
  });

  it("should filter by day of week", () => {
    const days = resolveDaysFromWindow({ start: "2025-02-03", end: "2025-02-09" }, [
      "wednesday",
      "friday",
    ]);
    expect(days).toEqual(["2025-02-05", "2025-02-07"]);
  });

  it("should return nothing for an empty day-of-week filter", () => {
    expect(resolveDaysFromWindow({ start: "2025-02-03", end: "2025-02-09" }, [])).toEqual([]);
  });
});

describe("intersectWindows", () => {
  it("should return the overlapping part", () => {
    expect(
      intersectWindows(
        { start: "2025-03-01", end: "2025-03-10" },
        { start: "2025-03-05", end: "2025-03-20" },
      ),
    ).toEqual({ start: "2025-03-05", end: "2025-03-10" });
  });

  it("should return undefined for disjoint windows", () => {
    expect(
      intersectWindows(
        { start: "2025-03-01", end: "2025-03-02" },
        { start: "2025-03-03", end: "2025-03-04" },
      ),
    ).toBeUndefined();
  });
});

describe("day arithmetic", () => {
  it("should cross month and leap-year boundaries", () => {
    expect(addDays("2025-01-31", 1)).toBe("2025-02-01");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28");
  });

  it("should name the weekday in UTC", () => {
    expect(dayOfWeekOf("2025-03-03")).toBe("monday");
    expect(dayOfWeekOf("2025-03-09")).toBe("sunday");
  });

  it("should find the start of the week", () => {
    expect(weekStartOf("2025-03-05", "monday")).toBe("2025-03-03");
    expect(weekStartOf("2025-03-09", "monday")).toBe("2025-03-03");
    expect(weekStartOf("2025-03-05", "sunday")).toBe("2025-03-02");
    expect(weekStartOf("2025-03-03", "monday")).toBe("2025-03-03");
  });

  it("should roll an end at or before the start into the next day", () => {
    expect(normalizeEndMinutes(22 * 60, 6 * 60)).toBe(30 * 60);
    expect(normalizeEndMinutes(6 * 60, 14 * 60)).toBe(14 * 60);
    expect(normalizeEndMinutes(8 * 60, 8 * 60)).toBe(32 * 60);
  });
});

describe("DayStringSchema", () => {
  it("should accept real dates", () => {
    expect(DayStringSchema.safeParse("2024-02-29").success).toBe(true);
  });

  it("should reject malformed and impossible dates", () => {
    expect(DayStringSchema.safeParse("2025-3-1").success).toBe(false);
    expect(DayStringSchema.safeParse("2025-02-30").success).toBe(false);
    expect(DayStringSchema.safeParse("2025-13-01").success).toBe(false);
  });
});

describe("PlanningWindowSchema", () => {
  it("should reject an end before the start", () => {
    const result = PlanningWindowSchema.safeParse({ start: "2025-03-05", end: "2025-03-04" });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["end"]);
  });
});
