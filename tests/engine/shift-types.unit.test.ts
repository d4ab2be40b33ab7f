import { describe, expect, it } from "vitest";
import { ScheduleValidationError } from "../../src/errors.js";
import {
  DEFAULT_SHIFT_CATALOG,
  ShiftCatalog,
  ShiftTypeSchema,
  compareShiftTypes,
  normalizeShiftType,
  overlaps,
} from "../../src/engine/shift-types.js";

describe("normalizeShiftType", () => {
  it("resolves canonical names and aliases case-insensitively", () => {
    expect(normalizeShiftType("morning")).toBe("morning");
    expect(normalizeShiftType(" Evening ")).toBe("afternoon");
    expect(normalizeShiftType("NOON")).toBe("afternoon");
    expect(normalizeShiftType("overnight")).toBe("night");
  });

  it("returns undefined for unknown names", () => {
    expect(normalizeShiftType("graveyard")).toBeUndefined();
  });
});

describe("ShiftTypeSchema", () => {
  it("outputs the canonical shift type", () => {
    expect(ShiftTypeSchema.parse("pm")).toBe("afternoon");
  });

  it("reports unknown shift types", () => {
    const result = ShiftTypeSchema.safeParse("graveyard");
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'Unknown shift type "graveyard" (expected morning, afternoon, night)',
    );
  });
});

describe("compareShiftTypes", () => {
  it("orders morning before afternoon before night", () => {
    const sorted = (["night", "morning", "afternoon"] as const).toSorted(compareShiftTypes);
    expect(sorted).toEqual(["morning", "afternoon", "night"]);
  });
});

describe("overlaps", () => {
  it("treats touching windows as disjoint", () => {
    expect(overlaps({ start: 0, end: 480 }, { start: 480, end: 960 })).toBe(false);
  });

  it("detects partial and nested overlap", () => {
    expect(overlaps({ start: 0, end: 480 }, { start: 479, end: 960 })).toBe(true);
    expect(overlaps({ start: 0, end: 960 }, { start: 100, end: 200 })).toBe(true);
  });
});

describe("ShiftCatalog", () => {
  it("uses eight-hour default windows", () => {
    expect(DEFAULT_SHIFT_CATALOG.hours("morning")).toBe(8);
    expect(DEFAULT_SHIFT_CATALOG.hours("afternoon")).toBe(8);
    expect(DEFAULT_SHIFT_CATALOG.hours("night")).toBe(8);
    expect(DEFAULT_SHIFT_CATALOG.get("night")).toEqual({
      type: "night",
      startMinutes: 22 * 60,
      endMinutes: 30 * 60,
      durationMinutes: 480,
    });
  });

  it("places a night shift across midnight", () => {
    const night = DEFAULT_SHIFT_CATALOG.windowOn("2025-03-03", "night");
    const nextMorning = DEFAULT_SHIFT_CATALOG.windowOn("2025-03-04", "morning");
    const nextAfternoon = DEFAULT_SHIFT_CATALOG.windowOn("2025-03-04", "afternoon");

    expect(night.end - night.start).toBe(480);
    expect(night.end).toBe(nextMorning.start);
    expect(overlaps(night, nextMorning)).toBe(false);
    expect(overlaps(night, nextAfternoon)).toBe(false);
  });

  it("detects an extended night shift overlapping the next morning", () => {
    const catalog = new ShiftCatalog({
      night: { startTime: { hours: 22, minutes: 0 }, endTime: { hours: 7, minutes: 0 } },
    });
    expect(catalog.hours("night")).toBe(9);
    expect(
      overlaps(catalog.windowOn("2025-03-03", "night"), catalog.windowOn("2025-03-04", "morning")),
    ).toBe(true);
  });

  it("accepts fractional and sixteen-hour windows", () => {
    const catalog = new ShiftCatalog({
      morning: { startTime: { hours: 6, minutes: 0 }, endTime: { hours: 22, minutes: 0 } },
      afternoon: { startTime: { hours: 14, minutes: 0 }, endTime: { hours: 21, minutes: 30 } },
    });
    expect(catalog.hours("morning")).toBe(16);
    expect(catalog.hours("afternoon")).toBe(7.5);
  });

  it("rejects windows longer than sixteen hours", () => {
    expect(
      () =>
        new ShiftCatalog({
          morning: { startTime: { hours: 6, minutes: 0 }, endTime: { hours: 23, minutes: 0 } },
        }),
    ).toThrow(ScheduleValidationError);
  });

  it("rejects zero-length windows", () => {
    try {
      new ShiftCatalog({
        afternoon: { startTime: { hours: 14, minutes: 0 }, endTime: { hours: 14, minutes: 0 } },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScheduleValidationError);
      if (error instanceof ScheduleValidationError) {
        expect(error.issues.map((issue) => issue.path)).toEqual(["shiftWindows.afternoon"]);
      }
    }
  });
});
