import * as z from "zod";
import { ScheduleValidationError, type ValidationIssue } from "../errors.js";
import type { DayString, TimeOfDay } from "../types.js";
import { TimeOfDaySchema } from "../types.js";
import {
  normalizeEndMinutes,
  parseDayString,
  timeOfDayToMinutes,
} from "../datetime.utils.js";

/** Shift types in canonical order. */
export const SHIFT_TYPES = ["morning", "afternoon", "night"] as const;

export type ShiftType = (typeof SHIFT_TYPES)[number];

const SHIFT_ORDER = {
  morning: 0,
  afternoon: 1,
  night: 2,
} as const satisfies Record<ShiftType, number>;

export function compareShiftTypes(a: ShiftType, b: ShiftType): number {
  return SHIFT_ORDER[a] - SHIFT_ORDER[b];
}

// Names used by rosters imported from other systems.
const SHIFT_ALIASES: Readonly<Record<string, ShiftType>> = {
  morning: "morning",
  am: "morning",
  day: "morning",
  afternoon: "afternoon",
  noon: "afternoon",
  evening: "afternoon",
  pm: "afternoon",
  night: "night",
  overnight: "night",
};

/**
 * Resolves a shift type name or alias, case-insensitively.
 *
 * @example
 * ```typescript
 * normalizeShiftType(" Evening "); // "afternoon"
 * normalizeShiftType("graveyard"); // undefined
 * ```
 */
export function normalizeShiftType(value: string): ShiftType | undefined {
  return SHIFT_ALIASES[value.trim().toLowerCase()];
}

/**
 * Accepts a shift type or one of its aliases and outputs the canonical name.
 */
export const ShiftTypeSchema = z.string().transform((value, ctx): ShiftType => {
  const shiftType = normalizeShiftType(value);
  if (!shiftType) {
    ctx.addIssue({
      code: "custom",
      message: `Unknown shift type "${value}" (expected ${SHIFT_TYPES.join(", ")})`,
    });
    return z.NEVER;
  }
  return shiftType;
});

// ============================================================================
// Shift windows
// ============================================================================

/**
 * Time-of-day window of a shift type. An end at or before the start means
 * the shift ends on the following day.
 */
export interface ShiftWindow {
  startTime: TimeOfDay;
  endTime: TimeOfDay;
}

export const ShiftWindowSchema = z.object({
  startTime: TimeOfDaySchema,
  endTime: TimeOfDaySchema,
});

export type ShiftWindowOverrides = Partial<Record<ShiftType, ShiftWindow>>;

/** Canonical windows: three contiguous eight-hour shifts. */
export const DEFAULT_SHIFT_WINDOWS = {
  morning: { startTime: { hours: 6, minutes: 0 }, endTime: { hours: 14, minutes: 0 } },
  afternoon: { startTime: { hours: 14, minutes: 0 }, endTime: { hours: 22, minutes: 0 } },
  night: { startTime: { hours: 22, minutes: 0 }, endTime: { hours: 6, minutes: 0 } },
} as const satisfies Record<ShiftType, ShiftWindow>;

export const MAX_SHIFT_MINUTES = 16 * 60;

/**
 * A half-open `[start, end)` interval in minutes since 1970-01-01T00:00.
 */
export interface TimeWindow {
  readonly start: number;
  readonly end: number;
}

/**
 * True when the two windows share any minute. Touching windows
 * (one ends exactly when the other starts) do not overlap.
 */
export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return a.start < b.end && b.start < a.end;
}

export interface ShiftDefinition {
  readonly type: ShiftType;
  /** Minutes after midnight of the shift's date. */
  readonly startMinutes: number;
  /** Minutes after midnight of the shift's date; exceeds a day for overnight shifts. */
  readonly endMinutes: number;
  readonly durationMinutes: number;
}

/**
 * Resolved shift windows for a run.
 *
 * @throws {ScheduleValidationError} if an override lasts zero minutes or
 * more than {@link MAX_SHIFT_MINUTES}.
 */
export class ShiftCatalog {
  readonly #definitions: Record<ShiftType, ShiftDefinition>;

  constructor(overrides: ShiftWindowOverrides = {}) {
    const issues: ValidationIssue[] = [];
    const define = (type: ShiftType): ShiftDefinition => {
      const window = overrides[type] ?? DEFAULT_SHIFT_WINDOWS[type];
      const startMinutes = timeOfDayToMinutes(window.startTime);
      const endMinutes = normalizeEndMinutes(startMinutes, timeOfDayToMinutes(window.endTime));
      const durationMinutes = endMinutes - startMinutes;
      if (durationMinutes > MAX_SHIFT_MINUTES) {
        issues.push({
          path: `shiftWindows.${type}`,
          message: `Shift lasts ${durationMinutes / 60}h; shifts must be longer than 0h and at most ${MAX_SHIFT_MINUTES / 60}h`,
        });
      }
      return { type, startMinutes, endMinutes, durationMinutes };
    };

    this.#definitions = {
      morning: define("morning"),
      afternoon: define("afternoon"),
      night: define("night"),
    };

    if (issues.length > 0) {
      throw new ScheduleValidationError("Invalid shift windows", issues);
    }
  }

  get(type: ShiftType): ShiftDefinition {
    return this.#definitions[type];
  }

  durationMinutes(type: ShiftType): number {
    return this.#definitions[type].durationMinutes;
  }

  hours(type: ShiftType): number {
    return this.#definitions[type].durationMinutes / 60;
  }

  /** Absolute window of a shift type worked on `day`. */
  windowOn(day: DayString, type: ShiftType): TimeWindow {
    const base = parseDayString(day).getTime() / 60_000;
    const definition = this.#definitions[type];
    return { start: base + definition.startMinutes, end: base + definition.endMinutes };
  }
}

export const DEFAULT_SHIFT_CATALOG = new ShiftCatalog();
