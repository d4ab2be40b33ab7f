/**
 * Core time primitives shared by the engine, the expander and costing.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Day of the week identifier.
 */
export type DayOfWeek =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Zod schema for {@link DayOfWeek}.
 * Useful for configs that need to accept a day-of-week string.
 */
export const DayOfWeekSchema = z.union([
  z.literal("monday"),
  z.literal("tuesday"),
  z.literal("wednesday"),
  z.literal("thursday"),
  z.literal("friday"),
  z.literal("saturday"),
  z.literal("sunday"),
]);

/**
 * Calendar date in `YYYY-MM-DD` form. Dates carry no time zone; weekday
 * arithmetic is done in UTC.
 */
export type DayString = string;

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Zod schema for a {@link DayString}. Rejects well-formed strings that do not
 * name a real date (e.g. `2025-02-30`).
 */
export const DayStringSchema = z
  .string()
  .regex(DAY_PATTERN, "Expected a date in YYYY-MM-DD format")
  .refine(isRealDay, { message: "Not a valid calendar date" });

function isRealDay(day: string): boolean {
  const date = new Date(`${day}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return false;
  return date.toISOString().slice(0, 10) === day;
}

/**
 * Time of day representation (hours and minutes).
 *
 * Hours are in 24-hour format (0-23).
 *
 * @example
 * ```typescript
 * const morningStart: TimeOfDay = { hours: 6, minutes: 0 };
 * const afternoonEnd: TimeOfDay = { hours: 22, minutes: 0 };
 * ```
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

export const TimeOfDaySchema = z.object({
  hours: z.number().int().min(0).max(23),
  minutes: z.number().int().min(0).max(59),
});

// ============================================================================
// Planning Window
// ============================================================================

/**
 * The planning period a run covers. Both ends are inclusive.
 *
 * @example One week starting Monday, March 3, 2025
 * ```typescript
 * const window: PlanningWindow = { start: "2025-03-03", end: "2025-03-09" };
 * ```
 */
export interface PlanningWindow {
  start: DayString;
  end: DayString;
}

export const PlanningWindowSchema = z
  .object({
    start: DayStringSchema,
    end: DayStringSchema,
  })
  .refine((window) => window.end >= window.start, {
    message: "Planning window end must not be before its start",
    path: ["end"],
  });
