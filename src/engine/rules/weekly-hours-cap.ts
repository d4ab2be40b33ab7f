import * as z from "zod";
import { addDays, weekStartOf } from "../../datetime.utils.js";
import { DayOfWeekSchema } from "../../types.js";
import { parseRuleConfig } from "./parse-config.js";
import type { SoftRule } from "./rules.types.js";

const WeeklyHoursCapSchema = z.strictObject({
  name: z.literal("weekly-hours-cap").optional(),
  hours: z.number().positive().optional(),
  penalty: z.number().int().min(0).optional(),
  weekStartsOn: DayOfWeekSchema.optional(),
});

/**
 * Configuration for {@link createWeeklyHoursCapRule}.
 *
 * - `hours` (optional): soft cap per week; defaults to 40
 * - `penalty` (optional): score subtracted when the slot would exceed the cap; defaults to 1
 * - `weekStartsOn` (optional): first day of the week; defaults to monday
 */
export type WeeklyHoursCapConfig = z.infer<typeof WeeklyHoursCapSchema>;

export const DEFAULT_WEEKLY_HOURS_CAP = 40;
export const DEFAULT_WEEKLY_CAP_PENALTY = 1;

/**
 * Penalizes picks that would push an employee past a weekly hour total.
 *
 * Counts every shift the employee holds in the slot's week, including
 * pre-existing ones dated outside the planning window. A shift belongs to
 * the week of its start date.
 *
 * @example
 * ```ts
 * createWeeklyHoursCapRule({ hours: 32, weekStartsOn: "sunday" });
 * ```
 */
export function createWeeklyHoursCapRule(config: WeeklyHoursCapConfig = {}): SoftRule {
  const parsed = parseRuleConfig("weekly-hours-cap", WeeklyHoursCapSchema, config);
  const capMinutes = (parsed.hours ?? DEFAULT_WEEKLY_HOURS_CAP) * 60;
  const penalty = parsed.penalty ?? DEFAULT_WEEKLY_CAP_PENALTY;
  const weekStartsOn = parsed.weekStartsOn ?? "monday";

  return {
    kind: "soft",
    name: "weekly-hours-cap",
    score({ employee, slot, state }) {
      const weekStart = weekStartOf(slot.date, weekStartsOn);
      const held = state.minutesBetween(employee.id, weekStart, addDays(weekStart, 6));
      return held + slot.durationMinutes > capMinutes ? -penalty : 0;
    },
  };
}
