import * as z from "zod";
import { dayOfWeekOf } from "../../datetime.utils.js";
import { shiftDayKey } from "../profile.js";
import { parseRuleConfig } from "./parse-config.js";
import type { SoftRule } from "./rules.types.js";

const PreferredShiftsSchema = z.strictObject({
  name: z.literal("preferred-shifts").optional(),
  weight: z.number().int().min(0).optional(),
});

/**
 * Configuration for {@link createPreferredShiftsRule}.
 *
 * - `weight` (optional): score added when the slot matches a preference; defaults to 2
 */
export type PreferredShiftsConfig = z.infer<typeof PreferredShiftsSchema>;

export const DEFAULT_PREFERENCE_WEIGHT = 2;

/**
 * Favors employees who asked for the slot's shift type, either on its date
 * or on its weekday. Matching both still counts once.
 *
 * @example
 * ```ts
 * createPreferredShiftsRule({ weight: 3 });
 * ```
 */
export function createPreferredShiftsRule(config: PreferredShiftsConfig = {}): SoftRule {
  const { weight = DEFAULT_PREFERENCE_WEIGHT } = parseRuleConfig(
    "preferred-shifts",
    PreferredShiftsSchema,
    config,
  );

  return {
    kind: "soft",
    name: "preferred-shifts",
    score({ profile, slot }) {
      const matches =
        profile.preferredOnDates.has(shiftDayKey(slot.shiftType, slot.date)) ||
        profile.preferredOnWeekdays.has(shiftDayKey(slot.shiftType, dayOfWeekOf(slot.date)));
      return matches ? weight : 0;
    },
  };
}
