import * as z from "zod";
import { parseRuleConfig } from "./parse-config.js";
import type { SoftRule } from "./rules.types.js";

const AvoidedShiftsSchema = z.strictObject({
  name: z.literal("avoided-shifts").optional(),
  penalty: z.number().int().min(0).optional(),
});

/**
 * Configuration for {@link createAvoidedShiftsRule}.
 *
 * - `penalty` (optional): score subtracted for an avoided shift type; defaults to 2
 */
export type AvoidedShiftsConfig = z.infer<typeof AvoidedShiftsSchema>;

export const DEFAULT_AVOIDANCE_PENALTY = 2;

/**
 * Deprioritizes employees for shift types they would rather not work.
 * They stay candidates and are picked when nobody else is eligible.
 */
export function createAvoidedShiftsRule(config: AvoidedShiftsConfig = {}): SoftRule {
  const { penalty = DEFAULT_AVOIDANCE_PENALTY } = parseRuleConfig(
    "avoided-shifts",
    AvoidedShiftsSchema,
    config,
  );

  return {
    kind: "soft",
    name: "avoided-shifts",
    score: ({ profile, slot }) => (profile.avoidedShiftTypes.has(slot.shiftType) ? -penalty : 0),
  };
}
