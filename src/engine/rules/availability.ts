import { dayOfWeekOf } from "../../datetime.utils.js";
import { shiftDayKey } from "../profile.js";
import type { HardRule } from "./rules.types.js";

/**
 * Only admits employees who declared the slot's shift type on the slot's
 * weekday. An employee with no availability entries is never a candidate.
 */
export function createAvailabilityRule(): HardRule {
  return {
    kind: "hard",
    name: "availability",
    allows: ({ profile, slot }) =>
      profile.availability.has(shiftDayKey(slot.shiftType, dayOfWeekOf(slot.date))),
  };
}
