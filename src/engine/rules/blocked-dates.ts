import type { HardRule } from "./rules.types.js";

/**
 * Rejects employees who blocked the slot's date.
 */
export function createBlockedDatesRule(): HardRule {
  return {
    kind: "hard",
    name: "blocked-dates",
    allows: ({ profile, slot }) => !profile.blockedDates.has(slot.date),
  };
}
