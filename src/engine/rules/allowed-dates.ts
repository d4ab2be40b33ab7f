import type { HardRule } from "./rules.types.js";

/**
 * Restricts employees with a date whitelist to those dates. Employees without
 * one pass.
 */
export function createAllowedDatesRule(): HardRule {
  return {
    kind: "hard",
    name: "allowed-dates",
    allows: ({ profile, slot }) => !profile.allowedDates || profile.allowedDates.has(slot.date),
  };
}
