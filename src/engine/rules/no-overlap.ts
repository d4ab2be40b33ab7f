import { overlaps } from "../shift-types.js";
import type { HardRule } from "./rules.types.js";

/**
 * Rejects employees already holding a shift whose window overlaps the slot's,
 * including overnight shifts that spill into the slot's date.
 */
export function createNoOverlapRule(): HardRule {
  return {
    kind: "hard",
    name: "no-overlap",
    allows: ({ employee, slot, state }) =>
      !state.heldShifts(employee.id).some((held) => overlaps(held, slot)),
  };
}
