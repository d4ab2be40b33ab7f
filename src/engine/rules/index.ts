export * from "./rules.types.js";
export { createAllowedDatesRule } from "./allowed-dates.js";
export { createAvailabilityRule } from "./availability.js";
export { createAvoidedShiftsRule, type AvoidedShiftsConfig } from "./avoided-shifts.js";
export { createBlockedDatesRule } from "./blocked-dates.js";
export { createNoOverlapRule } from "./no-overlap.js";
export { createPreferredShiftsRule, type PreferredShiftsConfig } from "./preferred-shifts.js";
export { createWeeklyHoursCapRule, type WeeklyHoursCapConfig } from "./weekly-hours-cap.js";
export {
  builtInRuleFactories,
  buildSoftRules,
  DEFAULT_RULE_CONFIGS,
  MANDATORY_RULES,
} from "./registry.js";
