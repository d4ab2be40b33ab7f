import { ScheduleValidationError } from "../../errors.js";
import { createAllowedDatesRule } from "./allowed-dates.js";
import { createAvailabilityRule } from "./availability.js";
import { createAvoidedShiftsRule } from "./avoided-shifts.js";
import { createBlockedDatesRule } from "./blocked-dates.js";
import { createNoOverlapRule } from "./no-overlap.js";
import { createPreferredShiftsRule } from "./preferred-shifts.js";
import type {
  BuiltInRuleFactories,
  HardRule,
  RuleConfigEntry,
  RuleName,
  SoftRule,
} from "./rules.types.js";
import { createWeeklyHoursCapRule } from "./weekly-hours-cap.js";

export const builtInRuleFactories: BuiltInRuleFactories = {
  "preferred-shifts": createPreferredShiftsRule,
  "weekly-hours-cap": createWeeklyHoursCapRule,
  "avoided-shifts": createAvoidedShiftsRule,
};

/**
 * Hard rules every run enforces. Callers can add to these, never remove them.
 */
export const MANDATORY_RULES: readonly HardRule[] = [
  createAllowedDatesRule(),
  createBlockedDatesRule(),
  createAvailabilityRule(),
  createNoOverlapRule(),
];

/** Built-in soft rules in scoring order, with their default configs. */
export const DEFAULT_RULE_CONFIGS: readonly RuleConfigEntry[] = [
  { name: "preferred-shifts" },
  { name: "weekly-hours-cap" },
  { name: "avoided-shifts" },
];

function createSoftRule(entry: RuleConfigEntry): SoftRule {
  switch (entry.name) {
    case "preferred-shifts":
      return builtInRuleFactories[entry.name](entry);
    case "weekly-hours-cap":
      return builtInRuleFactories[entry.name](entry);
    case "avoided-shifts":
      return builtInRuleFactories[entry.name](entry);
  }
}

/**
 * Builds the built-in soft rules, replacing the default config of every rule
 * named in `overrides`.
 *
 * @throws {ScheduleValidationError} if a rule is configured twice or a config
 * is invalid
 */
export function buildSoftRules(overrides: readonly RuleConfigEntry[] = []): SoftRule[] {
  const byName = new Map<RuleName, RuleConfigEntry>();
  for (const [index, entry] of overrides.entries()) {
    if (byName.has(entry.name)) {
      throw new ScheduleValidationError("Invalid rule configs", [
        { path: `ruleConfigs.${index}.name`, message: `Rule "${entry.name}" is configured twice` },
      ]);
    }
    byName.set(entry.name, entry);
  }

  return DEFAULT_RULE_CONFIGS.map((entry) => createSoftRule(byName.get(entry.name) ?? entry));
}
