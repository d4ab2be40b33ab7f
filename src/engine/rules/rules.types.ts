import type { ConstraintProfile } from "../profile.js";
import type { RunStateView } from "../run-state.js";
import type { Employee, ShiftSlot } from "../types.js";

/**
 * Everything a rule may look at when judging one employee for one slot.
 */
export interface CandidateContext {
  readonly employee: Employee;
  readonly profile: ConstraintProfile;
  readonly slot: ShiftSlot;
  readonly state: RunStateView;
}

/**
 * A predicate that must hold for the employee to be a candidate at all.
 */
export interface HardRule {
  readonly kind: "hard";
  readonly name: string;
  allows(ctx: CandidateContext): boolean;
}

/**
 * A ranking signal. Scores of all soft rules are summed; a soft rule never
 * removes a candidate.
 */
export interface SoftRule {
  readonly kind: "soft";
  readonly name: string;
  score(ctx: CandidateContext): number;
}

export type AssignmentRule = HardRule | SoftRule;

export type CreateRuleFunction<TConfig, TRule extends AssignmentRule = AssignmentRule> = (
  config: TConfig,
) => TRule;

// Registry of configurable built-in rule names to their config types
export interface RuleRegistry {
  "preferred-shifts": import("./preferred-shifts.js").PreferredShiftsConfig;
  "weekly-hours-cap": import("./weekly-hours-cap.js").WeeklyHoursCapConfig;
  "avoided-shifts": import("./avoided-shifts.js").AvoidedShiftsConfig;
}

export type RuleName = keyof RuleRegistry;

export type BuiltInRuleFactories = {
  [K in RuleName]: CreateRuleFunction<RuleRegistry[K], SoftRule>;
};

/**
 * A named rule configuration entry. `name` is the discriminant and the
 * config fields sit beside it.
 *
 * @category Rules
 * @example
 * ```ts
 * const ruleConfigs: RuleConfigEntry[] = [
 *   { name: "weekly-hours-cap", hours: 32 },
 *   { name: "preferred-shifts", weight: 3 },
 * ];
 * ```
 */
export type RuleConfigEntry = {
  [K in RuleName]: { name: K } & RuleRegistry[K];
}[RuleName];
