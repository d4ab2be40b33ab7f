import { buildConstraintProfile, type ConstraintProfile } from "./profile.js";
import { buildSoftRules, MANDATORY_RULES } from "./rules/registry.js";
import type { CandidateContext, HardRule, SoftRule } from "./rules/rules.types.js";
import type { RunStateView } from "./run-state.js";
import type { Employee, ShiftSlot } from "./types.js";

export const DEFAULT_SOFT_RULES: readonly SoftRule[] = buildSoftRules();

/**
 * Builds the context rules judge a candidate by. Without `profile`, the
 * employee's constraints are read as they are now.
 */
export function candidateContext(
  employee: Employee,
  slot: ShiftSlot,
  state: RunStateView,
  profile: ConstraintProfile = buildConstraintProfile(employee),
): CandidateContext {
  return { employee, profile, slot, state };
}

/**
 * True when the employee may take the slot given what they already hold.
 * Inactive employees are never eligible.
 */
export function isEligible(
  employee: Employee,
  slot: ShiftSlot,
  state: RunStateView,
  rules: readonly HardRule[] = MANDATORY_RULES,
  profile?: ConstraintProfile,
): boolean {
  if (!employee.active) return false;
  const ctx = candidateContext(employee, slot, state, profile);
  return rules.every((rule) => rule.allows(ctx));
}

/**
 * Sum of soft rule scores; higher ranks first.
 */
export function preferenceScore(
  employee: Employee,
  slot: ShiftSlot,
  state: RunStateView,
  rules: readonly SoftRule[] = DEFAULT_SOFT_RULES,
  profile?: ConstraintProfile,
): number {
  const ctx = candidateContext(employee, slot, state, profile);
  let score = 0;
  for (const rule of rules) score += rule.score(ctx);
  return score;
}
