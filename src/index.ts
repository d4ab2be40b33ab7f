/**
 * Deterministic shift assignment for multi-site staffing.
 *
 * Projects declare recurring staffing requirements (a shift type, a
 * recurrence and a headcount). For a planning window the engine expands them
 * into concrete slots and fills each one greedily from the employees who may
 * work it, then prices the result.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Shift types**: `morning` (06:00-14:00), `afternoon` (14:00-22:00) and
 * `night` (22:00-06:00 the next day). Windows can be overridden per run.
 *
 * **Rules**: hard rules decide who may take a slot (allowed and blocked
 * dates, declared availability, no overlapping shifts) and are always enforced. Soft rules
 * only rank the eligible employees (preferred shifts, a weekly hours cap,
 * avoided shift types) and can be reconfigured by name.
 *
 * **Plans**: {@link ScheduleEngine.run} returns the new assignments, the
 * slots left short of staff and per-slot coverage. {@link summarizeCoverage}
 * turns any list of assignments into hours and labor cost.
 *
 * @example
 * ```typescript
 * import { ScheduleEngine, summarizeCoverage } from "shiftplan";
 *
 * const input = {
 *   employees: [
 *     {
 *       id: "e1",
 *       name: "Ana",
 *       active: true,
 *       availability: [{ shiftType: "morning", dayOfWeek: "monday" }],
 *       blockedDates: [],
 *     },
 *   ],
 *   projects: [
 *     {
 *       id: "site-a",
 *       name: "Warehouse",
 *       hourlyRate: 20,
 *       active: true,
 *       requirements: [
 *         { shiftType: "morning", recurrence: { type: "daily" }, headcount: 1 },
 *       ],
 *     },
 *   ],
 *   window: { start: "2025-03-03", end: "2025-03-03" },
 * };
 *
 * const plan = new ScheduleEngine(input).run();
 * const summary = summarizeCoverage(plan, input.projects);
 * summary.totalCost; // 160
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Time primitives
// ============================================================================

export type { DayOfWeek, DayString, PlanningWindow, TimeOfDay } from "./types.js";

export { DayOfWeekSchema, DayStringSchema, PlanningWindowSchema } from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export { InvariantViolationError, ScheduleValidationError } from "./errors.js";

export type { ValidationIssue } from "./errors.js";

// ============================================================================
// Logging
// ============================================================================

export { createJsonLogger, silentLogger } from "./logger.js";

export type { JsonLoggerOptions, LogFields, Logger, LogLevel } from "./logger.js";

// ============================================================================
// Shift types
// ============================================================================

export {
  DEFAULT_SHIFT_WINDOWS,
  MAX_SHIFT_MINUTES,
  SHIFT_TYPES,
  ShiftCatalog,
  normalizeShiftType,
  overlaps,
} from "./engine/shift-types.js";

export type {
  ShiftType,
  ShiftWindow,
  ShiftWindowOverrides,
  TimeWindow,
} from "./engine/shift-types.js";

// ============================================================================
// Snapshot schemas and types
// ============================================================================

export {
  AssignmentSchema,
  EmployeeSchema,
  ProjectSchema,
  ScheduleInputSchema,
  ShiftRequirementSchema,
} from "./engine/schemas.js";

export type {
  Assignment,
  AssignmentInput,
  AssignmentStatus,
  AvailabilityEntry,
  CoveragePlan,
  Employee,
  EmployeeInput,
  PreferenceEntry,
  Project,
  ProjectInput,
  RecurrenceRule,
  ScheduleInput,
  ScheduleInputData,
  ShiftRequirement,
  ShiftSlot,
  SlotCoverage,
  UnfilledSlot,
} from "./engine/types.js";

export { parseScheduleInput } from "./engine/validation.js";

// ============================================================================
// Engine
// ============================================================================

export { ScheduleEngine, createCoveragePlan } from "./engine/engine.js";

export type { EnginePhase } from "./engine/engine.js";

export { resolveEngineOptions } from "./engine/options.js";

export type { EngineOptions, ResolvedEngineOptions } from "./engine/options.js";

export { expandRequirements } from "./engine/expander.js";

export { isEligible, preferenceScore } from "./engine/eligibility.js";

export { RunState } from "./engine/run-state.js";

export type { HeldShift, RunStateView } from "./engine/run-state.js";

// ============================================================================
// Rules
// ============================================================================

export {
  DEFAULT_RULE_CONFIGS,
  MANDATORY_RULES,
  builtInRuleFactories,
  createAllowedDatesRule,
  createAvoidedShiftsRule,
  createPreferredShiftsRule,
  createWeeklyHoursCapRule,
} from "./engine/rules/index.js";

export type {
  AssignmentRule,
  AvoidedShiftsConfig,
  CandidateContext,
  HardRule,
  PreferredShiftsConfig,
  RuleConfigEntry,
  RuleName,
  SoftRule,
  WeeklyHoursCapConfig,
} from "./engine/rules/index.js";

// ============================================================================
// Costing
// ============================================================================

export { roundCurrency, summarizeCoverage } from "./engine/costing.js";

export type {
  CostTotals,
  CoverageSummary,
  ProjectCostTotals,
  CoverageSource,
  SummaryOptions,
} from "./engine/costing.js";
