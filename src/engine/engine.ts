import { InvariantViolationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { isEligible, preferenceScore } from "./eligibility.js";
import { expandRequirements, slotKey } from "./expander.js";
import { resolveEngineOptions, type EngineOptions } from "./options.js";
import { RunState } from "./run-state.js";
import { buildConstraintProfiles, type ConstraintProfile } from "./profile.js";
import { overlaps, type ShiftCatalog } from "./shift-types.js";
import type { HardRule, SoftRule } from "./rules/rules.types.js";
import type {
  Assignment,
  CoveragePlan,
  Employee,
  ScheduleInput,
  ScheduleInputData,
  ShiftSlot,
  SlotCoverage,
  UnfilledSlot,
} from "./types.js";
import { parseScheduleInput } from "./validation.js";

export type EnginePhase = "initialized" | "expanding" | "assigning" | "finalized" | "failed";

interface RankedCandidate {
  readonly employee: Employee;
  readonly score: number;
  readonly loadMinutes: number;
}

function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.loadMinutes !== b.loadMinutes) return a.loadMinutes - b.loadMinutes;
  if (a.employee.id === b.employee.id) return 0;
  return a.employee.id < b.employee.id ? -1 : 1;
}

/**
 * Greedy, deterministic shift assignment over one planning window.
 *
 * Slots are filled in date, shift and project order. For each slot the
 * eligible employees are ranked by preference score (highest first), then by
 * minutes already held in the window (fewest first), then by id. Slots that
 * cannot be fully staffed are reported in `plan.unfilled`.
 *
 * The input is validated on construction; nothing is assigned if it is
 * invalid. `run()` computes the plan once and returns the same plan on later
 * calls. If a run throws, the engine moves to `failed` and later calls
 * rethrow the same error.
 *
 * @category Engine
 * @example
 * ```typescript
 * const engine = new ScheduleEngine({ employees, projects, window });
 * const plan = engine.run();
 * plan.unfilled; // slots short of staff
 * ```
 */
export class ScheduleEngine {
  readonly input: ScheduleInput;

  #phase: EnginePhase = "initialized";
  #plan: CoveragePlan | undefined;
  #failure: unknown;

  readonly #catalog: ShiftCatalog;
  readonly #hardRules: readonly HardRule[];
  readonly #softRules: readonly SoftRule[];
  readonly #logger: Logger;
  readonly #runId: string | undefined;

  /**
   * @throws {ScheduleValidationError} if the input or options are invalid
   */
  constructor(input: ScheduleInputData, options: EngineOptions = {}) {
    const resolved = resolveEngineOptions(options);
    this.input = parseScheduleInput(input);
    this.#catalog = resolved.catalog;
    this.#hardRules = resolved.hardRules;
    this.#softRules = resolved.softRules;
    this.#logger = resolved.logger;
    this.#runId = resolved.runId;
  }

  get phase(): EnginePhase {
    return this.#phase;
  }

  run(): CoveragePlan {
    if (this.#plan) {
      return this.#plan;
    }
    if (this.#phase === "failed") {
      throw this.#failure;
    }

    try {
      this.#plan = this.#execute();
      return this.#plan;
    } catch (error) {
      this.#phase = "failed";
      this.#failure = error;
      this.#logger.error({
        event: "run.failed",
        run_id: this.#runId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  #execute(): CoveragePlan {
    const { window, employees, projects } = this.input;
    this.#logger.info({
      event: "run.started",
      run_id: this.#runId,
      window_start: window.start,
      window_end: window.end,
      employees: employees.length,
      projects: projects.length,
    });

    this.#transition("initialized", "expanding");
    const slots = expandRequirements(projects, window, this.#catalog);
    this.#logger.info({ event: "run.expanded", run_id: this.#runId, slots: slots.length });

    this.#transition("expanding", "assigning");
    const state = this.#seedState();
    const profiles = buildConstraintProfiles(employees);
    const preexisting = new Map(slots.map((slot) => [slot.key, state.coverageOf(slot.key)]));

    const assignments: Assignment[] = [];
    const unfilled: UnfilledSlot[] = [];
    const coverage: SlotCoverage[] = [];

    for (const slot of slots) {
      const held = preexisting.get(slot.key) ?? 0;
      const seats = Math.max(0, slot.requiredCount - held);
      const picked = this.#rankCandidates(slot, state, profiles).slice(0, seats);

      for (const [index, candidate] of picked.entries()) {
        this.#assertAssignable(candidate.employee, slot, state, held + index);
        state.record(
          {
            employeeId: candidate.employee.id,
            projectId: slot.projectId,
            date: slot.date,
            shiftType: slot.shiftType,
            start: slot.start,
            end: slot.end,
            durationMinutes: slot.durationMinutes,
            source: "run",
          },
          slot.key,
        );
        assignments.push({
          employeeId: candidate.employee.id,
          projectId: slot.projectId,
          date: slot.date,
          shiftType: slot.shiftType,
          status: "assigned",
        });
      }

      const shortfall = seats - picked.length;
      if (shortfall > 0) {
        unfilled.push({
          projectId: slot.projectId,
          date: slot.date,
          shiftType: slot.shiftType,
          shortfall,
        });
        this.#logger.warn({
          event: "slot.shortfall",
          run_id: this.#runId,
          slot: slot.key,
          project_id: slot.projectId,
          required: slot.requiredCount,
          shortfall,
        });
      }

      coverage.push({
        key: slot.key,
        projectId: slot.projectId,
        date: slot.date,
        shiftType: slot.shiftType,
        requiredCount: slot.requiredCount,
        preexisting: held,
        assigned: picked.length,
        shortfall,
      });
    }

    this.#transition("assigning", "finalized");
    const shiftMinutes = {
      morning: this.#catalog.durationMinutes("morning"),
      afternoon: this.#catalog.durationMinutes("afternoon"),
      night: this.#catalog.durationMinutes("night"),
    };
    this.#logger.info({
      event: "run.finalized",
      run_id: this.#runId,
      assignments: assignments.length,
      unfilled: unfilled.length,
    });
    return { window, shiftMinutes, assignments, unfilled, slots: coverage };
  }

  #transition(from: EnginePhase, to: EnginePhase): void {
    if (this.#phase !== from) {
      throw new InvariantViolationError(`Cannot move to "${to}" from "${this.#phase}"`, {
        expected: from,
        actual: this.#phase,
      });
    }
    this.#phase = to;
  }

  #seedState(): RunState {
    const state = new RunState(this.input.window);
    for (const assignment of this.input.existingAssignments ?? []) {
      if (assignment.status === "cancelled") continue;
      state.record(
        {
          employeeId: assignment.employeeId,
          projectId: assignment.projectId,
          date: assignment.date,
          shiftType: assignment.shiftType,
          durationMinutes: this.#catalog.durationMinutes(assignment.shiftType),
          ...this.#catalog.windowOn(assignment.date, assignment.shiftType),
          source: "existing",
        },
        slotKey(assignment.projectId, assignment.date, assignment.shiftType),
      );
    }
    return state;
  }

  #rankCandidates(
    slot: ShiftSlot,
    state: RunState,
    profiles: ReadonlyMap<string, ConstraintProfile>,
  ): RankedCandidate[] {
    const ranked: RankedCandidate[] = [];
    for (const employee of this.input.employees) {
      const profile = profiles.get(employee.id);
      if (!isEligible(employee, slot, state, this.#hardRules, profile)) continue;
      ranked.push({
        employee,
        score: preferenceScore(employee, slot, state, this.#softRules, profile),
        loadMinutes: state.loadMinutes(employee.id),
      });
    }
    return ranked.sort(compareCandidates);
  }

  #assertAssignable(
    employee: Employee,
    slot: ShiftSlot,
    state: RunState,
    filledSeats: number,
  ): void {
    const conflict = state.heldShifts(employee.id).find((held) => overlaps(held, slot));
    if (conflict) {
      throw new InvariantViolationError(
        `Employee "${employee.id}" would be double-booked on ${slot.key}`,
        { employeeId: employee.id, slot: slot.key, conflict },
      );
    }
    if (filledSeats >= slot.requiredCount) {
      throw new InvariantViolationError(`Slot ${slot.key} would exceed its headcount`, {
        slot: slot.key,
        requiredCount: slot.requiredCount,
      });
    }
  }
}

/**
 * Validates `input`, runs the engine once and returns its plan.
 *
 * @throws {ScheduleValidationError} if the input or options are invalid
 */
export function createCoveragePlan(
  input: ScheduleInputData,
  options?: EngineOptions,
): CoveragePlan {
  return new ScheduleEngine(input, options).run();
}
