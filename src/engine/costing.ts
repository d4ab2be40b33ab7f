import { ScheduleValidationError, type ValidationIssue } from "../errors.js";
import {
  DEFAULT_SHIFT_CATALOG,
  ShiftCatalog,
  type ShiftType,
  type ShiftWindowOverrides,
} from "./shift-types.js";
import type { Assignment, Project } from "./types.js";

export interface CostTotals {
  readonly hours: number;
  readonly cost: number;
  readonly assignments: number;
}

export interface ProjectCostTotals extends CostTotals {
  readonly employeeCount: number;
}

/**
 * Hours and labor cost of a set of assignments. Values are rounded to two
 * decimals; sums are taken before rounding.
 *
 * @category Costing
 */
export interface CoverageSummary {
  readonly byEmployee: ReadonlyMap<string, CostTotals>;
  readonly byProject: ReadonlyMap<string, ProjectCostTotals>;
  readonly totalHours: number;
  readonly totalCost: number;
}

export interface SummaryOptions {
  /** Windows of a bare assignment list; ignored when the source carries `shiftMinutes`. */
  shiftWindows?: ShiftWindowOverrides;
}

/**
 * A {@link CoveragePlan}, or any list of assignments. Shift lengths come from
 * `shiftMinutes` when present.
 */
export interface CoverageSource {
  readonly assignments: readonly Assignment[];
  readonly shiftMinutes?: Readonly<Record<ShiftType, number>>;
}

export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

interface Accumulator {
  minutes: number;
  cost: number;
  assignments: number;
  employees: Set<string>;
}

function accumulate(map: Map<string, Accumulator>, key: string): Accumulator {
  let entry = map.get(key);
  if (!entry) {
    entry = { minutes: 0, cost: 0, assignments: 0, employees: new Set() };
    map.set(key, entry);
  }
  return entry;
}

function totalsOf(entry: Accumulator): CostTotals {
  return {
    hours: roundCurrency(entry.minutes / 60),
    cost: roundCurrency(entry.cost),
    assignments: entry.assignments,
  };
}

/**
 * Totals hours and cost per employee, per project and overall.
 *
 * `cancelled` assignments are skipped; `assigned` and `reported` ones count
 * alike. A plan is priced with the shift windows it was built with.
 *
 * @throws {ScheduleValidationError} if an assignment references a project
 * not in `projects`
 *
 * @example
 * ```typescript
 * const summary = summarizeCoverage(plan, projects);
 * summary.byProject.get("site-a"); // { hours: 16, cost: 400, assignments: 2, employeeCount: 2 }
 * ```
 */
export function summarizeCoverage(
  source: CoverageSource,
  projects: readonly Pick<Project, "id" | "hourlyRate">[],
  options: SummaryOptions = {},
): CoverageSummary {
  const catalog = options.shiftWindows
    ? new ShiftCatalog(options.shiftWindows)
    : DEFAULT_SHIFT_CATALOG;
  const minutesOf = (shiftType: ShiftType) =>
    source.shiftMinutes?.[shiftType] ?? catalog.durationMinutes(shiftType);
  const rates = new Map(projects.map((project) => [project.id, project.hourlyRate]));

  const issues: ValidationIssue[] = [];
  const byEmployee = new Map<string, Accumulator>();
  const byProject = new Map<string, Accumulator>();
  let totalMinutes = 0;
  let totalCost = 0;

  source.assignments.forEach((assignment, index) => {
    if (assignment.status === "cancelled") return;
    const rate = rates.get(assignment.projectId);
    if (rate === undefined) {
      issues.push({
        path: `assignments.${index}.projectId`,
        message: `Unknown project "${assignment.projectId}"`,
      });
      return;
    }

    const minutes = minutesOf(assignment.shiftType);
    const cost = (minutes / 60) * rate;

    for (const entry of [
      accumulate(byEmployee, assignment.employeeId),
      accumulate(byProject, assignment.projectId),
    ]) {
      entry.minutes += minutes;
      entry.cost += cost;
      entry.assignments += 1;
      entry.employees.add(assignment.employeeId);
    }
    totalMinutes += minutes;
    totalCost += cost;
  });

  if (issues.length > 0) {
    throw new ScheduleValidationError("Cannot summarize coverage", issues);
  }

  return {
    byEmployee: new Map([...byEmployee].map(([id, entry]) => [id, totalsOf(entry)])),
    byProject: new Map(
      [...byProject].map(([id, entry]) => [
        id,
        { ...totalsOf(entry), employeeCount: entry.employees.size },
      ]),
    ),
    totalHours: roundCurrency(totalMinutes / 60),
    totalCost: roundCurrency(totalCost),
  };
}
