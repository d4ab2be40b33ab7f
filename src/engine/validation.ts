import { ScheduleValidationError, type ValidationIssue } from "../errors.js";
import { ScheduleInputSchema } from "./schemas.js";
import type { ScheduleInput } from "./types.js";

/**
 * Parses and cross-checks a run's input.
 *
 * Beyond the schema: employee and project ids must be unique, a `dateRange`
 * recurrence must not end before it starts, and existing assignments must
 * reference known employees and projects.
 *
 * @throws {ScheduleValidationError} listing every problem found
 */
export function parseScheduleInput(data: unknown): ScheduleInput {
  const result = ScheduleInputSchema.safeParse(data);
  if (!result.success) {
    throw ScheduleValidationError.fromZod("Invalid schedule input", result.error);
  }

  const input = result.data;
  const issues: ValidationIssue[] = [];

  const employeeIds = new Set<string>();
  input.employees.forEach((employee, index) => {
    if (employeeIds.has(employee.id)) {
      issues.push({ path: `employees.${index}.id`, message: `Duplicate employee id "${employee.id}"` });
    }
    employeeIds.add(employee.id);
  });

  const projectIds = new Set<string>();
  input.projects.forEach((project, index) => {
    if (projectIds.has(project.id)) {
      issues.push({ path: `projects.${index}.id`, message: `Duplicate project id "${project.id}"` });
    }
    projectIds.add(project.id);

    project.requirements.forEach((requirement, reqIndex) => {
      const { recurrence } = requirement;
      if (recurrence.type === "dateRange" && recurrence.end < recurrence.start) {
        issues.push({
          path: `projects.${index}.requirements.${reqIndex}.recurrence.end`,
          message: `Range ends (${recurrence.end}) before it starts (${recurrence.start})`,
        });
      }
    });
  });

  (input.existingAssignments ?? []).forEach((assignment, index) => {
    if (!employeeIds.has(assignment.employeeId)) {
      issues.push({
        path: `existingAssignments.${index}.employeeId`,
        message: `Unknown employee "${assignment.employeeId}"`,
      });
    }
    if (!projectIds.has(assignment.projectId)) {
      issues.push({
        path: `existingAssignments.${index}.projectId`,
        message: `Unknown project "${assignment.projectId}"`,
      });
    }
  });

  if (issues.length > 0) {
    throw new ScheduleValidationError("Invalid schedule input", issues);
  }
  return input;
}
