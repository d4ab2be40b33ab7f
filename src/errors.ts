import type * as z from "zod";

/**
 * A single problem found in a run's input or options.
 */
export interface ValidationIssue {
  /** Dotted location of the offending value, e.g. `projects.1.requirements.0.headcount`. */
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when a run's input or options are malformed or inconsistent.
 *
 * Raised before any assignment is made; no partial plan exists when this is
 * thrown. `issues` names every offending employee, project, requirement or
 * assignment found.
 *
 * @category Errors
 */
export class ScheduleValidationError extends Error {
  public readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[]) {
    const detail = issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ");
    super(detail ? `${message}: ${detail}` : message);
    this.name = "ScheduleValidationError";
    this.issues = issues;
  }

  static fromZod(message: string, error: z.ZodError, prefix: readonly PropertyKey[] = []) {
    return new ScheduleValidationError(
      message,
      error.issues.map((issue) => ({
        path: formatPath([...prefix, ...issue.path]),
        message: issue.message,
      })),
    );
  }
}

/**
 * Thrown when the engine is about to break one of its own guarantees
 * (double-booking an employee, overfilling a slot, running out of phase order).
 *
 * Indicates a bug, not bad input.
 *
 * @category Errors
 */
export class InvariantViolationError extends Error {
  public readonly data: unknown;

  constructor(message: string, data?: unknown) {
    super(message);
    this.name = "InvariantViolationError";
    this.data = data;
  }
}

export function formatPath(path: readonly PropertyKey[]): string {
  return path.map((segment) => String(segment)).join(".");
}
