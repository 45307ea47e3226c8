import { ZodError } from "zod";

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Invalid user input (simulation knobs, request bodies). Reported, never coalesced.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class SimulationCancelledError extends Error {
  readonly completedTrials: number;

  constructor(message: string, completedTrials: number) {
    super(message);
    this.name = "SimulationCancelledError";
    this.completedTrials = completedTrials;
  }
}

export class GlidepathImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GlidepathImportError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
