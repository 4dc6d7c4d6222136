export type ViolationSeverity = "error" | "warning";

export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: ViolationSeverity;
}

/**
 * Successful validation result.
 * May still contain warnings, but no errors.
 */
export interface ValidationSuccess {
  readonly success: true;
  readonly violations: readonly Violation[];
}

/**
 * Failed validation result.
 * Contains at least one error-level violation.
 */
export interface ValidationFailure {
  readonly success: false;
  readonly violations: readonly Violation[];
}

/**
 * Use `if (result.success)` to narrow.
 */
export type MazeValidationResult = ValidationSuccess | ValidationFailure;

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}
