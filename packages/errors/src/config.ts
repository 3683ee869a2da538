import { LoadTestError } from "./base.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Thrown when the run configuration fails validation.
 * Fatal: raised before any worker starts.
 */
export class ConfigurationError extends LoadTestError {
  readonly code = "CONFIG_INVALID" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      undefined,
      cause === undefined ? undefined : { cause },
    );
    this.issues = issues;
  }
}
