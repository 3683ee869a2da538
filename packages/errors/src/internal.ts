import { LoadTestError } from "./base.js";
import type { CodesForDomain } from "./catalog.js";

type InternalCode = CodesForDomain<"internal">;

/**
 * Errors caused by bugs or broken invariants.
 * The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends LoadTestError {
  readonly code: C;

  constructor(
    code: C,
    message: string,
    metadata?: Record<string, string>,
    options?: { cause?: unknown },
  ) {
    super(message, metadata, options);
    this.code = code;
  }
}

/**
 * Thrown when a counter or state machine invariant no longer holds.
 */
export class InvariantViolationError extends InternalError<"INTERNAL_INVARIANT_VIOLATED"> {
  constructor(message: string, metadata?: Record<string, string>) {
    super("INTERNAL_INVARIANT_VIOLATED", message, metadata);
  }
}
