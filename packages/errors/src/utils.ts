import { LoadTestError } from "./base.js";
import { InternalError } from "./internal.js";

/**
 * Wrap an unknown error into a LoadTestError.
 * If the error is already a LoadTestError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): LoadTestError {
  if (error instanceof LoadTestError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError("INTERNAL_ERROR", error.message, { originalName: error.name }, {
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError("INTERNAL_ERROR", message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}
