import { ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for every error raised by wsload.
 *
 * Subclasses fix `code`; domain and `isExpected` are looked up in the catalog
 * so the two can never drift apart.
 */
export abstract class LoadTestError extends Error {
  abstract readonly code: ErrorCode;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata ? Object.freeze({ ...metadata }) : undefined;
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }
}
