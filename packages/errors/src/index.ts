/**
 * @wsload/errors
 *
 * Shared error taxonomy for the wsload WebSocket load generator.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` for category matching.
 */

export { LoadTestError } from "./base.js";

export {
  type CodesForDomain,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { ConfigurationError, type ValidationIssue } from "./config.js";

export {
  CLOSE_ABNORMAL,
  CLOSE_GOING_AWAY,
  CLOSE_NO_STATUS_RECEIVED,
  CLOSE_NORMAL,
  ConnectionClosedError,
  ConnectionError,
  DialError,
  EXPECTED_CLOSE_CODES,
  HeartbeatFailedError,
  ReadAbortedError,
  ReadTimeoutError,
} from "./connection.js";

export { InternalError, InvariantViolationError } from "./internal.js";

export { getErrorMessage, wrapError } from "./utils.js";
