/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by wsload is declared here with its domain,
 * whether it is an expected (operational) condition, and a short description.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: config, connection, internal
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and broken invariants
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_INVARIANT_VIOLATED: {
    domain: "internal",
    isExpected: false,
    title: "Invariant violated",
    description: "A runtime invariant of the load generator no longer holds",
  },

  // ============================================================================
  // CONFIG ERRORS - Run configuration
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    isExpected: true,
    title: "Invalid configuration",
    description: "The run configuration failed validation",
  },

  // ============================================================================
  // CONNECTION ERRORS - Wire-level failures on a single connection
  // ============================================================================
  CONNECTION_DIAL_FAILED: {
    domain: "connection",
    isExpected: true,
    title: "Dial failed",
    description: "The WebSocket handshake could not be completed",
  },
  CONNECTION_CLOSED: {
    domain: "connection",
    isExpected: true,
    title: "Connection closed",
    description: "The peer or the transport closed the connection",
  },
  CONNECTION_READ_TIMEOUT: {
    domain: "connection",
    isExpected: true,
    title: "Read timeout",
    description: "No message arrived before the read deadline",
  },
  CONNECTION_READ_ABORTED: {
    domain: "connection",
    isExpected: true,
    title: "Read aborted",
    description: "A pending read was abandoned because the run is shutting down",
  },
  CONNECTION_HEARTBEAT_FAILED: {
    domain: "connection",
    isExpected: true,
    title: "Heartbeat failed",
    description: "The ping control frame could not be written",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific domain
 */
export type CodesForDomain<D extends ErrorDomain> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["domain"] extends D ? K : never;
}[ErrorCode];
