import { LoadTestError } from "./base.js";

// ---------------------------------------------------------------------------
// Close codes
// ---------------------------------------------------------------------------

/** RFC 6455 close codes the load generator cares about */
export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_NO_STATUS_RECEIVED = 1005;
export const CLOSE_ABNORMAL = 1006;

/** Close codes that mean a sanctioned shutdown rather than a fault */
export const EXPECTED_CLOSE_CODES: ReadonlySet<number> = new Set([
  CLOSE_NORMAL,
  CLOSE_GOING_AWAY,
  CLOSE_NO_STATUS_RECEIVED,
]);

// ---------------------------------------------------------------------------
// Base class for all connection errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for connection errors.
 *
 * Enables generic catch: `if (e instanceof ConnectionError)`
 * while specific subclasses allow precise handling.
 */
export abstract class ConnectionError extends LoadTestError {}

// ---------------------------------------------------------------------------
// Dial failed
// ---------------------------------------------------------------------------

/**
 * Thrown when the opening handshake fails (refused, DNS, TLS, bad status, timeout).
 */
export class DialError extends ConnectionError {
  readonly code = "CONNECTION_DIAL_FAILED" as const;
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(
      `Failed to dial ${url}: ${cause instanceof Error ? cause.message : "unknown error"}`,
      { url },
      cause === undefined ? undefined : { cause },
    );
    this.url = url;
  }
}

// ---------------------------------------------------------------------------
// Connection closed
// ---------------------------------------------------------------------------

/**
 * Raised by a read when the connection has been closed, carrying the close code.
 */
export class ConnectionClosedError extends ConnectionError {
  readonly code = "CONNECTION_CLOSED" as const;
  readonly closeCode: number;
  readonly reason: string;

  constructor(closeCode: number, reason = "") {
    super(`Connection closed: code=${closeCode}${reason ? `, reason=${reason}` : ""}`, {
      closeCode: String(closeCode),
    });
    this.closeCode = closeCode;
    this.reason = reason;
  }

  /**
   * Normal closure, going away, or no status received.
   */
  get isExpectedClose(): boolean {
    return EXPECTED_CLOSE_CODES.has(this.closeCode);
  }
}

// ---------------------------------------------------------------------------
// Read timeout
// ---------------------------------------------------------------------------

/**
 * Raised by a read when the read deadline elapses with no message.
 */
export class ReadTimeoutError extends ConnectionError {
  readonly code = "CONNECTION_READ_TIMEOUT" as const;
  readonly deadlineMs: number;

  constructor(deadlineMs: number) {
    super(`No message received within ${deadlineMs}ms`);
    this.deadlineMs = deadlineMs;
  }
}

// ---------------------------------------------------------------------------
// Read aborted
// ---------------------------------------------------------------------------

/**
 * Raised by a read that was abandoned because its abort signal fired.
 */
export class ReadAbortedError extends ConnectionError {
  readonly code = "CONNECTION_READ_ABORTED" as const;

  constructor() {
    super("Read aborted by shutdown");
  }
}

// ---------------------------------------------------------------------------
// Heartbeat failed
// ---------------------------------------------------------------------------

/**
 * Thrown when a ping control frame cannot be written.
 */
export class HeartbeatFailedError extends ConnectionError {
  readonly code = "CONNECTION_HEARTBEAT_FAILED" as const;

  constructor(cause?: unknown) {
    super(
      `Ping failed: ${cause instanceof Error ? cause.message : "connection not open"}`,
      undefined,
      cause === undefined ? undefined : { cause },
    );
  }
}
