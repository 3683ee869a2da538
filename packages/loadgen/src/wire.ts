import { ConnectionClosedError, ReadTimeoutError } from "@wsload/errors";

// ---------------------------------------------------------------------------
// Wire capability
// ---------------------------------------------------------------------------

export type MessageKind = "text" | "binary";

export interface InboundMessage {
  readonly kind: MessageKind;
  readonly payload: Uint8Array;
}

/**
 * One established WebSocket connection, owned by exactly one worker.
 */
export interface WireConnection {
  /** Human-readable identity for diagnostics (local address when known) */
  readonly label: string;

  /**
   * Next data message. Rejects with ReadTimeoutError once the read deadline
   * passes, ConnectionClosedError when the connection closed, ReadAbortedError
   * when `signal` aborts, or the transport error otherwise.
   */
  readMessage(signal?: AbortSignal): Promise<InboundMessage>;

  /** Write a ping control frame. Rejects with HeartbeatFailedError. */
  ping(): Promise<void>;

  /** Best-effort close frame. */
  close(code: number, reason?: string): void;

  /** Absolute read deadline `ms` from now, replacing any previous one. */
  setReadDeadline(ms: number): void;

  /** Drop the underlying socket immediately. */
  terminate(): void;
}

export interface Dialer {
  /**
   * Rejects with DialError when the handshake cannot be completed or
   * `signal` aborts before it does.
   */
  dial(url: string, signal?: AbortSignal): Promise<WireConnection>;
}

// ---------------------------------------------------------------------------
// Read failure classification
// ---------------------------------------------------------------------------

export type ReadFailureKind = "expected-close" | "timeout" | "unclassified";

/**
 * Sort a failed read into the three outcomes the worker reacts to.
 */
export function classifyReadError(error: unknown): ReadFailureKind {
  if (error instanceof ConnectionClosedError && error.isExpectedClose) {
    return "expected-close";
  }
  if (error instanceof ReadTimeoutError) {
    return "timeout";
  }
  return "unclassified";
}
