import { IncomingMessage } from "node:http";
import {
  CLOSE_ABNORMAL,
  DialError,
  HeartbeatFailedError,
  InvariantViolationError,
  ReadAbortedError,
  ReadTimeoutError,
  ConnectionClosedError,
} from "@wsload/errors";
import { WebSocket } from "ws";
import { type Clock, defaultClock, type TimerHandle } from "./clock.js";
import { DEFAULT_HANDSHAKE_TIMEOUT_MS } from "./constants.js";
import type { Dialer, InboundMessage, WireConnection } from "./wire.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The slice of a `ws` WebSocket the adapter relies on.
 * Injectable for testing.
 */
export interface WebSocketLike {
  readonly readyState: number;
  on(event: string, handler: (...args: unknown[]) => void): unknown;
  ping(data?: undefined, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface SocketOptions {
  readonly handshakeTimeout: number;
}

/**
 * Factory for creating WebSocket client instances.
 */
export type SocketFactory = (url: string, options: SocketOptions) => WebSocketLike;

export interface WsDialerOptions {
  readonly factory?: SocketFactory;
  readonly handshakeTimeoutMs?: number;
  readonly clock?: Clock;
}

// ---------------------------------------------------------------------------
// WS Ready States
// ---------------------------------------------------------------------------

const WS_OPEN = 1;

const defaultFactory: SocketFactory = (url, options) =>
  new WebSocket(url, { handshakeTimeout: options.handshakeTimeout });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toBytes(data: unknown): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part)));
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (data instanceof Uint8Array) {
    return data;
  }
  return Buffer.from(String(data));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describeLocalAddress(response: unknown): string | undefined {
  if (!(response instanceof IncomingMessage)) {
    return undefined;
  }
  const { localAddress, localPort } = response.socket;
  return localAddress === undefined ? undefined : `${localAddress}:${String(localPort)}`;
}

// ---------------------------------------------------------------------------
// WsDialer
// ---------------------------------------------------------------------------

/**
 * Dials WebSocket endpoints with the `ws` library and hands back
 * pull-based connections with read deadlines.
 */
export class WsDialer implements Dialer {
  private readonly factory: SocketFactory;
  private readonly handshakeTimeoutMs: number;
  private readonly clock: Clock;
  private dialCount = 0;

  constructor(options: WsDialerOptions = {}) {
    this.factory = options.factory ?? defaultFactory;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.clock = options.clock ?? defaultClock;
  }

  /**
   * Resolves when the WebSocket is open.
   * Rejects with DialError on error, close or signal abort during the handshake.
   */
  dial(url: string, signal?: AbortSignal): Promise<WireConnection> {
    if (signal?.aborted) {
      return Promise.reject(new DialError(url, new Error("dial aborted")));
    }

    this.dialCount += 1;
    const fallbackLabel = `conn-${this.dialCount}`;

    let socket: WebSocketLike;
    try {
      socket = this.factory(url, { handshakeTimeout: this.handshakeTimeoutMs });
    } catch (err) {
      return Promise.reject(new DialError(url, toError(err)));
    }

    return new Promise<WireConnection>((resolve, reject) => {
      let settled = false;
      let label = fallbackLabel;

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        fn();
      };

      const onAbort = () => {
        settle(() => {
          socket.terminate();
          reject(new DialError(url, new Error("dial aborted")));
        });
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      socket.on("upgrade", (response: unknown) => {
        label = describeLocalAddress(response) ?? fallbackLabel;
      });

      socket.on("open", () => {
        settle(() => resolve(new WsConnection(socket, label, this.clock)));
      });

      socket.on("error", (err: unknown) => {
        settle(() => reject(new DialError(url, toError(err))));
      });

      socket.on("close", (code: unknown) => {
        settle(() =>
          reject(
            new DialError(url, new Error(`closed during handshake: code=${String(code)}`)),
          ),
        );
      });
    });
  }
}

// ---------------------------------------------------------------------------
// WsConnection
// ---------------------------------------------------------------------------

interface PendingRead {
  readonly resolve: (message: InboundMessage) => void;
  readonly reject: (error: Error) => void;
  readonly signal: AbortSignal | undefined;
  readonly onAbort: () => void;
  timer: TimerHandle | undefined;
}

/**
 * Buffers inbound frames from a `ws` socket and serves them one read at a
 * time. A terminal failure (close or transport error) is remembered and
 * handed to every read once the buffer is drained.
 */
export class WsConnection implements WireConnection {
  private readonly socket: WebSocketLike;
  private readonly clock: Clock;
  private readonly inbox: InboundMessage[] = [];
  private failure: Error | undefined;
  private pending: PendingRead | undefined;
  private deadlineAt: number | undefined;
  private deadlineMs = 0;

  readonly label: string;

  constructor(socket: WebSocketLike, label: string, clock: Clock = defaultClock) {
    this.socket = socket;
    this.label = label;
    this.clock = clock;

    socket.on("message", (data: unknown, isBinary: unknown) => {
      this.deliver({ kind: isBinary === true ? "binary" : "text", payload: toBytes(data) });
    });

    socket.on("close", (code: unknown, reason: unknown) => {
      const closeCode = typeof code === "number" ? code : CLOSE_ABNORMAL;
      this.fail(new ConnectionClosedError(closeCode, String(reason ?? "")));
    });

    socket.on("error", (err: unknown) => {
      this.fail(toError(err));
    });
  }

  readMessage(signal?: AbortSignal): Promise<InboundMessage> {
    if (this.pending) {
      return Promise.reject(new InvariantViolationError("concurrent reads on one connection"));
    }

    const next = this.inbox.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (signal?.aborted) {
      return Promise.reject(new ReadAbortedError());
    }
    if (this.deadlineAt !== undefined && this.clock.now() >= this.deadlineAt) {
      return Promise.reject(new ReadTimeoutError(this.deadlineMs));
    }

    return new Promise<InboundMessage>((resolve, reject) => {
      const onAbort = () => {
        this.takePending()?.reject(new ReadAbortedError());
      };
      this.pending = { resolve, reject, signal, onAbort, timer: undefined };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.armDeadline();
    });
  }

  ping(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.readyState !== WS_OPEN) {
        reject(new HeartbeatFailedError());
        return;
      }
      try {
        this.socket.ping(undefined, undefined, (err) => {
          if (err) {
            reject(new HeartbeatFailedError(err));
          } else {
            resolve();
          }
        });
      } catch (err) {
        reject(new HeartbeatFailedError(toError(err)));
      }
    });
  }

  close(code: number, reason = ""): void {
    this.socket.close(code, reason);
  }

  setReadDeadline(ms: number): void {
    this.deadlineMs = ms;
    this.deadlineAt = this.clock.now() + ms;
    this.armDeadline();
  }

  terminate(): void {
    this.takePending()?.reject(new ReadAbortedError());
    this.socket.terminate();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private deliver(message: InboundMessage): void {
    const pending = this.takePending();
    if (pending) {
      pending.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.takePending()?.reject(error);
  }

  private armDeadline(): void {
    const pending = this.pending;
    if (!pending || this.deadlineAt === undefined) return;

    if (pending.timer !== undefined) {
      this.clock.clearTimeout(pending.timer);
    }
    const remaining = Math.max(0, this.deadlineAt - this.clock.now());
    pending.timer = this.clock.setTimeout(() => {
      this.takePending()?.reject(new ReadTimeoutError(this.deadlineMs));
    }, remaining);
  }

  /**
   * Detach the pending read (timer and abort listener included) so it can be settled once.
   */
  private takePending(): PendingRead | undefined {
    const pending = this.pending;
    if (!pending) return undefined;
    this.pending = undefined;
    if (pending.timer !== undefined) {
      this.clock.clearTimeout(pending.timer);
    }
    pending.signal?.removeEventListener("abort", pending.onAbort);
    return pending;
  }
}
