import type { LoadTestConfig } from "../config.js";
import { parseLoadTestConfig } from "../config.js";
import type { Logger, LogLevel } from "../logger.js";
import { createSession, type Session } from "../session.js";
import type { ShutdownSignal } from "../shutdown-signal.js";
import { type SocketOptions, type WebSocketLike, WsDialer } from "../ws-dialer.js";

export const TEST_URL = "ws://test.local/ws";

// ---------------------------------------------------------------------------
// Mock WebSocket
// ---------------------------------------------------------------------------

export interface MockSocket extends WebSocketLike {
  readyState: number;
  readonly url: string;
  readonly options: SocketOptions;
  /** Set to make the next pings fail */
  _pingError: Error | undefined;
  _pings: number;
  _closeCalls: Array<{ code: number | undefined; reason: string | undefined }>;
  _terminated: boolean;
  _listeners: Map<string, Array<(...args: unknown[]) => void>>;
  _simulateOpen: () => void;
  _simulateMessage: (data: string | Buffer, isBinary?: boolean) => void;
  _simulateClose: (code: number, reason?: string) => void;
  _simulateError: (error: Error) => void;
}

export function createMockSocket(
  url: string = TEST_URL,
  options: SocketOptions = { handshakeTimeout: 45_000 },
): MockSocket {
  const listeners = new Map<string, Array<(...args: unknown[]) => void>>();

  const emit = (event: string, ...args: unknown[]) => {
    for (const h of listeners.get(event) ?? []) h(...args);
  };

  const ws: MockSocket = {
    readyState: 0,
    url,
    options,
    _pingError: undefined,
    _pings: 0,
    _closeCalls: [],
    _terminated: false,
    _listeners: listeners,

    on(event: string, handler: (...args: unknown[]) => void) {
      const existing = listeners.get(event) ?? [];
      listeners.set(event, [...existing, handler]);
      return ws;
    },

    ping(_data?: undefined, _mask?: boolean, cb?: (err?: Error) => void) {
      ws._pings += 1;
      cb?.(ws._pingError);
    },

    close(code?: number, reason?: string) {
      ws._closeCalls.push({ code, reason });
    },

    terminate() {
      ws._terminated = true;
      ws.readyState = 3;
    },

    _simulateOpen() {
      ws.readyState = 1;
      emit("open");
    },

    _simulateMessage(data: string | Buffer, isBinary = false) {
      emit("message", typeof data === "string" ? Buffer.from(data) : data, isBinary);
    },

    _simulateClose(code: number, reason = "") {
      ws.readyState = 3;
      emit("close", code, Buffer.from(reason));
    },

    _simulateError(error: Error) {
      emit("error", error);
    },
  };

  return ws;
}

// ---------------------------------------------------------------------------
// Mock dialer
// ---------------------------------------------------------------------------

/** What the fake server does with each new socket */
export type DialBehavior = (socket: MockSocket, attempt: number) => void;

export function acceptAfter(ms = 0): DialBehavior {
  return (socket) => {
    setTimeout(() => socket._simulateOpen(), ms);
  };
}

export function refuseAfter(ms = 0): DialBehavior {
  return (socket) => {
    setTimeout(() => {
      socket._simulateError(new Error("connect ECONNREFUSED 127.0.0.1:9"));
      socket._simulateClose(1006);
    }, ms);
  };
}

export interface MockDialer {
  readonly dialer: WsDialer;
  /** Every socket created so far, in dial order */
  readonly sockets: MockSocket[];
}

export function createMockDialer(behavior: DialBehavior = acceptAfter(0)): MockDialer {
  const sockets: MockSocket[] = [];
  const dialer = new WsDialer({
    factory: (url, options) => {
      const socket = createMockSocket(url, options);
      sockets.push(socket);
      behavior(socket, sockets.length);
      return socket;
    },
  });
  return { dialer, sockets };
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface LogRecord {
  readonly level: LogLevel;
  readonly message: string;
}

export interface RecordingLogger extends Logger {
  readonly records: LogRecord[];
  messages: (level: LogLevel) => string[];
}

export function createRecordingLogger(): RecordingLogger {
  const records: LogRecord[] = [];
  return {
    records,
    messages: (level) => records.filter((r) => r.level === level).map((r) => r.message),
    debug: (message) => records.push({ level: "debug", message }),
    info: (message) => records.push({ level: "info", message }),
    warn: (message) => records.push({ level: "warn", message }),
    error: (message) => records.push({ level: "error", message }),
  };
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface TestSession extends Session {
  readonly logger: RecordingLogger;
}

export function makeSession(
  overrides: Partial<LoadTestConfig> = {},
  shutdown?: ShutdownSignal,
): TestSession {
  const logger = createRecordingLogger();
  const config = parseLoadTestConfig({ url: TEST_URL, concurrency: 1, ...overrides });
  const session = createSession(config, { logger, ...(shutdown ? { shutdown } : {}) });
  return { ...session, logger };
}
