export { type Clock, defaultClock, sleep, type TimerHandle } from "./clock.js";
export {
  DEFAULT_TIMINGS,
  isWebSocketUrl,
  type LoadTestConfig,
  LoadTestConfigSchema,
  type LoadTestTimings,
  parseLoadTestConfig,
  type ResolvedLoadTestConfig,
  resolveLoadTestConfig,
  TimingsSchema,
} from "./config.js";
export {
  ConnectionWorker,
  type ConnectionWorkerOptions,
  type TerminationReason,
  WORKER_PHASES,
  type WorkerPhase,
} from "./connection-worker.js";
export {
  DEFAULT_CONCURRENCY,
  DEFAULT_DURATION_SECONDS,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_RATE,
  DEFAULT_READ_DEADLINE_MS,
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_SHUTDOWN_GRACE_MS,
  DEFAULT_STATS_INTERVAL_MS,
} from "./constants.js";
export { type CounterSnapshot, Counters } from "./counters.js";
export { formatDuration } from "./format.js";
export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  formatTimestamp,
  type Logger,
  type LogLevel,
  type LogSink,
  silentLogger,
} from "./logger.js";
export {
  RampController,
  type RampControllerOptions,
  type RampResult,
  type SpawnWorker,
} from "./ramp-controller.js";
export { type RunDependencies, type RunSummary, runLoadTest } from "./run-coordinator.js";
export { createSession, type Session, type SessionDeps } from "./session.js";
export {
  armDurationTimer,
  SHUTDOWN_REASONS,
  type ShutdownHandler,
  type ShutdownReason,
  ShutdownSignal,
} from "./shutdown-signal.js";
export { formatStatus, StatsReporter } from "./stats-reporter.js";
export {
  classifyReadError,
  type Dialer,
  type InboundMessage,
  type MessageKind,
  type ReadFailureKind,
  type WireConnection,
} from "./wire.js";
export {
  type SocketFactory,
  type SocketOptions,
  type WebSocketLike,
  WsConnection,
  WsDialer,
  type WsDialerOptions,
} from "./ws-dialer.js";
