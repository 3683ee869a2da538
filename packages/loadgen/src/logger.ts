import pc from "picocolors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimal logging surface injected into every component.
 * `debug` carries the per-connection diagnostics that only verbose runs show.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  readonly verbose?: boolean;
  /** Force ANSI colors on or off. Defaults to picocolors' terminal detection. */
  readonly colors?: boolean;
  readonly stdout?: LogSink;
  readonly stderr?: LogSink;
  readonly now?: () => Date;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local timestamp in `YYYY/MM/DD HH:MM:SS` form.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// ---------------------------------------------------------------------------
// Console logger
// ---------------------------------------------------------------------------

/**
 * Line-oriented logger writing timestamped messages.
 * Info and debug go to stdout, warnings and errors to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const colors = options.colors === undefined ? pc : pc.createColors(options.colors);
  const stdout: LogSink = options.stdout ?? process.stdout;
  const stderr: LogSink = options.stderr ?? process.stderr;
  const now = options.now ?? (() => new Date());

  const paint: Record<LogLevel, (text: string) => string> = {
    debug: colors.dim,
    info: (text) => text,
    warn: colors.yellow,
    error: colors.red,
  };

  const write = (level: LogLevel, message: string): void => {
    const sink = level === "warn" || level === "error" ? stderr : stdout;
    sink.write(`${colors.gray(formatTimestamp(now()))} ${paint[level](message)}\n`);
  };

  return {
    debug(message) {
      if (verbose) write("debug", message);
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
