/**
 * CLI pipeline: parse args -> validate -> wire OS signals -> run -> exit status.
 */

import { ConfigurationError, type ValidationIssue } from "@wsload/errors";
import {
  type Clock,
  createConsoleLogger,
  type Dialer,
  type LogSink,
  type Logger,
  parseLoadTestConfig,
  type ResolvedLoadTestConfig,
  runLoadTest,
  ShutdownSignal,
} from "@wsload/loadgen";
import { parseArgv } from "./args.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly url: string | undefined;
  readonly concurrency: number | undefined;
  readonly rate: number | undefined;
  readonly durationSeconds: number | undefined;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly unknownFlags: readonly string[];
  readonly positionals: readonly string[];
}

export type InterruptSignal = "SIGINT" | "SIGTERM";

/**
 * Where interrupt notifications come from. `process` in production.
 */
export interface SignalSource {
  once(event: InterruptSignal, listener: () => void): unknown;
  removeListener(event: InterruptSignal, listener: () => void): unknown;
}

export interface MainDeps {
  readonly dialer?: Dialer;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly signals?: SignalSource;
  readonly stdout?: LogSink;
  readonly stderr?: LogSink;
}

const KNOWN_FLAGS = new Set(["url", "c", "r", "d", "v", "h"]);
const INTERRUPT_SIGNALS: readonly InterruptSignal[] = ["SIGINT", "SIGTERM"];

/** Config field → the flag that sets it, for error messages */
const FLAG_FOR_FIELD: Readonly<Record<string, string>> = {
  url: "--url",
  concurrency: "-c",
  rate: "-r",
  durationSeconds: "-d",
  verbose: "-v",
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function numericFlag(value: string | boolean | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "boolean") return Number.NaN;
  const trimmed = value.trim();
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);
  const url = flags.url;

  return {
    url: typeof url === "string" ? url : url === true ? "" : undefined,
    concurrency: numericFlag(flags.c),
    rate: numericFlag(flags.r),
    durationSeconds: numericFlag(flags.d),
    verbose: flags.v === true || flags.v === "true",
    help: flags.h === true,
    unknownFlags: Object.keys(flags).filter((key) => !KNOWN_FLAGS.has(key)),
    positionals,
  };
}

/**
 * Turn parsed flags into a validated run configuration.
 *
 * @throws {ConfigurationError} listing every problem, keyed by flag
 */
export function resolveCliConfig(args: CliArgs): ResolvedLoadTestConfig {
  const extra: ValidationIssue[] = [
    ...args.unknownFlags.map((flag) => ({ field: `--${flag}`, message: "unknown flag" })),
    ...args.positionals.map((value) => ({
      field: "arguments",
      message: `unexpected argument "${value}"`,
    })),
  ];

  let config: ResolvedLoadTestConfig;
  try {
    config = parseLoadTestConfig({
      url: args.url,
      concurrency: args.concurrency,
      rate: args.rate,
      durationSeconds: args.durationSeconds,
      verbose: args.verbose,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const issues = error.issues.map((issue) => ({
        field: FLAG_FOR_FIELD[issue.field] ?? issue.field,
        message: issue.message,
      }));
      throw new ConfigurationError([...extra, ...issues], error);
    }
    throw error;
  }

  if (extra.length > 0) {
    throw new ConfigurationError(extra);
  }
  return config;
}

export const HELP_TEXT = `
  wsload - WebSocket connection load generator

  Usage:
    wsload --url <ws://host/path> [options]

  Options:
    --url <url>            Target endpoint, ws:// or wss:// (required)
    -c, --concurrency <n>  Total concurrent connections to establish (default: 100)
    -r, --rate <n>         New connections per second (default: 10)
    -d, --duration <s>     Test duration in seconds, 0 runs until interrupted (default: 0)
    -v, --verbose          Log per-connection diagnostics
    -h, --help             Show this help message

  Examples:
    wsload --url ws://localhost:8080/ws -c 500 -r 50
    wsload --url wss://example.com/socket -c 100 -d 60 -v
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run the CLI. Resolves with the process exit status: 1 when the
 * configuration is rejected before any worker starts, 0 otherwise.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const args = parseArgs(argv);
  const stdout: LogSink = deps.stdout ?? process.stdout;
  const stderr: LogSink = deps.stderr ?? process.stderr;

  if (args.help) {
    stdout.write(HELP_TEXT);
    return 0;
  }

  const logger = deps.logger ?? createConsoleLogger({ verbose: args.verbose, stdout, stderr });

  let config: ResolvedLoadTestConfig;
  try {
    config = resolveCliConfig(args);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    logger.error("Invalid configuration:");
    for (const issue of error.issues) {
      logger.error(`  ${issue.field}: ${issue.message}`);
    }
    logger.error("Run with --help for usage.");
    return 1;
  }

  // A second interrupt finds no listener left and falls through to the
  // runtime's default handler, which kills the process.
  const signals: SignalSource = deps.signals ?? process;
  const shutdown = new ShutdownSignal();
  const onInterrupt = () => {
    shutdown.fire("interrupt");
  };
  for (const signal of INTERRUPT_SIGNALS) {
    signals.once(signal, onInterrupt);
  }

  try {
    await runLoadTest(config, { logger, shutdown, dialer: deps.dialer, clock: deps.clock });
  } finally {
    for (const signal of INTERRUPT_SIGNALS) {
      signals.removeListener(signal, onInterrupt);
    }
  }
  return 0;
}
