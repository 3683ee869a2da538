import { ConfigurationError, type ValidationIssue } from "@wsload/errors";
import { z } from "zod";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_DURATION_SECONDS,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_RATE,
  DEFAULT_READ_DEADLINE_MS,
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_SHUTDOWN_GRACE_MS,
  DEFAULT_STATS_INTERVAL_MS,
} from "./constants.js";

// ---------------------------------------------------------------------------
// Timings
// ---------------------------------------------------------------------------

export interface LoadTestTimings {
  readonly readDeadlineMs: number;
  readonly reconnectDelayMs: number;
  readonly shutdownGraceMs: number;
  readonly statsIntervalMs: number;
  readonly handshakeTimeoutMs: number;
}

export const DEFAULT_TIMINGS: LoadTestTimings = {
  readDeadlineMs: DEFAULT_READ_DEADLINE_MS,
  reconnectDelayMs: DEFAULT_RECONNECT_DELAY_MS,
  shutdownGraceMs: DEFAULT_SHUTDOWN_GRACE_MS,
  statsIntervalMs: DEFAULT_STATS_INTERVAL_MS,
  handshakeTimeoutMs: DEFAULT_HANDSHAKE_TIMEOUT_MS,
};

export const TimingsSchema = z
  .object({
    readDeadlineMs: z.number().int().positive().default(DEFAULT_TIMINGS.readDeadlineMs),
    reconnectDelayMs: z.number().int().nonnegative().default(DEFAULT_TIMINGS.reconnectDelayMs),
    shutdownGraceMs: z.number().int().nonnegative().default(DEFAULT_TIMINGS.shutdownGraceMs),
    statsIntervalMs: z.number().int().positive().default(DEFAULT_TIMINGS.statsIntervalMs),
    handshakeTimeoutMs: z.number().int().positive().default(DEFAULT_TIMINGS.handshakeTimeoutMs),
  })
  .default({});

// ---------------------------------------------------------------------------
// Load test config
// ---------------------------------------------------------------------------

export interface LoadTestConfig {
  /** Target endpoint, scheme ws or wss */
  readonly url: string;
  /** Number of connections to hold open */
  readonly concurrency?: number;
  /** New connections per second during ramp-up */
  readonly rate?: number;
  /** Run length in seconds; 0 runs until interrupted */
  readonly durationSeconds?: number;
  readonly verbose?: boolean;
  readonly timings?: Partial<LoadTestTimings>;
}

/**
 * Config after Zod parsing: defaults applied, every field present.
 */
export interface ResolvedLoadTestConfig {
  readonly url: string;
  readonly concurrency: number;
  readonly rate: number;
  readonly durationSeconds: number;
  readonly verbose: boolean;
  readonly timings: LoadTestTimings;
}

export function isWebSocketUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "ws:" || protocol === "wss:";
  } catch {
    return false;
  }
}

export const LoadTestConfigSchema = z.object({
  url: z.string().refine(isWebSocketUrl, { message: "must be a valid ws:// or wss:// URL" }),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  rate: z.number().int().positive().default(DEFAULT_RATE),
  durationSeconds: z.number().int().nonnegative().default(DEFAULT_DURATION_SECONDS),
  verbose: z.boolean().default(false),
  timings: TimingsSchema,
});

/**
 * Validate arbitrary input (e.g. assembled from CLI flags) and apply defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function parseLoadTestConfig(input: unknown): ResolvedLoadTestConfig {
  const result = LoadTestConfigSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "config",
      message: issue.message,
    }));
    throw new ConfigurationError(issues, result.error);
  }
  const { timings, ...rest } = result.data;
  return Object.freeze({ ...rest, timings: Object.freeze(timings) });
}

/**
 * Parse and resolve a LoadTestConfig, applying all defaults.
 *
 * @throws {ConfigurationError} if config is invalid
 */
export function resolveLoadTestConfig(config: LoadTestConfig): ResolvedLoadTestConfig {
  return parseLoadTestConfig(config);
}
