import { type Clock, defaultClock } from "./clock.js";
import type { ResolvedLoadTestConfig } from "./config.js";
import { Counters } from "./counters.js";
import { type Logger, silentLogger } from "./logger.js";
import { ShutdownSignal } from "./shutdown-signal.js";

/**
 * Everything a run shares between its ramp controller, workers and reporter.
 * Built once per run and passed explicitly; nothing here is module-global.
 */
export interface Session {
  readonly config: ResolvedLoadTestConfig;
  readonly counters: Counters;
  readonly shutdown: ShutdownSignal;
  readonly logger: Logger;
  readonly clock: Clock;
}

export interface SessionDeps {
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Pre-built signal, so callers can wire OS signals in before the run starts */
  readonly shutdown?: ShutdownSignal;
}

export function createSession(config: ResolvedLoadTestConfig, deps: SessionDeps = {}): Session {
  return Object.freeze({
    config,
    counters: new Counters(config.concurrency),
    shutdown: deps.shutdown ?? new ShutdownSignal(),
    logger: deps.logger ?? silentLogger,
    clock: deps.clock ?? defaultClock,
  });
}
