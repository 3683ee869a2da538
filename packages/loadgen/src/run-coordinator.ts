import type { Clock } from "./clock.js";
import { type LoadTestConfig, type ResolvedLoadTestConfig, resolveLoadTestConfig } from "./config.js";
import { ConnectionWorker, type TerminationReason } from "./connection-worker.js";
import { formatDuration } from "./format.js";
import type { Logger } from "./logger.js";
import { RampController } from "./ramp-controller.js";
import { createSession, type Session } from "./session.js";
import { armDurationTimer, type ShutdownReason, type ShutdownSignal } from "./shutdown-signal.js";
import { StatsReporter } from "./stats-reporter.js";
import type { Dialer } from "./wire.js";
import { WsDialer } from "./ws-dialer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunDependencies {
  readonly dialer?: Dialer;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Signal the caller fires on interrupt; created internally when absent */
  readonly shutdown?: ShutdownSignal;
  /** Called once the session exists, before ramp-up starts */
  readonly onSessionStart?: (session: Session) => void;
}

export interface RunSummary {
  readonly elapsedMs: number;
  readonly spawned: number;
  readonly rampInterrupted: boolean;
  readonly successful: number;
  readonly failed: number;
  readonly bytesRead: number;
  /** Active connections after every worker terminated; 0 on a clean run */
  readonly active: number;
  readonly reason: ShutdownReason;
  /** Workers whose slot was abandoned after an internal fault */
  readonly faulted: number;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

const RULE = "-".repeat(36);

function logBanner(config: ResolvedLoadTestConfig, logger: Logger): void {
  logger.info("Starting WebSocket Load Tester:");
  logger.info(`  URL: ${config.url}`);
  logger.info(`  Total Connections: ${config.concurrency}`);
  logger.info(`  Connection Rate: ${config.rate}/s`);
  if (config.durationSeconds > 0) {
    logger.info(`  Test Duration: ${config.durationSeconds}s`);
  } else {
    logger.info("  Test Duration: Unlimited (until interrupted)");
  }
  logger.info(RULE);
}

function logSummary(summary: RunSummary, logger: Logger): void {
  logger.info(RULE);
  logger.info("Test Finished.");
  logger.info(`Duration: ${formatDuration(summary.elapsedMs)}`);
  logger.info(`Successful Connections: ${summary.successful}`);
  logger.info(`Failed Connections: ${summary.failed}`);
  logger.info(`Total Bytes Read: ${summary.bytesRead}`);
  if (summary.faulted > 0) {
    logger.warn(`Abandoned Worker Slots: ${summary.faulted}`);
  }
}

// ---------------------------------------------------------------------------
// runLoadTest
// ---------------------------------------------------------------------------

/**
 * Run one load test to completion.
 *
 * Ramps workers up, holds them until the shutdown signal fires (interrupt or
 * duration), waits for every worker to terminate, then reports totals.
 *
 * @throws {ConfigurationError} before anything starts if `config` is invalid
 */
export async function runLoadTest(
  config: LoadTestConfig,
  deps: RunDependencies = {},
): Promise<RunSummary> {
  const resolved = resolveLoadTestConfig(config);
  const session = createSession(resolved, deps);
  const { counters, shutdown, logger, clock } = session;
  const dialer =
    deps.dialer ??
    new WsDialer({ handshakeTimeoutMs: resolved.timings.handshakeTimeoutMs, clock });

  logBanner(resolved, logger);
  deps.onSessionStart?.(session);

  const disposeShutdownLog = shutdown.onFire((reason) => {
    logger.info(
      reason === "duration"
        ? "Test duration reached, stopping workers..."
        : "Shutdown signal received, stopping workers...",
    );
  });
  const disarmDuration =
    resolved.durationSeconds > 0
      ? armDurationTimer(shutdown, resolved.durationSeconds * 1_000, clock)
      : undefined;

  const reporter = new StatsReporter(session);
  reporter.start();

  const workers: Promise<TerminationReason>[] = [];
  const startedAt = clock.now();

  const ramp = new RampController({
    target: resolved.concurrency,
    ratePerSecond: resolved.rate,
    shutdown,
    clock,
    spawn: (id) => {
      workers.push(new ConnectionWorker({ id, session, dialer }).run());
    },
  });

  const rampResult = await ramp.run();
  if (rampResult.interrupted) {
    logger.info("Stopping connection ramp-up due to shutdown signal.");
  } else if (resolved.durationSeconds > 0) {
    logger.info(
      `Reached target connection count (${rampResult.spawned}). ` +
        `Waiting for test duration (${resolved.durationSeconds}s) or interrupt...`,
    );
  } else {
    logger.info(
      `Reached target connection count (${rampResult.spawned}). Waiting for interrupt (Ctrl+C)...`,
    );
  }

  const reason = await shutdown.wait();

  logger.info("Waiting for active connections to close...");
  const outcomes = await Promise.all(workers);
  const elapsedMs = clock.now() - startedAt;

  reporter.stop();
  disarmDuration?.();
  disposeShutdownLog();

  const totals = counters.snapshot();
  const summary: RunSummary = {
    elapsedMs,
    spawned: rampResult.spawned,
    rampInterrupted: rampResult.interrupted,
    successful: totals.successful,
    failed: totals.failed,
    bytesRead: totals.bytesRead,
    active: totals.active,
    reason,
    faulted: outcomes.filter((outcome) => outcome === "fault").length,
  };

  logSummary(summary, logger);
  return summary;
}
