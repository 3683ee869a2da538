import type { CounterSnapshot } from "./counters.js";
import type { Session } from "./session.js";
import type { TimerHandle } from "./clock.js";

export function formatStatus(snapshot: CounterSnapshot): string {
  return (
    `Status => Active: ${snapshot.active}, Succeeded: ${snapshot.successful}, ` +
    `Failed: ${snapshot.failed}, BytesRead: ${snapshot.bytesRead}`
  );
}

/**
 * Periodic status line over the shared counters.
 *
 * One interval timer; stops for good once the shutdown signal fires.
 * It only observes the run and never ends it.
 */
export class StatsReporter {
  private timer: TimerHandle | undefined;
  private disposeShutdownListener: (() => void) | undefined;
  private stopped = false;
  private readonly session: Session;
  private readonly intervalMs: number;

  constructor(session: Session, intervalMs: number = session.config.timings.statsIntervalMs) {
    this.session = session;
    this.intervalMs = intervalMs;
  }

  /**
   * Start the periodic report. No-op when already running or stopped.
   */
  start(): void {
    if (this.timer !== undefined || this.stopped) return;
    if (this.session.shutdown.isFired()) {
      this.stopped = true;
      return;
    }

    const { clock, shutdown } = this.session;
    this.timer = clock.setInterval(() => {
      this.report();
    }, this.intervalMs);
    this.disposeShutdownListener = shutdown.onFire(() => {
      this.stop();
    });
  }

  /**
   * Stop permanently.
   */
  stop(): void {
    this.stopped = true;
    if (this.timer !== undefined) {
      this.session.clock.clearInterval(this.timer);
      this.timer = undefined;
    }
    this.disposeShutdownListener?.();
    this.disposeShutdownListener = undefined;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Emit one status line now and return it.
   */
  report(): string {
    const line = formatStatus(this.session.counters.snapshot());
    this.session.logger.info(line);
    return line;
  }
}
