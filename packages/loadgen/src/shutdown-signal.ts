import { type Clock, defaultClock, type TimerHandle } from "./clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const SHUTDOWN_REASONS = ["interrupt", "duration"] as const;
export type ShutdownReason = (typeof SHUTDOWN_REASONS)[number];

export type ShutdownHandler = (reason: ShutdownReason) => void;

type SignalState =
  | { readonly fired: false }
  | { readonly fired: true; readonly reason: ShutdownReason };

// ---------------------------------------------------------------------------
// ShutdownSignal
// ---------------------------------------------------------------------------

/**
 * One-shot, broadcast "stop" latch shared by the whole run.
 *
 * Backed by an AbortController so consumers that already speak AbortSignal
 * (timers, reads) can subscribe directly. The first `fire()` wins; later
 * calls are no-ops and do not change the reported reason.
 */
export class ShutdownSignal {
  private readonly controller = new AbortController();
  private state: SignalState = { fired: false };

  /**
   * Fire the signal. Returns true only for the call that actually fired it.
   */
  fire(reason: ShutdownReason): boolean {
    if (this.state.fired) {
      return false;
    }
    this.state = { fired: true, reason };
    this.controller.abort(reason);
    return true;
  }

  isFired(): boolean {
    return this.state.fired;
  }

  /**
   * Reason passed to the first `fire()`, undefined until then.
   */
  get reason(): ShutdownReason | undefined {
    return this.state.fired ? this.state.reason : undefined;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Run `handler` once when the signal fires (immediately if it already has).
   * Returns a disposer that unsubscribes a handler that has not run yet.
   */
  onFire(handler: ShutdownHandler): () => void {
    if (this.state.fired) {
      handler(this.state.reason);
      return () => {};
    }

    const listener = () => {
      if (this.state.fired) {
        handler(this.state.reason);
      }
    };
    this.controller.signal.addEventListener("abort", listener, { once: true });
    return () => {
      this.controller.signal.removeEventListener("abort", listener);
    };
  }

  /**
   * Resolves with the shutdown reason once the signal has fired.
   */
  wait(): Promise<ShutdownReason> {
    return new Promise<ShutdownReason>((resolve) => {
      this.onFire(resolve);
    });
  }
}

// ---------------------------------------------------------------------------
// Duration timer
// ---------------------------------------------------------------------------

/**
 * Fire `shutdown` with reason "duration" after `durationMs`.
 * Racing a manual interrupt is harmless: whichever fires first wins.
 * Returns a disposer that cancels the timer.
 */
export function armDurationTimer(
  shutdown: ShutdownSignal,
  durationMs: number,
  clock: Clock = defaultClock,
): () => void {
  let timer: TimerHandle | undefined = clock.setTimeout(() => {
    timer = undefined;
    shutdown.fire("duration");
  }, durationMs);

  return () => {
    if (timer !== undefined) {
      clock.clearTimeout(timer);
      timer = undefined;
    }
  };
}
