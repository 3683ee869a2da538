import { InvariantViolationError } from "@wsload/errors";
import { type Clock, defaultClock, sleep } from "./clock.js";
import type { ShutdownSignal } from "./shutdown-signal.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Start one worker. Must not wait for it; faults belong to the worker. */
export type SpawnWorker = (id: number) => void;

export interface RampControllerOptions {
  /** Total workers to spawn */
  readonly target: number;
  /** Workers per second */
  readonly ratePerSecond: number;
  readonly shutdown: ShutdownSignal;
  readonly spawn: SpawnWorker;
  readonly clock?: Clock;
}

export interface RampResult {
  readonly spawned: number;
  /** True when the shutdown signal cut the ramp short */
  readonly interrupted: boolean;
}

// ---------------------------------------------------------------------------
// RampController
// ---------------------------------------------------------------------------

/**
 * Spawns workers at a fixed rate until the target is reached or the run is
 * shutting down.
 *
 * Tick n is due at `start + n * interval`, so time spent spawning does not
 * slow the rate down. The first worker starts one interval after `run()`.
 */
export class RampController {
  private readonly options: RampControllerOptions;
  private readonly clock: Clock;
  private _spawned = 0;
  private running = false;

  constructor(options: RampControllerOptions) {
    this.options = options;
    this.clock = options.clock ?? defaultClock;
  }

  get spawned(): number {
    return this._spawned;
  }

  get intervalMs(): number {
    return 1_000 / this.options.ratePerSecond;
  }

  async run(): Promise<RampResult> {
    if (this.running) {
      throw new InvariantViolationError("ramp-up is already running");
    }
    this.running = true;

    const { target, shutdown, spawn } = this.options;
    const startedAt = this.clock.now();

    try {
      while (this._spawned < target) {
        const dueAt = startedAt + (this._spawned + 1) * this.intervalMs;
        const ticked = await sleep(Math.max(0, dueAt - this.clock.now()), shutdown.signal, this.clock);
        if (!ticked || shutdown.isFired()) {
          return { spawned: this._spawned, interrupted: true };
        }
        this._spawned += 1;
        spawn(this._spawned);
      }
      return { spawned: this._spawned, interrupted: false };
    } finally {
      this.running = false;
    }
  }
}
