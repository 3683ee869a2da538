import { InvariantViolationError } from "@wsload/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CounterSnapshot {
  readonly active: number;
  readonly successful: number;
  readonly failed: number;
  readonly bytesRead: number;
}

// ---------------------------------------------------------------------------
// Counters
// ---------------------------------------------------------------------------

/**
 * Aggregate run statistics shared by every worker.
 *
 * Each field is updated on its own; JavaScript runs every worker on one
 * thread, so a single increment is already atomic. `active` is bounded by
 * `capacity` and never negative.
 */
export class Counters {
  private readonly capacity: number;
  private _active = 0;
  private _successful = 0;
  private _failed = 0;
  private _bytesRead = 0;

  constructor(capacity: number = Number.POSITIVE_INFINITY) {
    this.capacity = capacity;
  }

  /**
   * A dial succeeded: one more successful connection, one more active.
   */
  recordConnected(): void {
    if (this._active >= this.capacity) {
      throw new InvariantViolationError(
        `active connections would exceed concurrency target ${this.capacity}`,
      );
    }
    this._successful += 1;
    this._active += 1;
  }

  /**
   * A live connection instance ended, for whatever reason.
   */
  recordDisconnected(): void {
    if (this._active === 0) {
      throw new InvariantViolationError("active connections would drop below zero");
    }
    this._active -= 1;
  }

  /**
   * A dial attempt or a heartbeat probe failed.
   */
  recordFailure(): void {
    this._failed += 1;
  }

  recordBytes(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvariantViolationError(`byte count must be a non-negative integer, got ${count}`);
    }
    this._bytesRead += count;
  }

  get active(): number {
    return this._active;
  }

  get successful(): number {
    return this._successful;
  }

  get failed(): number {
    return this._failed;
  }

  get bytesRead(): number {
    return this._bytesRead;
  }

  snapshot(): CounterSnapshot {
    return {
      active: this._active,
      successful: this._successful,
      failed: this._failed,
      bytesRead: this._bytesRead,
    };
  }
}
