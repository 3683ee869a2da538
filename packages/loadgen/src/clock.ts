/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * Production code uses globalThis timers via `defaultClock`.
 * Tests either inject their own clock or rely on fake timers patching globalThis.
 */

export type TimerHandle = ReturnType<typeof globalThis.setTimeout>;

export interface Clock {
  readonly now: () => number;
  readonly setTimeout: (fn: () => void, ms: number) => TimerHandle;
  readonly clearTimeout: (id: TimerHandle) => void;
  readonly setInterval: (fn: () => void, ms: number) => TimerHandle;
  readonly clearInterval: (id: TimerHandle) => void;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
  setInterval: (fn, ms) => globalThis.setInterval(fn, ms),
  clearInterval: (id) => globalThis.clearInterval(id),
};

/**
 * Wait for `ms`, or until `signal` aborts, whichever comes first.
 * Resolves true when the full delay elapsed, false when aborted.
 * Never rejects, and leaves neither timer nor listener behind.
 */
export function sleep(ms: number, signal?: AbortSignal, clock: Clock = defaultClock): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clock.clearTimeout(timer);
      resolve(false);
    };

    const timer = clock.setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
