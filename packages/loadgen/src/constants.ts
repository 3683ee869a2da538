/**
 * Default timings for the connection lifecycle.
 */

/** Reads that see no message for this long trigger a heartbeat ping */
export const DEFAULT_READ_DEADLINE_MS = 10_000;

/** Fixed pause between failed dial attempts (no backoff growth) */
export const DEFAULT_RECONNECT_DELAY_MS = 2_000;

/** How long a worker waits for the peer to acknowledge its close frame */
export const DEFAULT_SHUTDOWN_GRACE_MS = 500;

/** Status line cadence */
export const DEFAULT_STATS_INTERVAL_MS = 5_000;

/** Opening handshake timeout */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 45_000;

export const DEFAULT_CONCURRENCY = 100;
export const DEFAULT_RATE = 10;
export const DEFAULT_DURATION_SECONDS = 0;
