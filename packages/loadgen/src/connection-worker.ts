import { CLOSE_NORMAL, getErrorMessage, wrapError } from "@wsload/errors";
import { sleep } from "./clock.js";
import type { Session } from "./session.js";
import {
  classifyReadError,
  type Dialer,
  type InboundMessage,
  type WireConnection,
} from "./wire.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const WORKER_PHASES = ["connecting", "connected", "terminated"] as const;
export type WorkerPhase = (typeof WORKER_PHASES)[number];

/** Why a worker reached `terminated` */
export type TerminationReason = "shutdown" | "fault";

type Step =
  | { readonly phase: "connecting" }
  | { readonly phase: "connected"; readonly connection: WireConnection }
  | { readonly phase: "terminated"; readonly reason: TerminationReason };

export interface ConnectionWorkerOptions {
  /** 1-based spawn index, used in diagnostics */
  readonly id: number;
  readonly session: Session;
  readonly dialer: Dialer;
}

const CONNECTING: Step = { phase: "connecting" };
const SHUT_DOWN: Step = { phase: "terminated", reason: "shutdown" };

const textDecoder = new TextDecoder();

// ---------------------------------------------------------------------------
// ConnectionWorker
// ---------------------------------------------------------------------------

/**
 * Owns one connection slot for the whole run.
 *
 * Lifecycle:
 * - connecting: dial until it works (fixed delay between attempts, no cap)
 * - connected: read, ping on silence, fall back to connecting on drops
 * - terminated: reached once, on shutdown or on an unexpected fault
 *
 * Each phase handler returns the next step; `run()` just loops over them.
 */
export class ConnectionWorker {
  readonly id: number;
  private readonly session: Session;
  private readonly dialer: Dialer;
  private _phase: WorkerPhase = "connecting";

  constructor(options: ConnectionWorkerOptions) {
    this.id = options.id;
    this.session = options.session;
    this.dialer = options.dialer;
  }

  get phase(): WorkerPhase {
    return this._phase;
  }

  /**
   * Drive the state machine to `terminated`. Never rejects: a fault inside
   * the worker is logged and abandons this slot only.
   */
  async run(): Promise<TerminationReason> {
    try {
      return await this.loop();
    } catch (error) {
      const fault = wrapError(error);
      this.session.logger.error(
        `Recovered from fault in worker ${this.id} (${fault.code}): ${fault.message}`,
      );
      return "fault";
    } finally {
      this._phase = "terminated";
    }
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private async loop(): Promise<TerminationReason> {
    let step: Step = CONNECTING;
    for (;;) {
      this._phase = step.phase;
      switch (step.phase) {
        case "connecting":
          step = await this.connect();
          break;
        case "connected":
          step = await this.hold(step.connection);
          break;
        case "terminated":
          return step.reason;
      }
    }
  }

  private async connect(): Promise<Step> {
    const { config, counters, shutdown, logger, clock } = this.session;

    for (;;) {
      if (shutdown.isFired()) {
        logger.debug(`Worker ${this.id} skipping connection due to shutdown signal.`);
        return SHUT_DOWN;
      }

      let connection: WireConnection;
      try {
        connection = await this.dialer.dial(config.url, shutdown.signal);
      } catch (error) {
        if (shutdown.isFired()) {
          logger.debug(`Worker ${this.id} abandoned dial due to shutdown signal.`);
          return SHUT_DOWN;
        }
        counters.recordFailure();
        logger.debug(`Worker ${this.id} connection failed: ${getErrorMessage(error)}`);
        await sleep(config.timings.reconnectDelayMs, shutdown.signal, clock);
        continue;
      }

      counters.recordConnected();
      return { phase: "connected", connection };
    }
  }

  /**
   * Read loop for one live connection. Every exit, shutdown included,
   * releases the handle and the `active` slot before the next phase.
   */
  private async hold(connection: WireConnection): Promise<Step> {
    const { config, counters, shutdown, logger, clock } = this.session;
    const { readDeadlineMs, shutdownGraceMs } = config.timings;

    try {
      connection.setReadDeadline(readDeadlineMs);

      for (;;) {
        if (shutdown.isFired()) {
          logger.debug(`Worker [${connection.label}] received shutdown. Closing connection.`);
          this.sendClose(connection);
          await sleep(shutdownGraceMs, undefined, clock);
          return SHUT_DOWN;
        }

        let message: InboundMessage;
        try {
          message = await connection.readMessage(shutdown.signal);
        } catch (error) {
          if (shutdown.isFired()) continue;
          const next = await this.recover(connection, error);
          if (next) return next;
          continue;
        }

        counters.recordBytes(message.payload.byteLength);
        if (message.kind === "text") {
          logger.debug(`Worker [${connection.label}] received: ${textDecoder.decode(message.payload)}`);
        }
        connection.setReadDeadline(readDeadlineMs);
      }
    } finally {
      counters.recordDisconnected();
      connection.terminate();
    }
  }

  /**
   * Decide what a failed read means. Returns the next step, or undefined to
   * stay connected.
   */
  private async recover(connection: WireConnection, error: unknown): Promise<Step | undefined> {
    const { config, counters, logger } = this.session;

    switch (classifyReadError(error)) {
      case "expected-close":
        logger.debug(`Worker [${connection.label}] connection closed: ${getErrorMessage(error)}`);
        return CONNECTING;

      case "timeout":
        try {
          await connection.ping();
        } catch (pingError) {
          counters.recordFailure();
          logger.debug(`Worker [${connection.label}] ping failed: ${getErrorMessage(pingError)}`);
          return CONNECTING;
        }
        connection.setReadDeadline(config.timings.readDeadlineMs);
        return undefined;

      case "unclassified":
        logger.debug(`Worker [${connection.label}] unhandled error: ${getErrorMessage(error)}`);
        return CONNECTING;
    }
  }

  private sendClose(connection: WireConnection): void {
    try {
      connection.close(CLOSE_NORMAL);
    } catch (error) {
      this.session.logger.debug(
        `Worker [${connection.label}] close frame not sent: ${getErrorMessage(error)}`,
      );
    }
  }
}
