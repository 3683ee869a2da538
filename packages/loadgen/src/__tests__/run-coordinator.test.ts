import { ConfigurationError } from "@wsload/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runLoadTest } from "../run-coordinator.js";
import type { Session } from "../session.js";
import { ShutdownSignal } from "../shutdown-signal.js";
import { acceptAfter, createMockDialer, createRecordingLogger, TEST_URL } from "./helpers.js";

describe("runLoadTest", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should ramp to the target, hold until the duration ends, then report totals", async () => {
    const logger = createRecordingLogger();
    const { dialer, sockets } = createMockDialer();
    const onSessionStart = vi.fn((_session: Session) => {});

    const run = runLoadTest(
      {
        url: TEST_URL,
        concurrency: 3,
        rate: 10,
        durationSeconds: 1,
        timings: { statsIntervalMs: 500 },
      },
      { dialer, logger, onSessionStart },
    );
    await vi.advanceTimersByTimeAsync(1_500);
    const summary = await run;

    expect(summary).toEqual({
      elapsedMs: 1_500,
      spawned: 3,
      rampInterrupted: false,
      successful: 3,
      failed: 0,
      bytesRead: 0,
      active: 0,
      reason: "duration",
      faulted: 0,
    });
    expect(onSessionStart).toHaveBeenCalledOnce();
    expect(sockets.map((s) => s._closeCalls)).toEqual([
      [{ code: 1000, reason: "" }],
      [{ code: 1000, reason: "" }],
      [{ code: 1000, reason: "" }],
    ]);
    expect(logger.messages("info")).toEqual([
      "Starting WebSocket Load Tester:",
      `  URL: ${TEST_URL}`,
      "  Total Connections: 3",
      "  Connection Rate: 10/s",
      "  Test Duration: 1s",
      "------------------------------------",
      "Reached target connection count (3). Waiting for test duration (1s) or interrupt...",
      "Status => Active: 3, Succeeded: 3, Failed: 0, BytesRead: 0",
      "Test duration reached, stopping workers...",
      "Waiting for active connections to close...",
      "------------------------------------",
      "Test Finished.",
      "Duration: 1.5s",
      "Successful Connections: 3",
      "Failed Connections: 0",
      "Total Bytes Read: 0",
    ]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should cut the ramp short when the duration ends first", async () => {
    const logger = createRecordingLogger();
    const { dialer } = createMockDialer();

    const run = runLoadTest(
      { url: TEST_URL, concurrency: 5, rate: 1, durationSeconds: 3 },
      { dialer, logger },
    );
    await vi.advanceTimersByTimeAsync(3_500);
    const summary = await run;

    expect(summary).toMatchObject({
      elapsedMs: 3_500,
      spawned: 2,
      rampInterrupted: true,
      successful: 2,
      active: 0,
      reason: "duration",
    });
    expect(logger.messages("info")).toContain(
      "Stopping connection ramp-up due to shutdown signal.",
    );
  });

  it("should stop on interrupt and abandon in-flight dials", async () => {
    const logger = createRecordingLogger();
    const shutdown = new ShutdownSignal();
    const { dialer, sockets } = createMockDialer(acceptAfter(300));

    setTimeout(() => shutdown.fire("interrupt"), 450);
    const run = runLoadTest(
      { url: TEST_URL, concurrency: 10, rate: 10 },
      { dialer, logger, shutdown },
    );

    // worker 1 opened at 400 and closes with a grace period, 2-4 are still dialing
    await vi.advanceTimersByTimeAsync(949);
    let settled = false;
    void run.then(() => {
      settled = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const summary = await run;

    expect(sockets).toHaveLength(4);
    expect(sockets.map((s) => s._terminated)).toEqual([true, true, true, true]);
    expect(sockets[0]?._closeCalls).toEqual([{ code: 1000, reason: "" }]);
    expect(summary).toEqual({
      elapsedMs: 950,
      spawned: 4,
      rampInterrupted: true,
      successful: 1,
      failed: 0,
      bytesRead: 0,
      active: 0,
      reason: "interrupt",
      faulted: 0,
    });
    expect(logger.messages("info")).toContain("Shutdown signal received, stopping workers...");
  });

  it("should finish on time when no handshake ever completes", async () => {
    const logger = createRecordingLogger();
    const { dialer, sockets } = createMockDialer(() => {});

    const run = runLoadTest(
      { url: TEST_URL, concurrency: 5, rate: 10, durationSeconds: 1 },
      { dialer, logger },
    );
    await vi.advanceTimersByTimeAsync(1_000);
    const summary = await run;

    expect(sockets.map((s) => s._terminated)).toEqual([true, true, true, true, true]);
    expect(summary).toEqual({
      elapsedMs: 1_000,
      spawned: 5,
      rampInterrupted: false,
      successful: 0,
      failed: 0,
      bytesRead: 0,
      active: 0,
      reason: "duration",
      faulted: 0,
    });
  });

  it("should wait for an interrupt when no duration is set", async () => {
    const logger = createRecordingLogger();
    const shutdown = new ShutdownSignal();
    const { dialer } = createMockDialer();

    const run = runLoadTest({ url: TEST_URL, concurrency: 2, rate: 10 }, { dialer, logger, shutdown });
    await vi.advanceTimersByTimeAsync(60_000);

    expect(logger.messages("info")).toContain(
      "Reached target connection count (2). Waiting for interrupt (Ctrl+C)...",
    );
    expect(logger.messages("info")).toContain("  Test Duration: Unlimited (until interrupted)");

    shutdown.fire("interrupt");
    await vi.advanceTimersByTimeAsync(500);

    await expect(run).resolves.toMatchObject({ successful: 2, active: 0, reason: "interrupt" });
  });

  it("should warn about worker slots lost to faults", async () => {
    const logger = createRecordingLogger();
    const dialer = {
      dial: () =>
        Promise.resolve({
          label: "broken",
          readMessage: () => Promise.reject(new Error("unused")),
          ping: () => Promise.resolve(),
          close: () => {},
          setReadDeadline: () => {
            throw new Error("deadline unsupported");
          },
          terminate: () => {},
        }),
    };

    const run = runLoadTest(
      { url: TEST_URL, concurrency: 2, rate: 10, durationSeconds: 1 },
      { dialer, logger },
    );
    await vi.advanceTimersByTimeAsync(1_000);
    const summary = await run;

    expect(summary).toMatchObject({ faulted: 2, successful: 2, active: 0, elapsedMs: 1_000 });
    expect(logger.messages("error")).toEqual([
      "Recovered from fault in worker 1 (INTERNAL_ERROR): deadline unsupported",
      "Recovered from fault in worker 2 (INTERNAL_ERROR): deadline unsupported",
    ]);
    expect(logger.messages("warn")).toEqual(["Abandoned Worker Slots: 2"]);
  });

  it("should reject an invalid config before dialing anything", async () => {
    const { dialer, sockets } = createMockDialer();

    await expect(runLoadTest({ url: "http://localhost", rate: 0 }, { dialer })).rejects.toThrow(
      ConfigurationError,
    );
    expect(sockets).toHaveLength(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
