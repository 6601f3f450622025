import { test, expect, describe, beforeEach, afterEach, vi, type Mock } from "vitest";
import { MemoryActivityLog } from "../store/memory-store";
import { ActivityRecorder } from "./activity";
import { MonitorLoop } from "./monitor";
import type { ScanStats } from "./watch-scanner";

const INTERVAL_MS = 30_000;

const STATS: ScanStats = {
  skipped: false,
  watchesScanned: 1,
  watchErrors: 0,
  newSlots: 2,
  snipeAttempts: 0,
  bookings: 0,
  elapsedMs: 5,
  finishedAt: new Date("2026-05-01T12:00:00Z"),
};

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("MonitorLoop", () => {
  let log: MemoryActivityLog;
  let scanAll: Mock<() => Promise<ScanStats>>;
  let monitor: MonitorLoop;

  const messages = async () =>
    (await log.listRecent()).map((e) => e.message).reverse();

  beforeEach(() => {
    vi.useFakeTimers();
    log = new MemoryActivityLog();
    scanAll = vi.fn<() => Promise<ScanStats>>().mockResolvedValue(STATS);
    monitor = new MonitorLoop({
      scanner: { scanAll },
      activity: new ActivityRecorder(log),
      intervalMs: INTERVAL_MS,
    });
  });

  afterEach(async () => {
    await monitor.stop();
    vi.useRealTimers();
  });

  test("starts stopped", () => {
    expect(monitor.status()).toBe("STOPPED");
    expect(monitor.getStats()).toEqual({ state: "STOPPED", cyclesCompleted: 0, lastScan: null });
  });

  test("scans right away, then every interval", async () => {
    await monitor.start();
    expect(monitor.status()).toBe("RUNNING");

    await vi.advanceTimersByTimeAsync(0);
    expect(scanAll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
    expect(scanAll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(scanAll).toHaveBeenCalledTimes(2);
    expect(monitor.getStats()).toEqual({ state: "RUNNING", cyclesCompleted: 2, lastScan: STATS });
  });

  test("start while running is a no-op", async () => {
    await monitor.start();
    await monitor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(scanAll).toHaveBeenCalledTimes(1);
    expect(await messages()).toEqual(["Monitor started"]);
  });

  test("stop cancels the next cycle", async () => {
    await monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    await monitor.stop();
    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);

    expect(scanAll).toHaveBeenCalledTimes(1);
    expect(monitor.status()).toBe("STOPPED");
    expect(await messages()).toEqual(["Monitor started", "Monitor stopped"]);
  });

  test("never overlaps a slow cycle", async () => {
    const slow = deferred<ScanStats>();
    scanAll.mockReturnValueOnce(slow.promise);

    await monitor.start();
    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 4);
    expect(scanAll).toHaveBeenCalledTimes(1);

    slow.resolve(STATS);
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(INTERVAL_MS);
    expect(scanAll).toHaveBeenCalledTimes(2);
  });

  test("a restart waits for the cycle still in flight", async () => {
    const slow = deferred<ScanStats>();
    scanAll.mockReturnValueOnce(slow.promise);

    await monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    await monitor.stop();
    await monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(scanAll).toHaveBeenCalledTimes(1);

    slow.resolve(STATS);
    await vi.advanceTimersByTimeAsync(0);
    expect(scanAll).toHaveBeenCalledTimes(2);
  });

  test("a failed cycle is logged and the loop keeps going", async () => {
    scanAll.mockRejectedValueOnce(new Error("boom"));

    await monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(INTERVAL_MS);

    expect(scanAll).toHaveBeenCalledTimes(2);
    expect(await messages()).toEqual(["Monitor started", "Monitor error: boom"]);
  });

  describe("triggerImmediateScan", () => {
    test("runs once while stopped and records the stats", async () => {
      const stats = await monitor.triggerImmediateScan();

      expect(stats).toEqual(STATS);
      expect(monitor.status()).toBe("STOPPED");
      expect(monitor.getStats().lastScan).toEqual(STATS);
      expect(monitor.getStats().cyclesCompleted).toBe(0);
    });

    test("resolves null on failure", async () => {
      scanAll.mockRejectedValueOnce(new Error("boom"));

      expect(await monitor.triggerImmediateScan()).toBeNull();
      expect(await messages()).toEqual(["Monitor error: boom"]);
    });

    test("whenIdle waits for it", async () => {
      const slow = deferred<ScanStats>();
      scanAll.mockReturnValueOnce(slow.promise);
      const onIdle = vi.fn();

      void monitor.triggerImmediateScan();
      const idle = monitor.whenIdle().then(onIdle);
      await vi.advanceTimersByTimeAsync(0);
      expect(onIdle).not.toHaveBeenCalled();

      slow.resolve(STATS);
      await idle;
      expect(onIdle).toHaveBeenCalledTimes(1);
    });
  });
});
