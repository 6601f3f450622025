import { test, expect, describe, beforeEach, vi, type Mock } from "vitest";
import {
  createFakeResy,
  findResponse,
  newWatch,
  type FakeResy,
} from "../../tests/helpers";
import { createMemoryStores, type Stores } from "../store";
import type { SnipeRetryPolicy } from "../config";
import { createMonitorServices, extractSlots, type MonitorServices } from "./index";

const NOW = new Date("2026-05-01T12:00:00Z");
const CREDENTIALS = { api_key: "test-key", auth_token: "test-token" };

/**
 * Each day offers 16:30 (outside the default window), 19:00 and 21:30
 */
const dailySlots = (day: string) =>
  findResponse([
    { start: `${day} 16:30:00` },
    { start: `${day} 19:00:00` },
    { start: `${day} 21:30:00` },
  ]);

describe("extractSlots", () => {
  test("flattens every venue in API order", () => {
    const slots = extractSlots({
      results: {
        venues: [
          { slots: [{ config: { token: "a" }, date: { start: "2026-06-01 19:00:00" } }] },
          { slots: [{ config: { token: "b", type: "Patio" }, date: { start: "2026-06-01 18:00:00" } }] },
        ],
      },
    });

    expect(slots).toEqual([
      { config_token: "a", start: "2026-06-01 19:00:00", type: undefined },
      { config_token: "b", start: "2026-06-01 18:00:00", type: "Patio" },
    ]);
  });

  test("handles a response without results", () => {
    expect(extractSlots({})).toEqual([]);
  });
});

describe("WatchScanner", () => {
  let stores: Stores;
  let resy: FakeResy;
  let now: Date;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const build = (
    overrides: { policy?: SnipeRetryPolicy; onSlotFound?: () => void | Promise<void> } = {}
  ): MonitorServices =>
    createMonitorServices({
      stores,
      createClient: () => resy,
      dayPauseMs: 1000,
      sleep,
      now: () => now,
      retry: {
        policy: overrides.policy ?? "backoff",
        baseDelayMs: 60_000,
        maxDelayMs: 30 * 60_000,
      },
      onSlotFound: overrides.onSlotFound,
    });

  const events = async (kind?: string) =>
    (await stores.activity.listRecent())
      .filter((e) => !kind || e.kind === kind)
      .map((e) => e.message)
      .reverse();

  beforeEach(() => {
    stores = createMemoryStores(CREDENTIALS);
    resy = createFakeResy();
    resy.findSlots.mockImplementation(async ({ day }) => dailySlots(day));
    now = NOW;
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  test("does nothing without an API key", async () => {
    stores = createMemoryStores();
    const watch = await stores.watches.create(newWatch());
    const createClient = vi.fn(() => resy);

    const stats = await createMonitorServices({ stores, createClient }).scanner.scanAll();

    expect(stats.skipped).toBe(true);
    expect(createClient).not.toHaveBeenCalled();
    expect(resy.findSlots).not.toHaveBeenCalled();
    expect((await stores.watches.getById(watch.id))?.last_checked).toBeNull();
    expect(await events()).toEqual([]);
  });

  test("records in-window slots once across repeated scans", async () => {
    const watch = await stores.watches.create(newWatch({ date_end: "2026-06-02" }));
    const onSlotFound = vi.fn();
    const { scanner } = build({ onSlotFound });

    const first = await scanner.scanAll();
    const second = await scanner.scanAll();

    expect(first.newSlots).toBe(4);
    expect(second.newSlots).toBe(0);
    expect(onSlotFound).toHaveBeenCalledTimes(4);
    expect(await events("found")).toEqual([
      "Slot found! Test Bistro - 2026-06-01 at 2026-06-01 19:00:00 for 2",
      "Slot found! Test Bistro - 2026-06-01 at 2026-06-01 21:30:00 for 2",
      "Slot found! Test Bistro - 2026-06-02 at 2026-06-02 19:00:00 for 2",
      "Slot found! Test Bistro - 2026-06-02 at 2026-06-02 21:30:00 for 2",
    ]);
    expect(resy.findSlots).toHaveBeenCalledWith({
      venue_id: "1505",
      day: "2026-06-01",
      party_size: 2,
    });
    expect((await stores.watches.getById(watch.id))?.last_checked).toEqual(NOW);
  });

  test("stores the found details", async () => {
    await stores.watches.create(newWatch());

    await build().scanner.scanAll();

    const [found] = await stores.activity.listRecent(1);
    expect(found.details).toEqual({
      date: "2026-06-01",
      time: "2026-06-01 21:30:00",
      timeOfDay: "21:30",
      partySize: 2,
    });
  });

  test("pauses between dates only", async () => {
    await stores.watches.create(newWatch({ date_end: "2026-06-03" }));

    await build().scanner.scanAll();

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  test("skips a failed date silently and keeps going", async () => {
    const watch = await stores.watches.create(newWatch({ date_end: "2026-06-03" }));
    resy.findSlots.mockImplementation(async ({ day }) => {
      if (day === "2026-06-02") throw new Error("502 Bad Gateway");
      return dailySlots(day);
    });

    const stats = await build().scanner.scanAll();

    expect(stats.newSlots).toBe(4);
    expect(stats.watchErrors).toBe(0);
    expect(await events("error")).toEqual([]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect((await stores.watches.getById(watch.id))?.last_checked).toEqual(NOW);
  });

  test("one broken watch does not stop the others", async () => {
    const broken = await stores.watches.create(
      newWatch({ venue_name: "Bad Place", date_start: "2026-13-01" })
    );
    const healthy = await stores.watches.create(newWatch());

    const stats = await build().scanner.scanAll();

    expect(stats.watchErrors).toBe(1);
    expect(stats.watchesScanned).toBe(1);
    expect(stats.newSlots).toBe(2);
    expect(await events("error")).toEqual([
      'Error checking Bad Place: Invalid date: "2026-13-01"',
    ]);
    expect((await stores.watches.getById(broken.id))?.last_checked).toBeNull();
    expect((await stores.watches.getById(healthy.id))?.last_checked).toEqual(NOW);
  });

  test("a bad time bound is a watch error before any API call", async () => {
    await stores.watches.create(newWatch({ venue_name: "", time_earliest: "7pm" }));

    await build().scanner.scanAll();

    expect(resy.findSlots).not.toHaveBeenCalled();
    expect(await events("error")).toEqual([
      'Error checking 1505: Invalid time window bound "7pm"',
    ]);
  });

  test("a reversed range scans nothing but still counts as checked", async () => {
    const watch = await stores.watches.create(
      newWatch({ date_start: "2026-06-03", date_end: "2026-06-01" })
    );

    const stats = await build().scanner.scanAll();

    expect(resy.findSlots).not.toHaveBeenCalled();
    expect(stats.watchErrors).toBe(0);
    expect((await stores.watches.getById(watch.id))?.last_checked).toEqual(NOW);
  });

  test("paused watches are not scanned", async () => {
    await stores.watches.create(newWatch({ active: false }));

    const stats = await build().scanner.scanAll();

    expect(stats.watchesScanned).toBe(0);
    expect(resy.findSlots).not.toHaveBeenCalled();
  });

  describe("sniping", () => {
    test("books new slots on snipe-mode watches", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(findResponse([{ start: "2026-06-01 19:00:00", token: "cfg-fresh" }]));

      const stats = await build().scanner.scanAll();

      expect(stats.snipeAttempts).toBe(1);
      expect(stats.bookings).toBe(1);
      expect(resy.getDetails).toHaveBeenCalledWith({
        config_id: "cfg-fresh",
        day: "2026-06-01",
        party_size: 2,
      });
      expect(await events("booked")).toEqual([
        "BOOKED! Test Bistro 2026-06-01 at 2026-06-01 19:00:00",
      ]);
    });

    test("a slow found-slot DM does not hold up the snipe", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(findResponse([{ start: "2026-06-01 19:00:00" }]));
      const order: string[] = [];
      resy.getDetails.mockImplementation(async () => {
        order.push("details");
        return { book_token: { value: "book-tok" } };
      });
      let releaseDm: () => void = () => undefined;
      const dm = new Promise<void>((resolve) => {
        releaseDm = resolve;
      });
      const { scanner } = build({
        onSlotFound: async () => {
          await dm;
          order.push("dm-done");
        },
      });

      const stats = await scanner.scanAll();

      expect(stats.bookings).toBe(1);
      expect(order).toEqual(["details"]);

      releaseDm();
      await vi.waitFor(() => {
        expect(order).toEqual(["details", "dm-done"]);
      });
    });

    test("books a start time offered in two seating areas once", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(
        findResponse([
          { start: "2026-06-01 19:00:00", token: "cfg-dining" },
          { start: "2026-06-01 19:00:00", token: "cfg-patio" },
        ])
      );

      const stats = await build().scanner.scanAll();

      expect(stats.newSlots).toBe(1);
      expect(stats.bookings).toBe(1);
      expect(resy.bookReservation).toHaveBeenCalledTimes(1);
      expect(resy.getDetails).toHaveBeenCalledWith({
        config_id: "cfg-dining",
        day: "2026-06-01",
        party_size: 2,
      });
      expect(await events("found")).toEqual([
        "Slot found! Test Bistro - 2026-06-01 at 2026-06-01 19:00:00 for 2",
      ]);
    });

    test("needs an auth token", async () => {
      stores = createMemoryStores({ api_key: "test-key" });
      await stores.watches.create(newWatch({ snipe_mode: true }));

      const stats = await build().scanner.scanAll();

      expect(stats.newSlots).toBe(2);
      expect(stats.snipeAttempts).toBe(0);
      expect(resy.getDetails).not.toHaveBeenCalled();
    });

    test("leaves watches without snipe mode alone", async () => {
      await stores.watches.create(newWatch());

      await build().scanner.scanAll();

      expect(resy.getDetails).not.toHaveBeenCalled();
    });

    test("backoff retries a failed slot only after the delay", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(findResponse([{ start: "2026-06-01 19:00:00" }]));
      resy.bookReservation.mockRejectedValue(new Error("sold out"));
      const { scanner } = build();

      await scanner.scanAll();
      expect(resy.bookReservation).toHaveBeenCalledTimes(1);

      now = new Date(NOW.getTime() + 59_000);
      await scanner.scanAll();
      expect(resy.bookReservation).toHaveBeenCalledTimes(1);

      now = new Date(NOW.getTime() + 60_000);
      await scanner.scanAll();
      expect(resy.bookReservation).toHaveBeenCalledTimes(2);
    });

    test("once never retries", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(findResponse([{ start: "2026-06-01 19:00:00" }]));
      resy.bookReservation.mockRejectedValue(new Error("sold out"));
      const { scanner } = build({ policy: "once" });

      await scanner.scanAll();
      now = new Date(NOW.getTime() + 24 * 60 * 60_000);
      await scanner.scanAll();

      expect(resy.bookReservation).toHaveBeenCalledTimes(1);
    });

    test("every_cycle retries on each scan", async () => {
      await stores.watches.create(newWatch({ snipe_mode: true }));
      resy.findSlots.mockResolvedValue(findResponse([{ start: "2026-06-01 19:00:00" }]));
      resy.bookReservation.mockRejectedValue(new Error("sold out"));
      const { scanner } = build({ policy: "every_cycle" });

      await scanner.scanAll();
      await scanner.scanAll();
      await scanner.scanAll();

      expect(resy.bookReservation).toHaveBeenCalledTimes(3);
      expect(await events("found")).toHaveLength(1);
    });
  });
});
