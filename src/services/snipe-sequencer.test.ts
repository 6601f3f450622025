import { test, expect, describe, beforeEach, vi } from "vitest";
import { createFakeResy, newWatch, type FakeResy } from "../../tests/helpers";
import type { FoundSlot, Watch } from "../db/schema";
import { createMemoryStores, type Stores } from "../store";
import { ActivityRecorder } from "./activity";
import { SlotLedger } from "./slot-ledger";
import { SnipeSequencer, extractBookToken } from "./snipe-sequencer";
import type { MonitorSettings } from "./settings";

const NOW = new Date("2026-05-01T12:00:00Z");
const SETTINGS: MonitorSettings = {
  apiKey: "test-key",
  authToken: "test-token",
  paymentMethodId: 12345,
};

describe("extractBookToken", () => {
  test("returns the token value", () => {
    expect(extractBookToken({ book_token: { value: "book-tok" } })).toBe("book-tok");
  });

  test("throws when the token is missing", () => {
    expect(() => extractBookToken({ book_token: null })).toThrow("No booking token received");
    expect(() => extractBookToken({})).toThrow("No booking token received");
  });
});

describe("SnipeSequencer", () => {
  let stores: Stores;
  let ledger: SlotLedger;
  let resy: FakeResy;
  let watch: Watch;
  let slot: FoundSlot;

  const messages = async () =>
    (await stores.activity.listRecent()).map((e) => e.message).reverse();

  const recordSlot = async (time: string): Promise<FoundSlot> => {
    const recorded = await ledger.record({
      watch_id: watch.id,
      venue_name: watch.venue_name,
      date: "2026-06-01",
      time,
      party_size: 2,
      config_token: "cfg-1",
    });
    if (!recorded) throw new Error("slot already recorded");
    return recorded;
  };

  beforeEach(async () => {
    stores = createMemoryStores();
    ledger = new SlotLedger(stores.slots);
    resy = createFakeResy();
    watch = await stores.watches.create(newWatch({ snipe_mode: true }));
    slot = await recordSlot("2026-06-01 19:00:00");
  });

  const sequencer = (onBooked?: ConstructorParameters<typeof SnipeSequencer>[0]["onBooked"]) =>
    new SnipeSequencer({
      activity: new ActivityRecorder(stores.activity),
      ledger,
      now: () => NOW,
      onBooked,
    });

  test("books the slot and marks only that slot booked", async () => {
    const other = await recordSlot("2026-06-01 20:00:00");

    const outcome = await sequencer().snipe(resy, watch, slot, SETTINGS);

    expect(outcome).toEqual({ status: "booked", reservationId: 777, resyToken: "resy-tok" });
    expect(resy.getDetails).toHaveBeenCalledWith({
      config_id: "cfg-1",
      day: "2026-06-01",
      party_size: 2,
    });
    expect(resy.bookReservation).toHaveBeenCalledWith({
      book_token: "book-tok",
      payment_method_id: 12345,
    });

    expect(await stores.slots.existsUnbooked(watch.id, "2026-06-01", slot.time)).toBe(false);
    expect(await stores.slots.existsUnbooked(watch.id, "2026-06-01", other.time)).toBe(true);

    expect(await messages()).toEqual([
      "Attempting to snipe Test Bistro 2026-06-01 2026-06-01 19:00:00...",
      "BOOKED! Test Bistro 2026-06-01 at 2026-06-01 19:00:00",
    ]);
    const [booked] = await stores.activity.listRecent(1);
    expect(booked.kind).toBe("booked");
    expect(booked.details).toEqual({
      reservationId: 777,
      date: "2026-06-01",
      time: "2026-06-01 19:00:00",
    });
  });

  test("counts the attempt before calling Resy", async () => {
    resy.getDetails.mockRejectedValue(new Error("boom"));

    await sequencer().snipe(resy, watch, slot, SETTINGS);

    const stored = await stores.slots.findUnbooked(watch.id, "2026-06-01", slot.time);
    expect(stored?.snipe_attempts).toBe(1);
    expect(stored?.last_snipe_at).toEqual(NOW);
  });

  test("details failure never reaches the book call", async () => {
    resy.getDetails.mockRejectedValue(new Error("boom"));

    const outcome = await sequencer().snipe(resy, watch, slot, SETTINGS);

    expect(outcome).toEqual({ status: "failed", stage: "details", reason: "boom" });
    expect(resy.bookReservation).not.toHaveBeenCalled();
    expect((await messages())[1]).toBe("Failed to get booking details: boom");
  });

  test("missing book token is its own failure", async () => {
    resy.getDetails.mockResolvedValue({ book_token: null });

    const outcome = await sequencer().snipe(resy, watch, slot, SETTINGS);

    expect(outcome).toEqual({
      status: "failed",
      stage: "token",
      reason: "No booking token received",
    });
    expect(resy.bookReservation).not.toHaveBeenCalled();
    expect((await messages())[1]).toBe("No booking token received");
  });

  test("book failure leaves the slot unbooked", async () => {
    resy.bookReservation.mockRejectedValue(new Error("sold out"));

    const outcome = await sequencer().snipe(resy, watch, slot, SETTINGS);

    expect(outcome).toEqual({ status: "failed", stage: "book", reason: "sold out" });
    expect(await stores.slots.existsUnbooked(watch.id, "2026-06-01", slot.time)).toBe(true);
    expect((await messages())[1]).toBe("Booking failed: sold out");
  });

  test("notifies on booking, and a failing notifier is an error event", async () => {
    const onBooked = vi.fn().mockRejectedValue(new Error("dm failed"));

    const outcome = await sequencer(onBooked).snipe(resy, watch, slot, SETTINGS);

    expect(outcome.status).toBe("booked");
    expect(onBooked).toHaveBeenCalledWith({ watch, slot, reservationId: 777 });
    expect((await messages())[2]).toBe("Booked-slot notification failed: dm failed");
  });
});
