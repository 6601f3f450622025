import { test, expect, describe } from "vitest";
import type { Watch } from "../../db/schema";
import { applyWatchEdit, buildWatch, describeWatch } from "./watch";

const watch = (overrides: Partial<Watch> = {}): Watch => ({
  id: 3,
  venue_id: "1505",
  venue_name: "Test Bistro",
  party_size: 2,
  date_start: "2026-06-01",
  date_end: "2026-06-03",
  time_earliest: "17:00",
  time_latest: "22:00",
  snipe_mode: true,
  active: true,
  created_at: new Date("2026-05-01T00:00:00Z"),
  last_checked: null,
  ...overrides,
});

describe("buildWatch", () => {
  test("fills in defaults", () => {
    expect(buildWatch({ venue_id: "1505", date_start: "2026-06-01" })).toEqual({
      ok: true,
      watch: {
        venue_id: "1505",
        venue_name: "",
        party_size: 2,
        date_start: "2026-06-01",
        date_end: null,
        time_earliest: "17:00",
        time_latest: "22:00",
        snipe_mode: false,
        active: true,
      },
    });
  });

  test("rejects a non-numeric venue id", () => {
    expect(buildWatch({ venue_id: "abc", date_start: "2026-06-01" })).toEqual({
      ok: false,
      error: "venue_id must be a numeric Resy venue id",
    });
  });

  test("rejects impossible dates", () => {
    expect(buildWatch({ venue_id: "1505", date_start: "2026-02-30" })).toEqual({
      ok: false,
      error: "date_start must be a date in YYYY-MM-DD format",
    });
  });

  test("rejects an end date before the start", () => {
    expect(
      buildWatch({ venue_id: "1505", date_start: "2026-06-03", date_end: "2026-06-01" })
    ).toEqual({
      ok: false,
      error: "date_end date_end must not be before date_start",
    });
  });

  test("rejects malformed times", () => {
    expect(
      buildWatch({ venue_id: "1505", date_start: "2026-06-01", time_latest: "25:00" })
    ).toEqual({
      ok: false,
      error: "time_latest must be a time in HH:mm format (e.g., 18:00)",
    });
  });

  test("rejects an inverted time window", () => {
    expect(
      buildWatch({
        venue_id: "1505",
        date_start: "2026-06-01",
        time_earliest: "21:00",
        time_latest: "18:00",
      })
    ).toEqual({
      ok: false,
      error: "time_latest time_latest must not be before time_earliest",
    });
  });
});

describe("applyWatchEdit", () => {
  test("returns only the edited fields", () => {
    expect(applyWatchEdit(watch(), { party_size: 4, time_latest: "21:00" })).toEqual({
      ok: true,
      changes: { party_size: 4, time_latest: "21:00" },
    });
  });

  test("checks a new start date against the existing end date", () => {
    expect(applyWatchEdit(watch(), { date_start: "2026-06-05" })).toEqual({
      ok: false,
      error: "date_end date_end must not be before date_start",
    });
  });

  test("accepts moving both dates together", () => {
    expect(
      applyWatchEdit(watch(), { date_start: "2026-06-05", date_end: "2026-06-07" })
    ).toEqual({
      ok: true,
      changes: { date_start: "2026-06-05", date_end: "2026-06-07" },
    });
  });

  test("checks a new earliest time against the existing latest time", () => {
    expect(applyWatchEdit(watch(), { time_earliest: "23:00" })).toEqual({
      ok: false,
      error: "time_latest time_latest must not be before time_earliest",
    });
  });

  test("rejects malformed values", () => {
    expect(applyWatchEdit(watch(), { date_end: "2026-06-31" })).toEqual({
      ok: false,
      error: "date_end must be a date in YYYY-MM-DD format",
    });
  });

  test("leaves an open time bound open", () => {
    expect(
      applyWatchEdit(watch({ time_earliest: null, time_latest: null }), { time_latest: "16:00" })
    ).toEqual({
      ok: true,
      changes: { time_latest: "16:00" },
    });
  });

  test("needs at least one field", () => {
    expect(applyWatchEdit(watch(), {})).toEqual({ ok: false, error: "Nothing to change" });
  });
});

describe("describeWatch", () => {
  test("shows range, window and flags", () => {
    expect(describeWatch(watch())).toBe(
      "**#3 Test Bistro** (active, snipe)\n" +
        "  Party: 2 | 2026-06-01 to 2026-06-03 | 17:00-22:00\n" +
        "  Last checked: never"
    );
  });

  test("falls back to venue id and open bounds", () => {
    expect(
      describeWatch(
        watch({
          id: 1,
          venue_name: "",
          party_size: 4,
          date_end: null,
          time_earliest: null,
          time_latest: null,
          snipe_mode: false,
          active: false,
          last_checked: new Date("2026-05-01T12:00:00Z"),
        })
      )
    ).toBe(
      "**#1 1505** (paused)\n" +
        "  Party: 4 | 2026-06-01 | any-any\n" +
        "  Last checked: 2026-05-01T12:00:00.000Z"
    );
  });
});
