/**
 * Watch Scanner
 *
 * For each active watch: walk its date range, ask Resy for slots on each day,
 * keep the ones inside the watch's time window, record the new ones and
 * snipe them when the watch asks for it.
 *
 * Failure granularity:
 * - one date's find call fails -> skip that date, no activity event
 * - anything else inside a watch -> one error event for the watch, next watch
 */
import type { BookingApi, FindResponse } from "../sdk";
import type { FoundSlot, Watch } from "../db/schema";
import type { WatchStore } from "../store";
import {
  enumerateDates,
  filterSlots,
  isClockTime,
  slotTimeOfDay,
  type SlotInfo,
} from "../filters";
import { InvalidWatchError, MissingCredentialError, errorMessage } from "../errors";
import { componentLogger } from "../logger";
import type { ActivityRecorder } from "./activity";
import type { SlotLedger } from "./slot-ledger";
import type { SnipeSequencer } from "./snipe-sequencer";
import type { MonitorSettings, SettingsProvider } from "./settings";

const logger = componentLogger("scanner");

// Default configuration
const DEFAULT_DAY_PAUSE_MS = 1000;

/**
 * A newly recorded sighting
 */
export interface FoundSlotEvent {
  watch: Watch;
  slot: FoundSlot;
}

/**
 * Per-watch scan summary
 */
export interface WatchScanResult {
  watchId: number;
  datesChecked: number;
  datesFailed: number;
  newSlots: number;
  snipeAttempts: number;
  bookings: number;
}

/**
 * Summary of one pass over all active watches
 */
export interface ScanStats {
  skipped: boolean;
  watchesScanned: number;
  watchErrors: number;
  newSlots: number;
  snipeAttempts: number;
  bookings: number;
  elapsedMs: number;
  finishedAt: Date;
}

export type ClientFactory = (settings: MonitorSettings & { apiKey: string }) => BookingApi;

/**
 * Scanner configuration
 */
export interface WatchScannerConfig {
  watches: WatchStore;
  ledger: SlotLedger;
  sequencer: SnipeSequencer;
  activity: ActivityRecorder;
  settings: SettingsProvider;
  createClient: ClientFactory;
  dayPauseMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  onSlotFound?: (event: FoundSlotEvent) => void | Promise<void>;
}

/**
 * Flatten a find response into slots in API order, across every venue
 */
export function extractSlots(response: FindResponse): SlotInfo[] {
  const venues = response.results?.venues ?? [];
  const slots: SlotInfo[] = [];

  for (const venue of venues) {
    for (const slot of venue.slots) {
      slots.push({
        config_token: slot.config?.token ?? "",
        start: slot.date?.start ?? "",
        type: slot.config?.type ?? undefined,
      });
    }
  }

  return slots;
}

/**
 * Reject watches the scanner can't interpret before any API call is made
 */
function assertScannable(watch: Watch): void {
  for (const bound of [watch.time_earliest, watch.time_latest]) {
    if (bound && !isClockTime(bound)) {
      throw new InvalidWatchError(watch.id, `Invalid time window bound "${bound}"`);
    }
  }
  if (!Number.isInteger(watch.party_size) || watch.party_size < 1) {
    throw new InvalidWatchError(watch.id, `Invalid party size ${watch.party_size}`);
  }
}

export class WatchScanner {
  private watches: WatchStore;
  private ledger: SlotLedger;
  private sequencer: SnipeSequencer;
  private activity: ActivityRecorder;
  private settings: SettingsProvider;
  private createClient: ClientFactory;
  private dayPauseMs: number;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;
  private onSlotFound?: WatchScannerConfig["onSlotFound"];

  constructor(config: WatchScannerConfig) {
    this.watches = config.watches;
    this.ledger = config.ledger;
    this.sequencer = config.sequencer;
    this.activity = config.activity;
    this.settings = config.settings;
    this.createClient = config.createClient;
    this.dayPauseMs = config.dayPauseMs ?? DEFAULT_DAY_PAUSE_MS;
    this.now = config.now ?? (() => new Date());
    this.sleep = config.sleep ?? sleep;
    this.onSlotFound = config.onSlotFound;
  }

  /**
   * Scan every active watch once.
   * Without an API key this returns immediately without touching anything.
   */
  async scanAll(): Promise<ScanStats> {
    const startTime = Date.now();
    const stats: ScanStats = {
      skipped: false,
      watchesScanned: 0,
      watchErrors: 0,
      newSlots: 0,
      snipeAttempts: 0,
      bookings: 0,
      elapsedMs: 0,
      finishedAt: this.now(),
    };

    const settings = await this.settings();
    if (!settings.apiKey) {
      logger.debug({ reason: new MissingCredentialError("api_key").message }, "Skipping scan");
      return { ...stats, skipped: true, elapsedMs: Date.now() - startTime };
    }

    const client = this.createClient({ ...settings, apiKey: settings.apiKey });
    const watches = await this.watches.listActive();

    logger.debug({ watchCount: watches.length }, "Starting scan of active watches");

    for (const watch of watches) {
      try {
        const result = await this.scanWatch(watch, settings, client);
        stats.watchesScanned++;
        stats.newSlots += result.newSlots;
        stats.snipeAttempts += result.snipeAttempts;
        stats.bookings += result.bookings;
      } catch (error) {
        stats.watchErrors++;
        await this.activity.record(
          watch.id,
          "error",
          `Error checking ${watch.venue_name || watch.venue_id}: ${errorMessage(error)}`
        );
      }
    }

    stats.elapsedMs = Date.now() - startTime;
    stats.finishedAt = this.now();

    logger.info(
      {
        watchesScanned: stats.watchesScanned,
        watchErrors: stats.watchErrors,
        newSlots: stats.newSlots,
        bookings: stats.bookings,
        elapsedMs: stats.elapsedMs,
      },
      "Scan complete"
    );

    return stats;
  }

  /**
   * Scan one watch across its date range
   */
  async scanWatch(
    watch: Watch,
    settings: MonitorSettings,
    client: BookingApi
  ): Promise<WatchScanResult> {
    assertScannable(watch);

    let dates: string[];
    try {
      dates = enumerateDates(watch.date_start, watch.date_end ?? watch.date_start);
    } catch (error) {
      throw new InvalidWatchError(watch.id, errorMessage(error));
    }

    const result: WatchScanResult = {
      watchId: watch.id,
      datesChecked: 0,
      datesFailed: 0,
      newSlots: 0,
      snipeAttempts: 0,
      bookings: 0,
    };

    for (const [index, date] of dates.entries()) {
      // Rate limit between days
      if (index > 0 && this.dayPauseMs > 0) {
        await this.sleep(this.dayPauseMs);
      }

      let response: FindResponse;
      try {
        response = await client.findSlots({
          venue_id: watch.venue_id,
          day: date,
          party_size: watch.party_size,
        });
      } catch (error) {
        // Transient API failures are common; skip the day without an event
        result.datesFailed++;
        logger.debug({ watchId: watch.id, date, error: errorMessage(error) }, "Find failed, skipping date");
        continue;
      }

      result.datesChecked++;
      const slots = filterSlots(extractSlots(response), {
        earliest: watch.time_earliest,
        latest: watch.time_latest,
      });

      // The same start time can come back once per seating area
      const booked = new Set<string>();
      for (const slot of slots) {
        if (booked.has(slot.start)) continue;
        if (await this.processSlot(watch, date, slot, settings, client, result)) {
          booked.add(slot.start);
        }
      }
    }

    await this.watches.updateLastChecked(watch.id, this.now());
    return result;
  }

  /**
   * Record a slot if it's new, then snipe it if the watch wants that.
   * Resolves true when the slot was booked.
   */
  private async processSlot(
    watch: Watch,
    date: string,
    slot: SlotInfo,
    settings: MonitorSettings,
    client: BookingApi,
    result: WatchScanResult
  ): Promise<boolean> {
    let candidate = await this.ledger.lookup(watch.id, date, slot.start);

    if (!candidate) {
      const recorded = await this.ledger.record({
        watch_id: watch.id,
        venue_name: watch.venue_name,
        date,
        time: slot.start,
        party_size: watch.party_size,
        config_token: slot.config_token,
      });

      // Another scan recorded it between our lookup and insert
      if (!recorded) return false;

      result.newSlots++;
      await this.activity.record(
        watch.id,
        "found",
        `Slot found! ${watch.venue_name} - ${date} at ${slot.start} for ${watch.party_size}`,
        { date, time: slot.start, timeOfDay: slotTimeOfDay(slot.start), partySize: watch.party_size }
      );
      // The DM must not hold up the snipe
      void this.notifySlotFound({ watch, slot: recorded });
      candidate = recorded;
    } else if (!this.ledger.isSnipeDue(candidate, this.now())) {
      return false;
    }

    if (!watch.snipe_mode || !slot.config_token || !settings.authToken) {
      return false;
    }

    // Prefer the token from this scan; an old one may have expired
    const fresh: FoundSlot = { ...candidate, config_token: slot.config_token };
    result.snipeAttempts++;
    const outcome = await this.sequencer.snipe(client, watch, fresh, settings);
    if (outcome.status === "booked") {
      result.bookings++;
      return true;
    }
    return false;
  }

  private async notifySlotFound(event: FoundSlotEvent): Promise<void> {
    if (!this.onSlotFound) return;
    try {
      await this.onSlotFound(event);
    } catch (error) {
      logger.warn({ watchId: event.watch.id, error: errorMessage(error) }, "Found-slot notification failed");
    }
  }
}

/**
 * Sleep helper
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
