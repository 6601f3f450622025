/**
 * Service wiring
 *
 * Builds the monitor and everything under it from a set of stores and a
 * client factory. The entry point and the end-to-end tests both go through
 * here so they run the same graph.
 */
import type { SnipeRetryPolicy } from "../config";
import { ResyClient } from "../sdk";
import { logger } from "../logger";
import type { Stores } from "../store";
import { ActivityRecorder } from "./activity";
import { MonitorLoop } from "./monitor";
import { createSettingsProvider } from "./settings";
import { SlotLedger } from "./slot-ledger";
import { SnipeSequencer, type BookedSlot } from "./snipe-sequencer";
import {
  WatchScanner,
  type ClientFactory,
  type FoundSlotEvent,
  type ScanStats,
} from "./watch-scanner";

export { ActivityRecorder } from "./activity";
export { MonitorLoop, type MonitorState, type ScanRunner } from "./monitor";
export {
  createSettingsProvider,
  loadMonitorSettings,
  maskSecret,
  maskSettings,
  type MonitorSettings,
  type SettingsProvider,
} from "./settings";
export { SlotLedger, DEFAULT_RETRY_POLICY, type RetryPolicyConfig } from "./slot-ledger";
export { SnipeSequencer, extractBookToken, type BookedSlot, type SnipeOutcome } from "./snipe-sequencer";
export {
  WatchScanner,
  extractSlots,
  type ClientFactory,
  type FoundSlotEvent,
  type ScanStats,
  type WatchScanResult,
} from "./watch-scanner";

export interface MonitorServicesConfig {
  stores: Stores;
  createClient?: ClientFactory;
  /** Environment values used when the settings table lacks a key */
  settingsFallback?: Record<string, string | undefined>;
  intervalMs?: number;
  dayPauseMs?: number;
  requestTimeoutMs?: number;
  retry?: {
    policy: SnipeRetryPolicy;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  onSlotFound?: (event: FoundSlotEvent) => void | Promise<void>;
  onBooked?: (booked: BookedSlot) => void | Promise<void>;
  onCycleComplete?: (stats: ScanStats) => void;
}

export interface MonitorServices {
  activity: ActivityRecorder;
  ledger: SlotLedger;
  sequencer: SnipeSequencer;
  scanner: WatchScanner;
  monitor: MonitorLoop;
}

/**
 * Default client factory: a real Resy client per scan, so credential
 * changes in the settings table apply on the next cycle
 */
export function resyClientFactory(timeoutMs?: number): ClientFactory {
  return (settings) =>
    new ResyClient({
      apiKey: settings.apiKey,
      authToken: settings.authToken,
      timeoutMs,
      debug: logger.isLevelEnabled("debug"),
    });
}

export function createMonitorServices(config: MonitorServicesConfig): MonitorServices {
  const { stores } = config;
  const activity = new ActivityRecorder(stores.activity);
  const ledger = new SlotLedger(stores.slots, config.retry);

  const sequencer = new SnipeSequencer({
    activity,
    ledger,
    now: config.now,
    onBooked: config.onBooked,
  });

  const scanner = new WatchScanner({
    watches: stores.watches,
    ledger,
    sequencer,
    activity,
    settings: createSettingsProvider(stores.settings, config.settingsFallback),
    createClient: config.createClient ?? resyClientFactory(config.requestTimeoutMs),
    dayPauseMs: config.dayPauseMs,
    now: config.now,
    sleep: config.sleep,
    onSlotFound: config.onSlotFound,
  });

  const monitor = new MonitorLoop({
    scanner,
    activity,
    intervalMs: config.intervalMs,
    onCycleComplete: config.onCycleComplete,
  });

  return { activity, ledger, sequencer, scanner, monitor };
}
