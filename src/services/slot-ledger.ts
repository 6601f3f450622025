/**
 * Slot Deduplication Ledger
 *
 * Remembers which (watch, date, time) sightings are recorded and still
 * unbooked. Backed by the found_slots table; rows are never evicted, so the
 * ledger doubles as the history of everything ever seen.
 */
import type { SnipeRetryPolicy } from "../config";
import type { FoundSlot, NewFoundSlot } from "../db/schema";
import type { SlotStore } from "../store";

export interface RetryPolicyConfig {
  policy: SnipeRetryPolicy;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  policy: "backoff",
  baseDelayMs: 60_000,
  maxDelayMs: 30 * 60_000,
};

export class SlotLedger {
  constructor(
    private readonly slots: SlotStore,
    private readonly retry: RetryPolicyConfig = DEFAULT_RETRY_POLICY
  ) {}

  /**
   * The unbooked record for this sighting, if any
   */
  lookup(watchId: number, date: string, time: string): Promise<FoundSlot | undefined> {
    return this.slots.findUnbooked(watchId, date, time);
  }

  /**
   * Record a new sighting. Null when another scan recorded it first.
   */
  record(slot: NewFoundSlot): Promise<FoundSlot | null> {
    return this.slots.insert(slot);
  }

  noteSnipeAttempt(slot: FoundSlot, at: Date): Promise<FoundSlot | undefined> {
    return this.slots.recordSnipeAttempt(slot.id, at);
  }

  markBooked(watchId: number, date: string, time: string): Promise<number> {
    return this.slots.markBooked(watchId, date, time);
  }

  /**
   * Whether an already-recorded unbooked slot should be sniped again now
   */
  isSnipeDue(slot: FoundSlot, now: Date): boolean {
    if (slot.booked) return false;
    if (slot.snipe_attempts === 0 || !slot.last_snipe_at) return true;

    switch (this.retry.policy) {
      case "once":
        return false;
      case "every_cycle":
        return true;
      case "backoff":
        return now.getTime() - slot.last_snipe_at.getTime() >= this.backoffDelay(slot.snipe_attempts);
    }
  }

  /**
   * Delay before the next attempt after `attempts` failures:
   * base, 2x base, 4x base ... capped at max
   */
  backoffDelay(attempts: number): number {
    const exponent = Math.max(0, attempts - 1);
    return Math.min(this.retry.baseDelayMs * 2 ** exponent, this.retry.maxDelayMs);
  }
}
