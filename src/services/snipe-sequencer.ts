/**
 * Snipe Sequencer
 *
 * Two-step booking for one found slot:
 * 1. GET /3/details with the slot's config token -> book_token
 * 2. POST /3/book with the book_token
 *
 * No retries here. A failed attempt leaves the slot unbooked and the
 * scanner's retry policy decides when it is tried again.
 */
import type { BookingApi, BookResponse, DetailsResponse } from "../sdk";
import type { FoundSlot, Watch } from "../db/schema";
import { MissingTokenError, errorMessage } from "../errors";
import type { ActivityRecorder } from "./activity";
import type { SlotLedger } from "./slot-ledger";
import type { MonitorSettings } from "./settings";

export type SnipeStage = "details" | "token" | "book";

/**
 * Result of one snipe attempt
 */
export type SnipeOutcome =
  | { status: "booked"; reservationId: number; resyToken: string }
  | { status: "failed"; stage: SnipeStage; reason: string };

export interface BookedSlot {
  watch: Watch;
  slot: FoundSlot;
  reservationId: number;
}

export interface SnipeSequencerConfig {
  activity: ActivityRecorder;
  ledger: SlotLedger;
  now?: () => Date;
  onBooked?: (booked: BookedSlot) => void | Promise<void>;
}

/**
 * Pull the book token out of a details response
 */
export function extractBookToken(details: DetailsResponse): string {
  const token = details.book_token?.value;
  if (!token) {
    throw new MissingTokenError();
  }
  return token;
}

export class SnipeSequencer {
  private activity: ActivityRecorder;
  private ledger: SlotLedger;
  private now: () => Date;
  private onBooked?: SnipeSequencerConfig["onBooked"];

  constructor(config: SnipeSequencerConfig) {
    this.activity = config.activity;
    this.ledger = config.ledger;
    this.now = config.now ?? (() => new Date());
    this.onBooked = config.onBooked;
  }

  /**
   * Attempt to book a found slot
   */
  async snipe(
    client: BookingApi,
    watch: Watch,
    slot: FoundSlot,
    settings: MonitorSettings
  ): Promise<SnipeOutcome> {
    await this.ledger.noteSnipeAttempt(slot, this.now());
    await this.activity.record(
      watch.id,
      "snipe",
      `Attempting to snipe ${watch.venue_name} ${slot.date} ${slot.time}...`,
      { date: slot.date, time: slot.time, partySize: watch.party_size }
    );

    // Step 1: booking details -> book token
    let bookToken: string;
    try {
      const details = await client.getDetails({
        config_id: slot.config_token,
        day: slot.date,
        party_size: watch.party_size,
      });
      bookToken = extractBookToken(details);
    } catch (error) {
      if (error instanceof MissingTokenError) {
        await this.activity.record(watch.id, "error", error.message);
        return { status: "failed", stage: "token", reason: error.message };
      }

      const reason = errorMessage(error);
      await this.activity.record(watch.id, "error", `Failed to get booking details: ${reason}`);
      return { status: "failed", stage: "details", reason };
    }

    // Step 2: book it
    let booking: BookResponse;
    try {
      booking = await client.bookReservation({
        book_token: bookToken,
        payment_method_id: settings.paymentMethodId,
      });
    } catch (error) {
      const reason = errorMessage(error);
      await this.activity.record(watch.id, "error", `Booking failed: ${reason}`);
      return { status: "failed", stage: "book", reason };
    }

    await this.activity.record(
      watch.id,
      "booked",
      `BOOKED! ${watch.venue_name} ${slot.date} at ${slot.time}`,
      { reservationId: booking.reservation_id, date: slot.date, time: slot.time }
    );
    await this.ledger.markBooked(watch.id, slot.date, slot.time);
    await this.notifyBooked({ watch, slot, reservationId: booking.reservation_id });

    return {
      status: "booked",
      reservationId: booking.reservation_id,
      resyToken: booking.resy_token,
    };
  }

  private async notifyBooked(booked: BookedSlot): Promise<void> {
    if (!this.onBooked) return;
    try {
      await this.onBooked(booked);
    } catch (error) {
      await this.activity.record(
        booked.watch.id,
        "error",
        `Booked-slot notification failed: ${errorMessage(error)}`
      );
    }
  }
}
