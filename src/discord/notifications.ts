/**
 * Discord Notifications Service
 * DMs the admin when the monitor finds or books a slot
 */
import { EmbedBuilder } from "discord.js";
import type { BookedSlot, FoundSlotEvent } from "../services";
import { slotTimeOfDay } from "../filters";
import { componentLogger } from "../logger";
import { errorMessage } from "../errors";
import { COLORS } from "./context";

const logger = componentLogger("notifier");

/**
 * The slice of discord.js the notifier needs
 */
export interface DirectMessenger {
  users: {
    fetch(id: string): Promise<{ send(message: { embeds: EmbedBuilder[] }): Promise<unknown> }>;
  };
}

/**
 * Discord Notification Service
 */
export class DiscordNotifier {
  private client: DirectMessenger;
  private adminDiscordId: string;

  constructor(client: DirectMessenger, adminDiscordId: string) {
    this.client = client;
    this.adminDiscordId = adminDiscordId;
  }

  /**
   * Send a DM to the admin. A refused DM is logged, never thrown.
   */
  private async sendDM(embed: EmbedBuilder): Promise<void> {
    try {
      const user = await this.client.users.fetch(this.adminDiscordId);
      await user.send({ embeds: [embed] });
      logger.debug({ discordId: this.adminDiscordId }, "Sent DM notification");
    } catch (error) {
      logger.error(
        { discordId: this.adminDiscordId, error: errorMessage(error) },
        "Failed to send DM notification"
      );
    }
  }

  /**
   * Notify admin that a watch turned up a new slot
   */
  async notifySlotFound({ watch, slot }: FoundSlotEvent): Promise<void> {
    const embed = new EmbedBuilder()
      .setTitle("Slot Found!")
      .setDescription(`Opening at **${watch.venue_name || watch.venue_id}**`)
      .setColor(COLORS.warning)
      .addFields(
        { name: "Date", value: slot.date, inline: true },
        { name: "Time", value: slotTimeOfDay(slot.time), inline: true },
        { name: "Party", value: String(slot.party_size), inline: true }
      )
      .setFooter({
        text: watch.snipe_mode ? "Attempting to book..." : "Snipe mode is off for this watch",
      })
      .setTimestamp();

    await this.sendDM(embed);
  }

  /**
   * Notify admin of a successful booking
   */
  async notifyBooked({ watch, slot, reservationId }: BookedSlot): Promise<void> {
    const embed = new EmbedBuilder()
      .setTitle("BOOKED!")
      .setDescription(`Successfully booked at **${watch.venue_name || watch.venue_id}**`)
      .setColor(COLORS.success)
      .addFields(
        { name: "Date", value: slot.date, inline: true },
        { name: "Time", value: slotTimeOfDay(slot.time), inline: true },
        { name: "Reservation ID", value: String(reservationId), inline: true }
      )
      .setFooter({ text: "Check your Resy app to view details!" })
      .setTimestamp();

    await this.sendDM(embed);
  }
}
