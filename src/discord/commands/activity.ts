/**
 * /activity and /found commands - Recent events and slot sightings
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import type { ActivityEvent, ActivityKind, FoundSlot } from "../../db/schema";
import { errorMessage } from "../../errors";
import { COLORS, type CommandContext } from "../context";

const KIND_ICONS: Record<ActivityKind, string> = {
  system: "⚙️",
  error: "❌",
  found: "🎯",
  snipe: "⚡",
  booked: "✅",
  watch: "👀",
};

export const activityCommand = new SlashCommandBuilder()
  .setName("activity")
  .setDescription("Show recent monitor activity")
  .addIntegerOption((option) =>
    option
      .setName("limit")
      .setDescription("Number of events (default: 15)")
      .setMinValue(1)
      .setMaxValue(50)
  )
  .addBooleanOption((option) =>
    option.setName("clear").setDescription("Clear the activity feed instead")
  );

export const foundCommand = new SlashCommandBuilder()
  .setName("found")
  .setDescription("Show recently found slots");

export function formatActivity(event: ActivityEvent): string {
  const watch = event.watch_id !== null ? ` [#${event.watch_id}]` : "";
  return `${KIND_ICONS[event.kind]} \`${event.created_at.toISOString()}\`${watch} ${event.message}`;
}

export function formatFoundSlot(slot: FoundSlot): string {
  const status = slot.booked ? "booked" : `unbooked, ${slot.snipe_attempts} snipe attempts`;
  return `- **${slot.venue_name || `watch #${slot.watch_id}`}** ${slot.time} for ${slot.party_size} (${status})`;
}

export async function handleActivity(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  const limit = interaction.options.getInteger("limit") ?? 15;
  const clear = interaction.options.getBoolean("clear") ?? false;

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    if (clear) {
      await context.stores.activity.clear();
      const embed = new EmbedBuilder().setTitle("Activity Cleared").setColor(COLORS.info);
      await interaction.editReply({ embeds: [embed] });
      return;
    }

    const events = await context.stores.activity.listRecent(limit);
    const embed = new EmbedBuilder()
      .setTitle("Recent Activity")
      .setColor(COLORS.info)
      .setDescription(
        events.length > 0 ? events.map(formatActivity).join("\n").slice(0, 4096) : "Nothing yet"
      );

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Error")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}

export async function handleFound(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const slots = await context.stores.slots.listRecent();
    const embed = new EmbedBuilder()
      .setTitle("Found Slots")
      .setColor(COLORS.info)
      .setDescription(
        slots.length > 0 ? slots.map(formatFoundSlot).join("\n").slice(0, 4096) : "No slots found yet"
      );

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Error")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}
