/**
 * /settings command - Show or change stored Resy credentials
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import { SETTING_KEYS } from "../../db/schema";
import { maskSettings } from "../../services";
import { errorMessage } from "../../errors";
import { COLORS, type CommandContext } from "../context";

export const settingsCommand = new SlashCommandBuilder()
  .setName("settings")
  .setDescription("Resy credentials used by the monitor")
  .addSubcommand((sub) => sub.setName("show").setDescription("Show settings (secrets masked)"))
  .addSubcommand((sub) =>
    sub
      .setName("set")
      .setDescription("Change a setting")
      .addStringOption((option) =>
        option
          .setName("key")
          .setDescription("Setting to change")
          .setRequired(true)
          .addChoices(...SETTING_KEYS.map((key) => ({ name: key, value: key })))
      )
      .addStringOption((option) =>
        option.setName("value").setDescription("New value").setRequired(true)
      )
  );

export async function handleSettings(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    if (interaction.options.getSubcommand() === "set") {
      const key = interaction.options.getString("key", true);
      const value = interaction.options.getString("value", true).trim();

      if (key === "payment_method_id" && !/^\d+$/.test(value)) {
        const embed = new EmbedBuilder()
          .setTitle("Invalid Value")
          .setDescription("payment_method_id must be a number")
          .setColor(COLORS.error);
        await interaction.editReply({ embeds: [embed] });
        return;
      }

      await context.stores.settings.set(key, value);
      const embed = new EmbedBuilder()
        .setTitle("Setting Saved")
        .setDescription(`\`${key}\` updated; the next scan cycle picks it up`)
        .setColor(COLORS.success);
      await interaction.editReply({ embeds: [embed] });
      return;
    }

    const masked = maskSettings(await context.stores.settings.getAll());
    const lines = SETTING_KEYS.map((key) => `\`${key}\`: ${masked[key] ?? "not set"}`);

    const embed = new EmbedBuilder()
      .setTitle("Settings")
      .setDescription(lines.join("\n"))
      .setColor(COLORS.info);
    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Error")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}
