/**
 * /search command - Find Resy venues by name
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import type { SearchHit } from "../../sdk";
import { errorMessage } from "../../errors";
import { COLORS, type CommandContext } from "../context";

export const searchCommand = new SlashCommandBuilder()
  .setName("search")
  .setDescription("Search Resy venues to get a venue ID")
  .addStringOption((option) =>
    option.setName("query").setDescription("Restaurant name").setRequired(true)
  );

/**
 * One line per hit: name, neighborhood, venue id
 */
export function formatSearchHit(hit: SearchHit): string {
  const area = hit.location?.neighborhood ?? hit.location?.locality ?? "N/A";
  return `- **${hit.name}** (${area}) - venue ID \`${hit.id.resy}\``;
}

export async function handleSearch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  const query = interaction.options.getString("query", true).trim();

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    if (!query) {
      const embed = new EmbedBuilder()
        .setTitle("Missing Query")
        .setDescription("Give part of a restaurant name to search for")
        .setColor(COLORS.warning);
      await interaction.editReply({ embeds: [embed] });
      return;
    }

    const client = await context.resyClient();
    if (!client) {
      const embed = new EmbedBuilder()
        .setTitle("Not Configured")
        .setDescription("Set a Resy API key first")
        .setColor(COLORS.warning)
        .setFooter({ text: "Use /settings set key:api_key" });
      await interaction.editReply({ embeds: [embed] });
      return;
    }

    const result = await client.search({ query });
    const hits = result.search?.hits ?? [];

    const embed = new EmbedBuilder()
      .setTitle(`Results for "${query}"`)
      .setColor(hits.length > 0 ? COLORS.info : COLORS.warning)
      .setDescription(
        hits.length > 0
          ? hits.slice(0, 10).map(formatSearchHit).join("\n")
          : "No venues found"
      );

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Search Failed")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}
