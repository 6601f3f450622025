/**
 * /monitor command - Start, stop and inspect the scan loop
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import type { ScanStats } from "../../services";
import { errorMessage } from "../../errors";
import { COLORS, type CommandContext } from "../context";

export const monitorCommand = new SlashCommandBuilder()
  .setName("monitor")
  .setDescription("Control the availability monitor")
  .addSubcommand((sub) => sub.setName("start").setDescription("Start scanning every watch on a cycle"))
  .addSubcommand((sub) => sub.setName("stop").setDescription("Stop after the current cycle"))
  .addSubcommand((sub) => sub.setName("status").setDescription("Show monitor state and the last scan"))
  .addSubcommand((sub) => sub.setName("check").setDescription("Scan all watches right now"));

/**
 * Human summary of a finished scan
 */
export function formatScanStats(stats: ScanStats | null): string {
  if (!stats) return "No scan has finished yet";
  if (stats.skipped) return "Last scan skipped - no Resy API key configured";

  return [
    `Watches scanned: ${stats.watchesScanned}`,
    `Errors: ${stats.watchErrors}`,
    `New slots: ${stats.newSlots}`,
    `Snipe attempts: ${stats.snipeAttempts}`,
    `Bookings: ${stats.bookings}`,
    `Duration: ${(stats.elapsedMs / 1000).toFixed(1)}s`,
  ].join("\n");
}

export async function handleMonitor(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const { monitor } = context;
    const subcommand = interaction.options.getSubcommand();
    const embed = new EmbedBuilder().setTimestamp();

    switch (subcommand) {
      case "start":
        await monitor.start();
        embed.setTitle("Monitor Started").setColor(COLORS.success);
        break;
      case "stop":
        await monitor.stop();
        embed
          .setTitle("Monitor Stopped")
          .setDescription("A scan already in progress will finish")
          .setColor(COLORS.info);
        break;
      case "check":
        // Runs on its own; the reply doesn't wait for it
        void monitor.triggerImmediateScan();
        embed
          .setTitle("Check Triggered")
          .setDescription("Results will show up in /activity")
          .setColor(COLORS.info);
        break;
      default: {
        const stats = monitor.getStats();
        const watches = await context.stores.watches.listActive();
        embed
          .setTitle("Monitor Status")
          .setColor(stats.state === "RUNNING" ? COLORS.success : COLORS.warning)
          .addFields(
            { name: "State", value: stats.state, inline: true },
            { name: "Active Watches", value: String(watches.length), inline: true },
            { name: "Cycles", value: String(stats.cyclesCompleted), inline: true },
            { name: "Last Scan", value: formatScanStats(stats.lastScan) }
          )
          .setFooter({ text: `Uptime: ${formatUptime()}` });
      }
    }

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Error")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}

function formatUptime(): string {
  const uptimeSeconds = process.uptime();
  const hours = Math.floor(uptimeSeconds / 3600);
  const minutes = Math.floor((uptimeSeconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}
