import type { ChatInputCommandInteraction } from "discord.js";
import type { ResyClient } from "../sdk";
import type { MonitorLoop } from "../services";
import type { Stores } from "../store";

/**
 * What slash command handlers can reach
 */
export interface CommandContext {
  stores: Stores;
  monitor: MonitorLoop;
  /** Resy client built from current settings; null without an API key */
  resyClient: () => Promise<ResyClient | null>;
}

export type CommandHandler = (
  interaction: ChatInputCommandInteraction,
  context: CommandContext
) => Promise<void>;

// Embed colors
export const COLORS = {
  success: 0x2ecc71,
  info: 0x3498db,
  warning: 0xf39c12,
  error: 0xe74c3c,
} as const;
