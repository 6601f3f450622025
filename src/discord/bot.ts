/**
 * Discord Bot
 * Operator surface: watches, monitor control, search, activity, settings
 */
import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  REST,
  Routes,
  type Interaction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import { componentLogger } from "../logger";
import { errorMessage } from "../errors";
import type { CommandContext, CommandHandler } from "./context";

// Import commands
import { watchCommand, handleWatch } from "./commands/watch";
import { monitorCommand, handleMonitor } from "./commands/monitor";
import { searchCommand, handleSearch } from "./commands/search";
import {
  activityCommand,
  foundCommand,
  handleActivity,
  handleFound,
} from "./commands/activity";
import { settingsCommand, handleSettings } from "./commands/settings";

const logger = componentLogger("discord");

/**
 * All slash commands
 */
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  watchCommand.toJSON(),
  monitorCommand.toJSON(),
  searchCommand.toJSON(),
  activityCommand.toJSON(),
  foundCommand.toJSON(),
  settingsCommand.toJSON(),
];

/**
 * Command handlers map
 */
export const commandHandlers: Record<string, CommandHandler> = {
  watch: handleWatch,
  monitor: handleMonitor,
  search: handleSearch,
  activity: handleActivity,
  found: handleFound,
  settings: handleSettings,
};

export interface DiscordBotConfig {
  token: string;
  clientId: string;
  context: CommandContext;
  /** When set, only this user may run commands */
  adminId?: string;
}

/**
 * Discord bot class
 */
export class DiscordBot {
  private client: Client;
  private token: string;
  private clientId: string;
  private context: CommandContext;
  private adminId?: string;

  constructor(config: DiscordBotConfig) {
    this.token = config.token;
    this.clientId = config.clientId;
    this.context = config.context;
    this.adminId = config.adminId;

    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.DirectMessages],
    });

    this.setupEventHandlers();
  }

  /**
   * Set up event handlers
   */
  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, () => {
      logger.info({ username: this.client.user?.tag }, "Discord bot is ready");
    });

    this.client.on(Events.InteractionCreate, (interaction: Interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Failed to answer interaction");
      });
    });

    this.client.on(Events.Error, (error) => {
      logger.error({ error: String(error) }, "Discord client error");
    });
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    if (this.adminId && interaction.user.id !== this.adminId) {
      await interaction.reply({
        content: "You are not allowed to use this bot.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    const handler = commandHandlers[interaction.commandName];
    if (!handler) {
      logger.warn({ command: interaction.commandName }, "Unknown command received");
      return;
    }

    try {
      await handler(interaction, this.context);
    } catch (error) {
      logger.error(
        { command: interaction.commandName, error: errorMessage(error) },
        "Error handling command"
      );

      const content = "An error occurred while processing your command.";
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content, flags: MessageFlags.Ephemeral });
      }
    }
  }

  /**
   * Register slash commands with Discord
   */
  async registerCommands(): Promise<void> {
    const rest = new REST().setToken(this.token);

    try {
      logger.info({ commandCount: commands.length }, "Registering slash commands...");

      await rest.put(Routes.applicationCommands(this.clientId), {
        body: commands,
      });

      logger.info("Slash commands registered successfully");
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Failed to register commands");
      throw error;
    }
  }

  /**
   * Start the bot
   */
  async start(): Promise<void> {
    await this.registerCommands();
    await this.client.login(this.token);
    logger.info("Discord bot started");
  }

  /**
   * Stop the bot
   */
  async stop(): Promise<void> {
    await this.client.destroy();
    logger.info("Discord bot stopped");
  }

  /**
   * Get the Discord client (for notifications)
   */
  getClient(): Client {
    return this.client;
  }
}
