/**
 * Table Sniper - Entry Point
 *
 * Watches Resy venues for openings on a fixed cadence and optionally books
 * them. Storage is Supabase (or in-memory); the operator surface is a
 * Discord bot.
 */
import { config, validateConfig } from "./config";
import { closeSupabase } from "./db/supabase";
import { createStores } from "./store";
import {
  createMonitorServices,
  loadMonitorSettings,
} from "./services";
import { ResyClient } from "./sdk";
import { DiscordBot } from "./discord/bot";
import { DiscordNotifier } from "./discord/notifications";
import type { CommandContext } from "./discord/context";
import { logger } from "./logger";
import { errorMessage } from "./errors";

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info("Starting Table Sniper...");

  // Validate configuration
  validateConfig();

  const stores = createStores(config);
  logger.info({ driver: config.STORE_DRIVER }, "Storage initialized");

  const settingsFallback = {
    api_key: config.RESY_API_KEY,
    auth_token: config.RESY_AUTH_TOKEN,
    payment_method_id: config.RESY_PAYMENT_METHOD_ID,
  };

  // Bound once the bot is logged in
  let notifier: DiscordNotifier | null = null;

  const { monitor } = createMonitorServices({
    stores,
    settingsFallback,
    intervalMs: config.MONITOR_INTERVAL_MS,
    dayPauseMs: config.DAY_PAUSE_MS,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    retry: {
      policy: config.SNIPE_RETRY_POLICY,
      baseDelayMs: config.SNIPE_RETRY_BASE_MS,
      maxDelayMs: config.SNIPE_RETRY_MAX_MS,
    },
    onSlotFound: async (event) => {
      await notifier?.notifySlotFound(event);
    },
    onBooked: async (booked) => {
      await notifier?.notifyBooked(booked);
    },
  });

  let discordBot: DiscordBot | null = null;
  if (config.DISCORD_BOT_TOKEN && config.DISCORD_CLIENT_ID) {
    const context: CommandContext = {
      stores,
      monitor,
      resyClient: async () => {
        const settings = await loadMonitorSettings(stores.settings, settingsFallback);
        if (!settings.apiKey) return null;
        return new ResyClient({
          apiKey: settings.apiKey,
          authToken: settings.authToken,
          timeoutMs: config.REQUEST_TIMEOUT_MS,
        });
      },
    };

    discordBot = new DiscordBot({
      token: config.DISCORD_BOT_TOKEN,
      clientId: config.DISCORD_CLIENT_ID,
      adminId: config.DISCORD_ADMIN_ID,
      context,
    });
    await discordBot.start();

    if (config.DISCORD_ADMIN_ID) {
      notifier = new DiscordNotifier(discordBot.getClient(), config.DISCORD_ADMIN_ID);
    }
  } else {
    logger.warn("Discord not configured - running headless");
  }

  if (config.AUTO_START) {
    await monitor.start();
  }

  logger.info(
    {
      driver: config.STORE_DRIVER,
      intervalMs: config.MONITOR_INTERVAL_MS,
      retryPolicy: config.SNIPE_RETRY_POLICY,
      autoStart: config.AUTO_START,
      discord: discordBot !== null,
    },
    "Table Sniper started successfully"
  );

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    await monitor.stop();
    await monitor.whenIdle();
    await discordBot?.stop();
    await closeSupabase();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, "Fatal error starting sniper");
  process.exit(1);
});
