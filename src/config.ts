import "dotenv/config";
import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((val) => val?.toLowerCase() === "true");

/**
 * "true"/"false" when set, undefined otherwise so callers can pick their own default
 */
const optionalFlag = z
  .string()
  .optional()
  .transform((val) => {
    const normalized = val?.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
    return undefined;
  });

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

export const SnipeRetryPolicySchema = z.enum(["once", "every_cycle", "backoff"]);
export type SnipeRetryPolicy = z.infer<typeof SnipeRetryPolicySchema>;

/**
 * Application configuration for Table Sniper
 */
export const AppConfigSchema = z.object({
  // Storage
  STORE_DRIVER: z
    .enum(["supabase", "memory"])
    .default("supabase")
    .describe("Where watches, found slots and activity are kept"),
  SUPABASE_URL: optionalString.describe("Supabase project URL"),
  SUPABASE_SERVICE_ROLE_KEY: optionalString.describe(
    "Supabase service role key (for server-side access)"
  ),

  // Resy credentials - fallbacks for the settings table
  RESY_API_KEY: optionalString,
  RESY_AUTH_TOKEN: optionalString,
  RESY_PAYMENT_METHOD_ID: optionalString,

  // Discord Bot
  DISCORD_BOT_TOKEN: optionalString.describe("Discord bot token"),
  DISCORD_CLIENT_ID: optionalString.describe("Discord application client ID"),
  DISCORD_ADMIN_ID: optionalString.describe(
    "Discord user ID that receives found/booked DMs"
  ),

  // Monitor
  MONITOR_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30_000)
    .describe("Milliseconds to wait between scan cycles"),
  DAY_PAUSE_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(1000)
    .describe("Milliseconds to pause between dates within one watch"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(15_000)
    .describe("Timeout for every Resy API call"),
  SNIPE_RETRY_POLICY: SnipeRetryPolicySchema.default("backoff").describe(
    "How already-recorded unbooked slots are re-sniped"
  ),
  SNIPE_RETRY_BASE_MS: z.coerce.number().int().positive().default(60_000),
  SNIPE_RETRY_MAX_MS: z.coerce.number().int().positive().default(30 * 60_000),
  AUTO_START: flag.describe("Start the monitor as soon as the process boots"),

  // Logging
  LOG_LEVEL: optionalString.describe("pino level; silent under Vitest when unset"),
  LOG_PRETTY: optionalFlag.describe("Force pretty output on or off; defaults to stdout being a TTY"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// Load and validate
export const config = AppConfigSchema.parse(process.env);

/**
 * Validate cross-field requirements zod can't express per field
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (appConfig.STORE_DRIVER === "supabase") {
    if (!appConfig.SUPABASE_URL) {
      throw new Error("SUPABASE_URL is required when STORE_DRIVER=supabase");
    }
    if (!appConfig.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error(
        "SUPABASE_SERVICE_ROLE_KEY is required when STORE_DRIVER=supabase"
      );
    }
  }
  if (Boolean(appConfig.DISCORD_BOT_TOKEN) !== Boolean(appConfig.DISCORD_CLIENT_ID)) {
    throw new Error("DISCORD_BOT_TOKEN and DISCORD_CLIENT_ID must be set together");
  }
}
