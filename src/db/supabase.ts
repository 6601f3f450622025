/**
 * Supabase client using @supabase/supabase-js
 */
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { componentLogger } from "../logger";

const logger = componentLogger("supabase");

let supabase: SupabaseClient | null = null;

/**
 * Initialize the Supabase client
 */
export function initializeSupabase(url?: string, key?: string): SupabaseClient {
  if (supabase) return supabase;

  if (!url) {
    throw new Error("SUPABASE_URL environment variable is required");
  }
  if (!key) {
    throw new Error("SUPABASE_SERVICE_ROLE_KEY environment variable is required");
  }

  supabase = createClient(url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  logger.info("Supabase client initialized");
  return supabase;
}

/**
 * Close the connection (no-op for Supabase JS client, but keeps interface consistent)
 */
export async function closeSupabase(): Promise<void> {
  if (supabase) {
    supabase = null;
    logger.info("Supabase client closed");
  }
}
