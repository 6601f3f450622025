/**
 * Store wiring
 *
 * STORE_DRIVER=supabase persists to Postgres; STORE_DRIVER=memory keeps
 * everything in process and loses it on restart.
 */
import type { AppConfig } from "../config";
import { initializeSupabase } from "../db/supabase";
import { createMemoryStores } from "./memory-store";
import { createSupabaseStores } from "./supabase-store";
import type { Stores } from "./types";

export type {
  Stores,
  WatchStore,
  SlotStore,
  ActivityLog,
  SettingsStore,
} from "./types";
export { createMemoryStores } from "./memory-store";
export { createSupabaseStores } from "./supabase-store";

export function createStores(
  appConfig: Pick<AppConfig, "STORE_DRIVER" | "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY">
): Stores {
  if (appConfig.STORE_DRIVER === "memory") {
    return createMemoryStores();
  }

  const supabase = initializeSupabase(
    appConfig.SUPABASE_URL,
    appConfig.SUPABASE_SERVICE_ROLE_KEY
  );
  return createSupabaseStores(supabase);
}
