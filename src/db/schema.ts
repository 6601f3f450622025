/**
 * Database schema type definitions
 * These types match the Supabase PostgreSQL tables (see scripts/migrate-supabase.ts)
 */

/**
 * A standing request to watch one venue over a date range
 */
export interface Watch {
  id: number;
  venue_id: string;
  venue_name: string;
  party_size: number;
  date_start: string;          // YYYY-MM-DD
  date_end: string | null;     // YYYY-MM-DD, null = same as date_start
  time_earliest: string | null; // HH:mm
  time_latest: string | null;   // HH:mm
  snipe_mode: boolean;
  active: boolean;
  created_at: Date;
  last_checked: Date | null;
}

export type NewWatch = Omit<Watch, "id" | "created_at" | "last_checked">;

/**
 * Fields the operator may change after creation
 */
export type WatchUpdate = Partial<
  Pick<
    Watch,
    | "active"
    | "snipe_mode"
    | "party_size"
    | "date_start"
    | "date_end"
    | "time_earliest"
    | "time_latest"
  >
>;

/**
 * A slot sighting. At most one unbooked row per (watch_id, date, time).
 */
export interface FoundSlot {
  id: number;
  watch_id: number;
  venue_name: string;
  date: string;         // YYYY-MM-DD
  time: string;         // raw start from the API, e.g. "2024-06-01 19:00:00"
  party_size: number;
  config_token: string;
  booked: boolean;
  seen_at: Date;
  snipe_attempts: number;
  last_snipe_at: Date | null;
}

export type NewFoundSlot = Omit<
  FoundSlot,
  "id" | "booked" | "seen_at" | "snipe_attempts" | "last_snipe_at"
>;

export const ACTIVITY_KINDS = [
  "system",
  "error",
  "found",
  "snipe",
  "booked",
  "watch",
] as const;

export type ActivityKind = (typeof ACTIVITY_KINDS)[number];

/**
 * Append-only activity feed entry
 */
export interface ActivityEvent {
  id: number;
  watch_id: number | null;
  kind: ActivityKind;
  message: string;
  details: Record<string, unknown> | null;
  created_at: Date;
}

/**
 * Keys the settings table is known to hold
 */
export const SETTING_KEYS = ["api_key", "auth_token", "payment_method_id"] as const;
