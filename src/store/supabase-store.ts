/**
 * Supabase-backed stores
 *
 * Every operation is a single statement, so each is atomic on its own.
 * Found-slot deduplication relies on the partial unique index
 * found_slots_unbooked_key (watch_id, date, time) WHERE NOT booked:
 * a losing concurrent insert gets 23505 and resolves to null.
 */
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  ACTIVITY_KINDS,
  type ActivityEvent,
  type ActivityKind,
  type FoundSlot,
  type NewFoundSlot,
  type NewWatch,
  type Watch,
  type WatchUpdate,
} from "../db/schema";
import type {
  ActivityLog,
  SettingsStore,
  SlotStore,
  Stores,
  WatchStore,
} from "./types";

const UNIQUE_VIOLATION = "23505";
const DEFAULT_ACTIVITY_LIMIT = 100;
const DEFAULT_FOUND_LIMIT = 50;

// ============ Row Schemas ============

const WatchRowSchema = z.object({
  id: z.number(),
  venue_id: z.string(),
  venue_name: z.string().nullable().transform((v) => v ?? ""),
  party_size: z.number().int(),
  date_start: z.string(),
  date_end: z.string().nullable(),
  time_earliest: z.string().nullable(),
  time_latest: z.string().nullable(),
  snipe_mode: z.boolean(),
  active: z.boolean(),
  created_at: z.coerce.date(),
  last_checked: z.coerce.date().nullable(),
});

const FoundSlotRowSchema = z.object({
  id: z.number(),
  watch_id: z.number(),
  venue_name: z.string().nullable().transform((v) => v ?? ""),
  date: z.string(),
  time: z.string(),
  party_size: z.number().int(),
  config_token: z.string().nullable().transform((v) => v ?? ""),
  booked: z.boolean(),
  seen_at: z.coerce.date(),
  snipe_attempts: z.number().int(),
  last_snipe_at: z.coerce.date().nullable(),
});

const ActivityRowSchema = z.object({
  id: z.number(),
  watch_id: z.number().nullable(),
  kind: z.enum(ACTIVITY_KINDS),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).nullable(),
  created_at: z.coerce.date(),
});

const SettingRowSchema = z.object({
  key: z.string(),
  value: z.string().nullable(),
});

function toWatch(row: unknown): Watch {
  return WatchRowSchema.parse(row);
}

function toFoundSlot(row: unknown): FoundSlot {
  return FoundSlotRowSchema.parse(row);
}

function toActivity(row: unknown): ActivityEvent {
  return ActivityRowSchema.parse(row);
}

function fail(operation: string, message: string): never {
  throw new Error(`Failed to ${operation}: ${message}`);
}

// ============ Watches ============

export class SupabaseWatchStore implements WatchStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async listActive(): Promise<Watch[]> {
    const { data, error } = await this.supabase
      .from("watches")
      .select("*")
      .eq("active", true)
      .order("id", { ascending: true });

    if (error) fail("load active watches", error.message);
    return (data ?? []).map(toWatch);
  }

  async listAll(): Promise<Watch[]> {
    const { data, error } = await this.supabase
      .from("watches")
      .select("*")
      .order("created_at", { ascending: false });

    if (error) fail("load watches", error.message);
    return (data ?? []).map(toWatch);
  }

  async getById(id: number): Promise<Watch | undefined> {
    const { data, error } = await this.supabase
      .from("watches")
      .select("*")
      .eq("id", id)
      .maybeSingle();

    if (error) fail("load watch", error.message);
    return data ? toWatch(data) : undefined;
  }

  async create(watch: NewWatch): Promise<Watch> {
    const { data, error } = await this.supabase
      .from("watches")
      .insert(watch)
      .select()
      .single();

    if (error) fail("insert watch", error.message);
    return toWatch(data);
  }

  async update(id: number, changes: WatchUpdate): Promise<Watch | undefined> {
    const { data, error } = await this.supabase
      .from("watches")
      .update(changes)
      .eq("id", id)
      .select()
      .maybeSingle();

    if (error) fail("update watch", error.message);
    return data ? toWatch(data) : undefined;
  }

  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.supabase
      .from("watches")
      .delete()
      .eq("id", id)
      .select("id");

    if (error) fail("delete watch", error.message);
    return (data ?? []).length > 0;
  }

  async updateLastChecked(id: number, at: Date): Promise<void> {
    const { error } = await this.supabase
      .from("watches")
      .update({ last_checked: at.toISOString() })
      .eq("id", id);

    if (error) fail("update last_checked", error.message);
  }
}

// ============ Found Slots ============

export class SupabaseSlotStore implements SlotStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async findUnbooked(watchId: number, date: string, time: string): Promise<FoundSlot | undefined> {
    const { data, error } = await this.supabase
      .from("found_slots")
      .select("*")
      .eq("watch_id", watchId)
      .eq("date", date)
      .eq("time", time)
      .eq("booked", false)
      .maybeSingle();

    if (error) fail("look up found slot", error.message);
    return data ? toFoundSlot(data) : undefined;
  }

  async existsUnbooked(watchId: number, date: string, time: string): Promise<boolean> {
    return (await this.findUnbooked(watchId, date, time)) !== undefined;
  }

  async insert(slot: NewFoundSlot): Promise<FoundSlot | null> {
    const { data, error } = await this.supabase
      .from("found_slots")
      .insert(slot)
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) return null;
      fail("insert found slot", error.message);
    }
    return toFoundSlot(data);
  }

  async markBooked(watchId: number, date: string, time: string): Promise<number> {
    const { data, error } = await this.supabase
      .from("found_slots")
      .update({ booked: true })
      .eq("watch_id", watchId)
      .eq("date", date)
      .eq("time", time)
      .eq("booked", false)
      .select("id");

    if (error) fail("mark slot booked", error.message);
    return (data ?? []).length;
  }

  async recordSnipeAttempt(id: number, at: Date): Promise<FoundSlot | undefined> {
    const { data, error } = await this.supabase.rpc("record_snipe_attempt", {
      slot_id: id,
      attempted_at: at.toISOString(),
    });

    if (error) fail("record snipe attempt", error.message);
    const rows: unknown[] = Array.isArray(data) ? data : data ? [data] : [];
    return rows.length > 0 ? toFoundSlot(rows[0]) : undefined;
  }

  async listRecent(limit = DEFAULT_FOUND_LIMIT): Promise<FoundSlot[]> {
    const { data, error } = await this.supabase
      .from("found_slots")
      .select("*")
      .order("seen_at", { ascending: false })
      .limit(limit);

    if (error) fail("load found slots", error.message);
    return (data ?? []).map(toFoundSlot);
  }
}

// ============ Activity ============

export class SupabaseActivityLog implements ActivityLog {
  constructor(private readonly supabase: SupabaseClient) {}

  async append(
    watchId: number | null,
    kind: ActivityKind,
    message: string,
    details?: Record<string, unknown>
  ): Promise<ActivityEvent> {
    const { data, error } = await this.supabase
      .from("activity")
      .insert({ watch_id: watchId, kind, message, details: details ?? null })
      .select()
      .single();

    if (error) fail("append activity", error.message);
    return toActivity(data);
  }

  async listRecent(limit = DEFAULT_ACTIVITY_LIMIT): Promise<ActivityEvent[]> {
    const { data, error } = await this.supabase
      .from("activity")
      .select("*")
      .order("created_at", { ascending: false })
      .limit(limit);

    if (error) fail("load activity", error.message);
    return (data ?? []).map(toActivity);
  }

  async clear(): Promise<void> {
    const { error } = await this.supabase.from("activity").delete().gte("id", 0);
    if (error) fail("clear activity", error.message);
  }
}

// ============ Settings ============

export class SupabaseSettingsStore implements SettingsStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async get(key: string): Promise<string | undefined> {
    const { data, error } = await this.supabase
      .from("settings")
      .select("key, value")
      .eq("key", key)
      .maybeSingle();

    if (error) fail("load setting", error.message);
    if (!data) return undefined;
    return SettingRowSchema.parse(data).value ?? undefined;
  }

  async getAll(): Promise<Record<string, string>> {
    const { data, error } = await this.supabase.from("settings").select("key, value");

    if (error) fail("load settings", error.message);

    const settings: Record<string, string> = {};
    for (const row of data ?? []) {
      const { key, value } = SettingRowSchema.parse(row);
      if (value !== null) settings[key] = value;
    }
    return settings;
  }

  async set(key: string, value: string): Promise<void> {
    const { error } = await this.supabase
      .from("settings")
      .upsert({ key, value }, { onConflict: "key" });

    if (error) fail("save setting", error.message);
  }
}

/**
 * All stores over one Supabase client
 */
export function createSupabaseStores(supabase: SupabaseClient): Stores {
  return {
    watches: new SupabaseWatchStore(supabase),
    slots: new SupabaseSlotStore(supabase),
    activity: new SupabaseActivityLog(supabase),
    settings: new SupabaseSettingsStore(supabase),
  };
}
