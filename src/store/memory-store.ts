/**
 * In-memory store
 *
 * Map-backed implementation of every store interface. Used with
 * STORE_DRIVER=memory for local runs without Supabase, and as the storage
 * stand-in in tests. Each operation completes synchronously inside its
 * promise, so check-and-insert on found slots is atomic.
 */
import type {
  ActivityEvent,
  ActivityKind,
  FoundSlot,
  NewFoundSlot,
  NewWatch,
  Watch,
  WatchUpdate,
} from "../db/schema";
import type {
  ActivityLog,
  SettingsStore,
  SlotStore,
  Stores,
  WatchStore,
} from "./types";

const DEFAULT_ACTIVITY_LIMIT = 100;
const DEFAULT_FOUND_LIMIT = 50;

function byNewest<T extends { id: number }>(a: T, b: T): number {
  return b.id - a.id;
}

export class MemoryWatchStore implements WatchStore {
  private watches = new Map<number, Watch>();
  private nextId = 1;

  async listActive(): Promise<Watch[]> {
    return Array.from(this.watches.values()).filter((w) => w.active);
  }

  async listAll(): Promise<Watch[]> {
    return Array.from(this.watches.values()).sort(byNewest);
  }

  async getById(id: number): Promise<Watch | undefined> {
    return this.watches.get(id);
  }

  async create(data: NewWatch): Promise<Watch> {
    const watch: Watch = {
      ...data,
      id: this.nextId++,
      created_at: new Date(),
      last_checked: null,
    };
    this.watches.set(watch.id, watch);
    return watch;
  }

  async update(id: number, changes: WatchUpdate): Promise<Watch | undefined> {
    const existing = this.watches.get(id);
    if (!existing) return undefined;

    const updated: Watch = { ...existing, ...changes };
    this.watches.set(id, updated);
    return updated;
  }

  async delete(id: number): Promise<boolean> {
    return this.watches.delete(id);
  }

  async updateLastChecked(id: number, at: Date): Promise<void> {
    const existing = this.watches.get(id);
    if (existing) {
      this.watches.set(id, { ...existing, last_checked: at });
    }
  }
}

export class MemorySlotStore implements SlotStore {
  private slots = new Map<number, FoundSlot>();
  private nextId = 1;

  private findUnbookedSync(watchId: number, date: string, time: string): FoundSlot | undefined {
    for (const slot of this.slots.values()) {
      if (slot.watch_id === watchId && slot.date === date && slot.time === time && !slot.booked) {
        return slot;
      }
    }
    return undefined;
  }

  async findUnbooked(watchId: number, date: string, time: string): Promise<FoundSlot | undefined> {
    return this.findUnbookedSync(watchId, date, time);
  }

  async existsUnbooked(watchId: number, date: string, time: string): Promise<boolean> {
    return this.findUnbookedSync(watchId, date, time) !== undefined;
  }

  async insert(data: NewFoundSlot): Promise<FoundSlot | null> {
    // Same rule as the partial unique index in Supabase
    if (this.findUnbookedSync(data.watch_id, data.date, data.time)) {
      return null;
    }

    const slot: FoundSlot = {
      ...data,
      id: this.nextId++,
      booked: false,
      seen_at: new Date(),
      snipe_attempts: 0,
      last_snipe_at: null,
    };
    this.slots.set(slot.id, slot);
    return slot;
  }

  async markBooked(watchId: number, date: string, time: string): Promise<number> {
    let marked = 0;
    for (const slot of this.slots.values()) {
      if (slot.watch_id === watchId && slot.date === date && slot.time === time && !slot.booked) {
        this.slots.set(slot.id, { ...slot, booked: true });
        marked++;
      }
    }
    return marked;
  }

  async recordSnipeAttempt(id: number, at: Date): Promise<FoundSlot | undefined> {
    const existing = this.slots.get(id);
    if (!existing) return undefined;

    const updated: FoundSlot = {
      ...existing,
      snipe_attempts: existing.snipe_attempts + 1,
      last_snipe_at: at,
    };
    this.slots.set(id, updated);
    return updated;
  }

  async listRecent(limit = DEFAULT_FOUND_LIMIT): Promise<FoundSlot[]> {
    return Array.from(this.slots.values()).sort(byNewest).slice(0, limit);
  }
}

export class MemoryActivityLog implements ActivityLog {
  private events: ActivityEvent[] = [];
  private nextId = 1;

  async append(
    watchId: number | null,
    kind: ActivityKind,
    message: string,
    details?: Record<string, unknown>
  ): Promise<ActivityEvent> {
    const event: ActivityEvent = {
      id: this.nextId++,
      watch_id: watchId,
      kind,
      message,
      details: details ?? null,
      created_at: new Date(),
    };
    this.events.push(event);
    return event;
  }

  async listRecent(limit = DEFAULT_ACTIVITY_LIMIT): Promise<ActivityEvent[]> {
    return [...this.events].sort(byNewest).slice(0, limit);
  }

  async clear(): Promise<void> {
    this.events = [];
  }
}

export class MemorySettingsStore implements SettingsStore {
  private values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async getAll(): Promise<Record<string, string>> {
    return Object.fromEntries(this.values);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}

/**
 * Fresh set of in-memory stores
 */
export function createMemoryStores(settings: Record<string, string> = {}): Stores {
  return {
    watches: new MemoryWatchStore(),
    slots: new MemorySlotStore(),
    activity: new MemoryActivityLog(),
    settings: new MemorySettingsStore(settings),
  };
}
