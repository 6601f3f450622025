import type {
  ActivityEvent,
  ActivityKind,
  FoundSlot,
  NewFoundSlot,
  NewWatch,
  Watch,
  WatchUpdate,
} from "../db/schema";

export interface WatchStore {
  listActive(): Promise<Watch[]>;
  listAll(): Promise<Watch[]>;
  getById(id: number): Promise<Watch | undefined>;
  create(data: NewWatch): Promise<Watch>;
  update(id: number, changes: WatchUpdate): Promise<Watch | undefined>;
  delete(id: number): Promise<boolean>;
  updateLastChecked(id: number, at: Date): Promise<void>;
}

export interface SlotStore {
  findUnbooked(watchId: number, date: string, time: string): Promise<FoundSlot | undefined>;
  existsUnbooked(watchId: number, date: string, time: string): Promise<boolean>;
  /**
   * Atomic check-and-insert. Resolves to null when an unbooked row for the
   * same (watch, date, time) already exists.
   */
  insert(slot: NewFoundSlot): Promise<FoundSlot | null>;
  /** Returns the number of rows marked */
  markBooked(watchId: number, date: string, time: string): Promise<number>;
  recordSnipeAttempt(id: number, at: Date): Promise<FoundSlot | undefined>;
  listRecent(limit?: number): Promise<FoundSlot[]>;
}

export interface ActivityLog {
  append(
    watchId: number | null,
    kind: ActivityKind,
    message: string,
    details?: Record<string, unknown>
  ): Promise<ActivityEvent>;
  listRecent(limit?: number): Promise<ActivityEvent[]>;
  clear(): Promise<void>;
}

export interface SettingsStore {
  get(key: string): Promise<string | undefined>;
  getAll(): Promise<Record<string, string>>;
  set(key: string, value: string): Promise<void>;
}

/**
 * Everything the app persists
 */
export interface Stores {
  watches: WatchStore;
  slots: SlotStore;
  activity: ActivityLog;
  settings: SettingsStore;
}
