/**
 * Typed view over the key-value settings table
 */
import type { SettingsStore } from "../store";

/**
 * Credentials the monitor reads at the start of every cycle.
 * Absent fields are undefined; empty strings count as absent.
 */
export interface MonitorSettings {
  apiKey?: string;
  authToken?: string;
  paymentMethodId?: number;
}

export type SettingsProvider = () => Promise<MonitorSettings>;

function present(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value.trim() : undefined;
}

function parsePaymentMethodId(value: string | undefined): number | undefined {
  const raw = present(value);
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  return Number(raw);
}

/**
 * Settings table values win over the environment fallbacks
 */
export async function loadMonitorSettings(
  store: SettingsStore,
  fallback: Record<string, string | undefined> = {}
): Promise<MonitorSettings> {
  const stored = await store.getAll();
  const pick = (key: string) => present(stored[key]) ?? present(fallback[key]);

  return {
    apiKey: pick("api_key"),
    authToken: pick("auth_token"),
    paymentMethodId: parsePaymentMethodId(pick("payment_method_id")),
  };
}

/**
 * Settings provider bound to a store
 */
export function createSettingsProvider(
  store: SettingsStore,
  fallback: Record<string, string | undefined> = {}
): SettingsProvider {
  return () => loadMonitorSettings(store, fallback);
}

/**
 * Mask a secret for display: first 8 + "..." + last 4, or "***" when short
 */
export function maskSecret(value: string): string {
  if (!value) return value;
  return value.length > 12 ? `${value.slice(0, 8)}...${value.slice(-4)}` : "***";
}

const SECRET_KEYS = new Set(["api_key", "auth_token"]);

/**
 * All settings with secrets masked
 */
export function maskSettings(settings: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(settings)) {
    masked[key] = SECRET_KEYS.has(key) ? maskSecret(value) : value;
  }
  return masked;
}
