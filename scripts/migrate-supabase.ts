/**
 * Supabase Migration Script
 *
 * This script outputs SQL to run in the Supabase SQL Editor.
 *
 * Run with: npm run db:schema
 * Then copy the output and run it in:
 * https://supabase.com/dashboard/project/YOUR_PROJECT/sql/new
 */

const SCHEMA = `
-- ============================================
-- Table Sniper Database Schema
-- Run this in Supabase SQL Editor
-- ============================================

-- Venues being watched for openings
CREATE TABLE IF NOT EXISTS watches (
  id SERIAL PRIMARY KEY,
  venue_id TEXT NOT NULL,
  venue_name TEXT NOT NULL DEFAULT '',
  party_size INTEGER NOT NULL DEFAULT 2,
  date_start TEXT NOT NULL,
  date_end TEXT,
  time_earliest TEXT,
  time_latest TEXT,
  snipe_mode BOOLEAN NOT NULL DEFAULT false,
  active BOOLEAN NOT NULL DEFAULT true,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  last_checked TIMESTAMPTZ
);

-- Slot sightings; time is the raw start timestamp from Resy
CREATE TABLE IF NOT EXISTS found_slots (
  id SERIAL PRIMARY KEY,
  watch_id INTEGER NOT NULL REFERENCES watches(id) ON DELETE CASCADE,
  venue_name TEXT NOT NULL DEFAULT '',
  date TEXT NOT NULL,
  time TEXT NOT NULL,
  party_size INTEGER NOT NULL,
  config_token TEXT NOT NULL DEFAULT '',
  booked BOOLEAN NOT NULL DEFAULT false,
  seen_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  snipe_attempts INTEGER NOT NULL DEFAULT 0,
  last_snipe_at TIMESTAMPTZ
);

-- At most one unbooked sighting per watch/date/time
CREATE UNIQUE INDEX IF NOT EXISTS found_slots_unbooked_key
  ON found_slots(watch_id, date, time)
  WHERE NOT booked;

-- Append-only activity feed
CREATE TABLE IF NOT EXISTS activity (
  id SERIAL PRIMARY KEY,
  watch_id INTEGER,
  kind TEXT NOT NULL CHECK (kind IN ('system', 'error', 'found', 'snipe', 'booked', 'watch')),
  message TEXT NOT NULL,
  details JSONB,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- Key-value settings (api_key, auth_token, payment_method_id)
CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT
);

-- Create indexes for common queries
CREATE INDEX IF NOT EXISTS idx_watches_active ON watches(active);
CREATE INDEX IF NOT EXISTS idx_found_slots_seen_at ON found_slots(seen_at DESC);
CREATE INDEX IF NOT EXISTS idx_activity_created_at ON activity(created_at DESC);

-- Bump the attempt counter in one statement and hand back the row
CREATE OR REPLACE FUNCTION record_snipe_attempt(slot_id INTEGER, attempted_at TIMESTAMPTZ)
RETURNS SETOF found_slots AS $$
  UPDATE found_slots
     SET snipe_attempts = snipe_attempts + 1,
         last_snipe_at = attempted_at
   WHERE id = slot_id
  RETURNING *;
$$ LANGUAGE sql;

-- ============================================
-- Schema migration complete!
-- ============================================
`;

console.log("=".repeat(60));
console.log("SUPABASE MIGRATION SQL");
console.log("=".repeat(60));
console.log("\nCopy the SQL below and run it in Supabase SQL Editor:");
console.log("https://supabase.com/dashboard/project/YOUR_PROJECT/sql/new\n");
console.log("=".repeat(60));
console.log(SCHEMA);
console.log("=".repeat(60));
