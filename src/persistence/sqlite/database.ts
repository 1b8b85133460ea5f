/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- events (IEventStore)
CREATE TABLE IF NOT EXISTS events (
  sequence_number  INTEGER PRIMARY KEY,
  event_id         TEXT NOT NULL UNIQUE,
  timestamp        TEXT NOT NULL,
  event_type       TEXT NOT NULL,
  actor_id         TEXT,
  payload          TEXT NOT NULL,
  prev_event_hash  TEXT NOT NULL,
  event_hash       TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_actor ON events(actor_id, sequence_number);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type, sequence_number);

-- snapshots (ISnapshotStore - full engine state JSON)
CREATE TABLE IF NOT EXISTS snapshots (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  sequence_number  INTEGER NOT NULL,
  state_hash       TEXT NOT NULL,
  last_event_hash  TEXT NOT NULL,
  staker_count     INTEGER NOT NULL,
  state_json       TEXT NOT NULL,
  created_at       TEXT NOT NULL
);

-- account_keys (IAccountKeyStore)
CREATE TABLE IF NOT EXISTS account_keys (
  account_id       TEXT PRIMARY KEY,
  key_hash         TEXT NOT NULL
);
`;

/**
 * Open (or create) the database. Pass ':memory:' for a throwaway instance.
 */
export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'staking.db');

  if (resolvedPath !== ':memory:') {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  // WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');

  db.exec(SCHEMA_SQL);

  return db;
}
