export { openDatabase } from './database';
export { SqliteEventStore } from './SqliteEventStore';
export { SqliteSnapshotStore } from './SqliteSnapshotStore';
export { SqliteAccountKeyStore } from './SqliteAccountKeyStore';

import type Database from 'better-sqlite3';
import { openDatabase } from './database';
import { SqliteEventStore } from './SqliteEventStore';
import { SqliteSnapshotStore } from './SqliteSnapshotStore';
import { SqliteAccountKeyStore } from './SqliteAccountKeyStore';

export interface SqliteStores {
  db: Database.Database;
  event: SqliteEventStore;
  snapshot: SqliteSnapshotStore;
  accountKey: SqliteAccountKeyStore;
}

export function createSqliteStores(dbPath?: string): SqliteStores {
  const db = openDatabase(dbPath);
  return {
    db,
    event: new SqliteEventStore(db),
    snapshot: new SqliteSnapshotStore(db),
    accountKey: new SqliteAccountKeyStore(db),
  };
}
