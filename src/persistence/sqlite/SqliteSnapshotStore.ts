import type Database from 'better-sqlite3';
import { ISnapshotStore, StateSnapshot } from '../interfaces';

export class SqliteSnapshotStore implements ISnapshotStore {
  private stmtSave;
  private stmtLatest;

  constructor(db: Database.Database) {
    this.stmtSave = db.prepare(`
      INSERT INTO snapshots (sequence_number, state_hash, last_event_hash, staker_count, state_json, created_at)
      VALUES (@sequenceNumber, @stateHash, @lastEventHash, @stakerCount, @stateJson, @createdAt)
    `);
    this.stmtLatest = db.prepare(
      'SELECT * FROM snapshots ORDER BY id DESC LIMIT 1'
    );
  }

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    this.stmtSave.run({
      sequenceNumber: snapshot.sequenceNumber,
      stateHash: snapshot.stateHash,
      lastEventHash: snapshot.lastEventHash,
      stakerCount: snapshot.stakerCount,
      stateJson: snapshot.stateJson,
      createdAt: snapshot.createdAt,
    });
  }

  async loadLatestSnapshot(): Promise<StateSnapshot | undefined> {
    const row = this.stmtLatest.get() as SnapshotRow | undefined;
    return row ? rowToSnapshot(row) : undefined;
  }
}

interface SnapshotRow {
  id: number;
  sequence_number: number;
  state_hash: string;
  last_event_hash: string;
  staker_count: number;
  state_json: string;
  created_at: string;
}

function rowToSnapshot(row: SnapshotRow): StateSnapshot {
  return {
    sequenceNumber: row.sequence_number,
    stateHash: row.state_hash,
    lastEventHash: row.last_event_hash,
    stakerCount: row.staker_count,
    stateJson: row.state_json,
    createdAt: row.created_at,
  };
}
