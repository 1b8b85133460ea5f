import type Database from 'better-sqlite3';
import { IAccountKeyStore } from '../interfaces';

interface AccountKeyRow {
  account_id: string;
  key_hash: string;
}

export class SqliteAccountKeyStore implements IAccountKeyStore {
  private stmtSave;
  private stmtAll;

  constructor(db: Database.Database) {
    this.stmtSave = db.prepare(
      'INSERT INTO account_keys (account_id, key_hash) VALUES (@accountId, @keyHash)'
    );
    this.stmtAll = db.prepare('SELECT account_id, key_hash FROM account_keys');
  }

  async saveAccountKey(accountId: string, keyHash: string): Promise<void> {
    this.stmtSave.run({ accountId, keyHash });
  }

  async loadAccountKeys(): Promise<Map<string, string>> {
    const rows = this.stmtAll.all() as AccountKeyRow[];
    return new Map(rows.map((row): [string, string] => [row.account_id, row.key_hash]));
  }
}
