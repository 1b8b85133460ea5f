import type Database from 'better-sqlite3';
import { DomainEvent, DomainEventType, isDomainEventType } from '../eventTypes';
import { IEventStore } from '../interfaces';

export class SqliteEventStore implements IEventStore {
  private stmtInsert;
  private stmtAll;
  private stmtByActor;
  private stmtByType;
  private stmtLast;

  constructor(private db: Database.Database) {
    this.stmtInsert = db.prepare(`
      INSERT INTO events (sequence_number, event_id, timestamp, event_type, actor_id, payload, prev_event_hash, event_hash)
      VALUES (@sequenceNumber, @eventId, @timestamp, @eventType, @actorId, @payload, @prevEventHash, @eventHash)
    `);
    this.stmtAll = db.prepare(
      'SELECT * FROM events ORDER BY sequence_number ASC'
    );
    this.stmtByActor = db.prepare(
      'SELECT * FROM events WHERE actor_id = ? ORDER BY sequence_number ASC'
    );
    this.stmtByType = db.prepare(
      'SELECT * FROM events WHERE event_type = ? ORDER BY sequence_number ASC'
    );
    this.stmtLast = db.prepare(
      'SELECT * FROM events ORDER BY sequence_number DESC LIMIT 1'
    );
  }

  async append(events: DomainEvent[]): Promise<void> {
    const insertMany = this.db.transaction((evts: DomainEvent[]) => {
      for (const e of evts) {
        this.stmtInsert.run({
          sequenceNumber: e.sequenceNumber,
          eventId: e.eventId,
          timestamp: e.timestamp,
          eventType: e.eventType,
          actorId: e.actorId ?? null,
          payload: JSON.stringify(e.payload),
          prevEventHash: e.prevEventHash,
          eventHash: e.eventHash,
        });
      }
    });
    insertMany(events);
  }

  async listAll(): Promise<DomainEvent[]> {
    const rows = this.stmtAll.all() as EventRow[];
    return rows.map(rowToEvent);
  }

  async queryByActor(actorId: string): Promise<DomainEvent[]> {
    const rows = this.stmtByActor.all(actorId) as EventRow[];
    return rows.map(rowToEvent);
  }

  async queryByType(eventType: DomainEventType): Promise<DomainEvent[]> {
    const rows = this.stmtByType.all(eventType) as EventRow[];
    return rows.map(rowToEvent);
  }

  async getLastEvent(): Promise<DomainEvent | undefined> {
    const row = this.stmtLast.get() as EventRow | undefined;
    return row ? rowToEvent(row) : undefined;
  }
}

interface EventRow {
  sequence_number: number;
  event_id: string;
  timestamp: string;
  event_type: string;
  actor_id: string | null;
  payload: string;
  prev_event_hash: string;
  event_hash: string;
}

function rowToEvent(row: EventRow): DomainEvent {
  if (!isDomainEventType(row.event_type)) {
    throw new Error(`Unknown event type in journal: ${row.event_type}`);
  }
  return {
    eventId: row.event_id,
    sequenceNumber: row.sequence_number,
    timestamp: row.timestamp,
    eventType: row.event_type,
    actorId: row.actor_id ?? undefined,
    payload: JSON.parse(row.payload) as Record<string, unknown>,
    prevEventHash: row.prev_event_hash,
    eventHash: row.event_hash,
  };
}
