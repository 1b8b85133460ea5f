import { DomainEvent, DomainEventType } from './eventTypes';
import { IAccountKeyStore, IEventStore, ISnapshotStore, StateSnapshot } from './interfaces';

export class InMemoryEventStore implements IEventStore {
  private events: DomainEvent[] = [];

  async append(events: DomainEvent[]): Promise<void> {
    this.events.push(...events);
  }

  async listAll(): Promise<DomainEvent[]> {
    return [...this.events];
  }

  async queryByActor(actorId: string): Promise<DomainEvent[]> {
    return this.events.filter(e => e.actorId === actorId);
  }

  async queryByType(eventType: DomainEventType): Promise<DomainEvent[]> {
    return this.events.filter(e => e.eventType === eventType);
  }

  async getLastEvent(): Promise<DomainEvent | undefined> {
    return this.events.length > 0 ? this.events[this.events.length - 1] : undefined;
  }

  clear(): void {
    this.events = [];
  }
}

export class InMemorySnapshotStore implements ISnapshotStore {
  private latest: StateSnapshot | undefined;

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    if (!this.latest || snapshot.sequenceNumber >= this.latest.sequenceNumber) {
      this.latest = snapshot;
    }
  }

  async loadLatestSnapshot(): Promise<StateSnapshot | undefined> {
    return this.latest;
  }

  clear(): void {
    this.latest = undefined;
  }
}

export class InMemoryAccountKeyStore implements IAccountKeyStore {
  private keys = new Map<string, string>();

  async saveAccountKey(accountId: string, keyHash: string): Promise<void> {
    this.keys.set(accountId, keyHash);
  }

  async loadAccountKeys(): Promise<Map<string, string>> {
    return new Map(this.keys);
  }

  clear(): void {
    this.keys.clear();
  }
}

export function createInMemoryStores(): {
  event: InMemoryEventStore;
  snapshot: InMemorySnapshotStore;
  accountKey: InMemoryAccountKeyStore;
} {
  return {
    event: new InMemoryEventStore(),
    snapshot: new InMemorySnapshotStore(),
    accountKey: new InMemoryAccountKeyStore(),
  };
}
