import { DomainEvent, DomainEventType } from './eventTypes';

export interface StateSnapshot {
  /** Sequence number of the last journal entry covered */
  sequenceNumber: number;
  stateHash: string;
  lastEventHash: string;
  stakerCount: number;
  /** Serialized EngineSnapshot */
  stateJson: string;
  createdAt: string; // ISO string
}

export interface IEventStore {
  append(events: DomainEvent[]): Promise<void>;
  listAll(): Promise<DomainEvent[]>;
  queryByActor(actorId: string): Promise<DomainEvent[]>;
  queryByType(eventType: DomainEventType): Promise<DomainEvent[]>;
  getLastEvent(): Promise<DomainEvent | undefined>;
}

export interface ISnapshotStore {
  saveSnapshot(snapshot: StateSnapshot): Promise<void>;
  loadLatestSnapshot(): Promise<StateSnapshot | undefined>;
}

/**
 * Staker credentials: account id to the sha256 hex of its key
 */
export interface IAccountKeyStore {
  saveAccountKey(accountId: string, keyHash: string): Promise<void>;
  loadAccountKeys(): Promise<Map<string, string>>;
}

export interface Stores {
  event: IEventStore;
  snapshot: ISnapshotStore;
  accountKey: IAccountKeyStore;
}
