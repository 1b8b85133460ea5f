// Canonical serialization
export { canonicalStringify, computeHash } from './canonicalSerialize';

// Event types
export { DomainEvent, DomainEventType, DOMAIN_EVENT_TYPES, GENESIS_HASH, isDomainEventType } from './eventTypes';

// Storage interfaces
export { IAccountKeyStore, IEventStore, ISnapshotStore, StateSnapshot, Stores } from './interfaces';

// Event builder
export { buildDomainEvents, computeEventHash, computeStateHash, toEventPayload } from './eventBuilder';

// Snapshots
export { EngineSnapshot, serializeEngineSnapshot, deserializeEngineSnapshot } from './stateSerializer';
export { captureEngineSnapshot, rebuildEngine, RebuiltEngine } from './engineSnapshot';

// Journal
export { EngineJournal, CommitResult } from './journal';
export { verifyHashChain, verifySnapshot, auditJournal, AuditReport, ChainCheck } from './auditJournal';

// Stores
export {
  InMemoryAccountKeyStore,
  InMemoryEventStore,
  InMemorySnapshotStore,
  createInMemoryStores,
} from './inMemoryStores';
export { createSqliteStores } from './sqlite';
export type { SqliteStores } from './sqlite';
