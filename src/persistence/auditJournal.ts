import { DomainEvent } from './eventTypes';
import { Stores, StateSnapshot } from './interfaces';
import { computeEventHash, computeStateHash } from './eventBuilder';
import { deserializeEngineSnapshot } from './stateSerializer';

export interface ChainCheck {
  valid: boolean;
  brokenAt?: number;
  error?: string;
}

export interface AuditReport {
  eventCount: number;
  hashChainValid: boolean;
  /** true when no snapshot exists yet */
  snapshotValid: boolean;
  errors: string[];
}

/**
 * Verify the hash chain of a sequence of events.
 */
export function verifyHashChain(events: DomainEvent[], expectedPrevHash?: string): ChainCheck {
  if (events.length === 0) {
    return { valid: true };
  }

  if (expectedPrevHash !== undefined && events[0].prevEventHash !== expectedPrevHash) {
    return {
      valid: false,
      brokenAt: 0,
      error: `First event prevEventHash mismatch: expected ${expectedPrevHash}, got ${events[0].prevEventHash}`,
    };
  }

  for (let i = 0; i < events.length; i++) {
    const event = events[i];

    const expectedHash = computeEventHash({
      eventId: event.eventId,
      sequenceNumber: event.sequenceNumber,
      timestamp: event.timestamp,
      eventType: event.eventType,
      actorId: event.actorId,
      payload: event.payload,
      prevEventHash: event.prevEventHash,
    });

    if (event.eventHash !== expectedHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} hash mismatch: expected ${expectedHash}, got ${event.eventHash}`,
      };
    }

    if (i > 0 && event.prevEventHash !== events[i - 1].eventHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} chain broken: prevEventHash doesn't match previous event's hash`,
      };
    }
  }

  return { valid: true };
}

/**
 * Check a snapshot against its own contents and the journal head it claims.
 */
export function verifySnapshot(snapshot: StateSnapshot, events: DomainEvent[]): string[] {
  const errors: string[] = [];

  const recomputed = computeStateHash(deserializeEngineSnapshot(snapshot.stateJson));
  if (recomputed !== snapshot.stateHash) {
    errors.push(`Snapshot stateHash mismatch: expected ${recomputed}, got ${snapshot.stateHash}`);
  }

  const head = events.find(e => e.sequenceNumber === snapshot.sequenceNumber);
  if (snapshot.sequenceNumber >= 0 && !head) {
    errors.push(`Snapshot refers to missing event ${snapshot.sequenceNumber}`);
  } else if (head && head.eventHash !== snapshot.lastEventHash) {
    errors.push(`Snapshot lastEventHash does not match event ${snapshot.sequenceNumber}`);
  }

  return errors;
}

/**
 * Full journal audit: hash chain from genesis plus the latest snapshot.
 */
export async function auditJournal(stores: Stores, genesisHash: string): Promise<AuditReport> {
  const events = await stores.event.listAll();
  const chain = verifyHashChain(events, genesisHash);
  const errors: string[] = chain.error ? [chain.error] : [];

  const snapshot = await stores.snapshot.loadLatestSnapshot();
  const snapshotErrors = snapshot ? verifySnapshot(snapshot, events) : [];
  errors.push(...snapshotErrors);

  return {
    eventCount: events.length,
    hashChainValid: chain.valid,
    snapshotValid: snapshotErrors.length === 0,
    errors,
  };
}
