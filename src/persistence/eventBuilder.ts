import * as crypto from 'crypto';
import { DomainEvent } from './eventTypes';
import { canonicalStringify, computeHash } from './canonicalSerialize';
import { EngineSnapshot } from './stateSerializer';
import { StakingEvent } from '../types';

/**
 * Compute the hash of a domain event (timestamp excluded).
 */
export function computeEventHash(
  event: Omit<DomainEvent, 'eventHash'>
): string {
  const data = canonicalStringify({
    eventId: event.eventId,
    sequenceNumber: event.sequenceNumber,
    eventType: event.eventType,
    actorId: event.actorId,
    payload: event.payload,
    prevEventHash: event.prevEventHash,
  });
  return computeHash(data);
}

/**
 * Deterministic hash of an engine snapshot (state plus both ledgers).
 */
export function computeStateHash(snapshot: EngineSnapshot): string {
  return computeHash(canonicalStringify(snapshot));
}

/**
 * Unix seconds → ISO string
 */
export function toIsoTimestamp(seconds: bigint): string {
  return new Date(Number(seconds) * 1000).toISOString();
}

/**
 * JSON-safe payload of a notification: every field but type and time,
 * amounts as decimal strings.
 */
export function toEventPayload(event: StakingEvent): Record<string, unknown> {
  switch (event.type) {
    case 'STAKED':
    case 'WITHDRAWN':
    case 'REWARD_PAID':
      return { account: event.account, amount: event.amount.toString() };
    case 'REWARD_ADDED':
      return {
        amount: event.amount.toString(),
        rewardRate: event.rewardRate.toString(),
        finishAt: event.finishAt.toString(),
      };
    case 'DURATION_UPDATED':
      return { duration: event.duration.toString() };
  }
}

/**
 * Turn committed notifications into chained journal entries.
 *
 * @param actorForAdmin actor recorded on owner-only notifications
 */
export function buildDomainEvents(
  events: StakingEvent[],
  prevEventHash: string,
  startSequence: number,
  actorForAdmin?: string
): DomainEvent[] {
  const built: DomainEvent[] = [];
  let prevHash = prevEventHash;
  let seq = startSequence;

  for (const event of events) {
    const actorId = 'account' in event ? event.account : actorForAdmin;
    const partial: Omit<DomainEvent, 'eventHash'> = {
      eventId: crypto.randomUUID(),
      sequenceNumber: seq++,
      timestamp: toIsoTimestamp(event.at),
      eventType: event.type,
      actorId,
      payload: toEventPayload(event),
      prevEventHash: prevHash,
    };
    const domainEvent: DomainEvent = { ...partial, eventHash: computeEventHash(partial) };
    prevHash = domainEvent.eventHash;
    built.push(domainEvent);
  }

  return built;
}
