import { StakingEventType } from '../types';

/**
 * Journal entry for one committed engine notification.
 * Hash-chained: eventHash covers every field except timestamp and eventHash.
 */
export interface DomainEvent {
  eventId: string;
  sequenceNumber: number;
  timestamp: string; // ISO string, excluded from hash
  eventType: DomainEventType;
  actorId?: string;
  payload: Record<string, unknown>;
  prevEventHash: string;
  eventHash: string;
}

export type DomainEventType = StakingEventType;

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'STAKED',
  'WITHDRAWN',
  'REWARD_PAID',
  'REWARD_ADDED',
  'DURATION_UPDATED',
];

export function isDomainEventType(value: string): value is DomainEventType {
  return DOMAIN_EVENT_TYPES.some(t => t === value);
}

export const GENESIS_HASH = 'GENESIS';
