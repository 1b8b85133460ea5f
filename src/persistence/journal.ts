/**
 * Write-behind journal for a StakingRewards engine.
 *
 * Collects committed notifications as they are delivered and, on commit(),
 * appends them to the event store as a hash chain and saves a full snapshot.
 * Commits run one at a time in call order.
 */

import { StakingRewards } from '../stakingRewards';
import { StakingEvent } from '../types';
import { DomainEvent, GENESIS_HASH } from './eventTypes';
import { Stores, StateSnapshot } from './interfaces';
import { buildDomainEvents, computeStateHash, toIsoTimestamp } from './eventBuilder';
import { serializeEngineSnapshot } from './stateSerializer';
import { captureEngineSnapshot } from './engineSnapshot';

export interface CommitResult {
  events: DomainEvent[];
  snapshot: StateSnapshot;
}

export class EngineJournal {
  private pending: StakingEvent[] = [];
  private tail: Promise<unknown> = Promise.resolve();
  private readonly unsubscribe: () => void;

  constructor(
    private readonly engine: StakingRewards,
    private readonly stores: Stores
  ) {
    this.unsubscribe = engine.subscribe(event => {
      this.pending.push(event);
    });
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Persist everything delivered since the last commit. Failures reject the
   * returned promise; later commits still run.
   */
  commit(now: bigint): Promise<CommitResult> {
    const events = this.pending;
    this.pending = [];

    const run = this.tail.then(() => this.persist(events, now));
    this.tail = run.catch(() => undefined);
    return run;
  }

  close(): void {
    this.unsubscribe();
  }

  private async persist(events: StakingEvent[], now: bigint): Promise<CommitResult> {
    const last = await this.stores.event.getLastEvent();
    const prevHash = last?.eventHash ?? GENESIS_HASH;
    const startSequence = last ? last.sequenceNumber + 1 : 0;

    const domainEvents = buildDomainEvents(events, prevHash, startSequence, this.engine.owner);
    if (domainEvents.length > 0) {
      await this.stores.event.append(domainEvents);
    }

    const head = domainEvents.length > 0 ? domainEvents[domainEvents.length - 1] : last;
    const engineSnapshot = captureEngineSnapshot(this.engine);
    const snapshot: StateSnapshot = {
      sequenceNumber: head?.sequenceNumber ?? -1,
      stateHash: computeStateHash(engineSnapshot),
      lastEventHash: head?.eventHash ?? GENESIS_HASH,
      stakerCount: engineSnapshot.state.balances.size,
      stateJson: serializeEngineSnapshot(engineSnapshot),
      createdAt: toIsoTimestamp(now),
    };
    await this.stores.snapshot.saveSnapshot(snapshot);

    return { events: domainEvents, snapshot };
  }
}
