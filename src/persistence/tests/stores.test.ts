import { createInMemoryStores } from '../inMemoryStores';
import { createSqliteStores, SqliteStores } from '../sqlite';
import { buildDomainEvents } from '../eventBuilder';
import { GENESIS_HASH } from '../eventTypes';
import { Stores, StateSnapshot } from '../interfaces';
import { StakingEvent } from '../../types';
import { ALICE, BOB, OWNER, T0 } from '../../tests/helpers';

const notifications: StakingEvent[] = [
  { type: 'DURATION_UPDATED', at: T0, duration: 100n },
  { type: 'STAKED', at: T0, account: ALICE, amount: 10n },
  { type: 'STAKED', at: T0 + 1n, account: BOB, amount: 20n },
  { type: 'REWARD_PAID', at: T0 + 2n, account: ALICE, amount: 3n },
];

function snapshotAt(sequenceNumber: number, stateJson: string): StateSnapshot {
  return {
    sequenceNumber,
    stateHash: `state-${sequenceNumber}`,
    lastEventHash: `event-${sequenceNumber}`,
    stakerCount: 2,
    stateJson,
    createdAt: '2023-11-14T22:13:20.000Z',
  };
}

const backends: Array<[string, () => { stores: Stores; close: () => void }]> = [
  ['in-memory', () => ({ stores: createInMemoryStores(), close: () => undefined })],
  [
    'sqlite',
    () => {
      const sqlite: SqliteStores = createSqliteStores(':memory:');
      return { stores: sqlite, close: () => sqlite.db.close() };
    },
  ],
];

describe.each(backends)('%s stores', (_name, open) => {
  let stores: Stores;
  let close: () => void;

  beforeEach(() => {
    ({ stores, close } = open());
  });

  afterEach(() => {
    close();
  });

  it('should return appended events in sequence order', async () => {
    const events = buildDomainEvents(notifications, GENESIS_HASH, 0, OWNER);
    await stores.event.append(events.slice(0, 2));
    await stores.event.append(events.slice(2));

    expect(await stores.event.listAll()).toEqual(events);
  });

  it('should query by actor and by type', async () => {
    const events = buildDomainEvents(notifications, GENESIS_HASH, 0, OWNER);
    await stores.event.append(events);

    const alice = await stores.event.queryByActor(ALICE);
    expect(alice.map(e => e.eventType)).toEqual(['STAKED', 'REWARD_PAID']);

    const owner = await stores.event.queryByActor(OWNER);
    expect(owner.map(e => e.sequenceNumber)).toEqual([0]);

    const staked = await stores.event.queryByType('STAKED');
    expect(staked.map(e => e.actorId)).toEqual([ALICE, BOB]);
  });

  it('should report the last event', async () => {
    expect(await stores.event.getLastEvent()).toBeUndefined();

    const events = buildDomainEvents(notifications, GENESIS_HASH, 0, OWNER);
    await stores.event.append(events);

    expect(await stores.event.getLastEvent()).toEqual(events[3]);
  });

  it('should keep the newest snapshot', async () => {
    expect(await stores.snapshot.loadLatestSnapshot()).toBeUndefined();

    await stores.snapshot.saveSnapshot(snapshotAt(0, '{"n":0}'));
    await stores.snapshot.saveSnapshot(snapshotAt(3, '{"n":3}'));

    expect(await stores.snapshot.loadLatestSnapshot()).toEqual(snapshotAt(3, '{"n":3}'));
  });

  it('should keep account key hashes', async () => {
    expect((await stores.accountKey.loadAccountKeys()).size).toBe(0);

    await stores.accountKey.saveAccountKey(ALICE, 'a'.repeat(64));
    await stores.accountKey.saveAccountKey(BOB, 'b'.repeat(64));

    const keys = await stores.accountKey.loadAccountKeys();
    expect(keys).toEqual(new Map([[ALICE, 'a'.repeat(64)], [BOB, 'b'.repeat(64)]]));
  });
});

describe('sqlite event store', () => {
  it('should reject a duplicate sequence number and keep the batch out', async () => {
    const { db, event } = createSqliteStores(':memory:');
    const events = buildDomainEvents(notifications, GENESIS_HASH, 0, OWNER);
    await event.append(events.slice(0, 2));

    const clash = buildDomainEvents(notifications.slice(2), events[1].eventHash, 1, OWNER);
    await expect(event.append(clash)).rejects.toThrow();

    expect(await event.listAll()).toHaveLength(2);
    db.close();
  });
});
