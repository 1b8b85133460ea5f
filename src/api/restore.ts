/**
 * Restore API state from the latest snapshot after a restart.
 */

import { ApiState, ApiStateOptions, attachApiState, createApiState } from './state';
import { Stores } from '../persistence/interfaces';
import { computeStateHash } from '../persistence/eventBuilder';
import { deserializeEngineSnapshot } from '../persistence/stateSerializer';
import { rebuildEngine } from '../persistence/engineSnapshot';

export async function restoreApiState(stores: Stores, options: ApiStateOptions = {}): Promise<ApiState> {
  const state = await restoreEngineState(stores, options);
  state.accountKeys = await stores.accountKey.loadAccountKeys();
  return state;
}

async function restoreEngineState(stores: Stores, options: ApiStateOptions): Promise<ApiState> {
  const latest = await stores.snapshot.loadLatestSnapshot();
  if (!latest) {
    return createApiState(stores, options);
  }

  const snapshot = deserializeEngineSnapshot(latest.stateJson);
  const stateHash = computeStateHash(snapshot);
  if (stateHash !== latest.stateHash) {
    throw new Error(
      `Snapshot at sequence ${latest.sequenceNumber} is corrupt: stateHash ${latest.stateHash}, contents hash to ${stateHash}`
    );
  }

  const lastEvent = await stores.event.getLastEvent();
  const journalHead = lastEvent?.sequenceNumber ?? -1;
  if (journalHead !== latest.sequenceNumber) {
    console.warn(
      `Persistence: snapshot covers sequence ${latest.sequenceNumber} but journal head is ${journalHead}`
    );
  }

  if (options.owner !== undefined && options.owner !== snapshot.owner) {
    console.warn(`Persistence: OWNER_ADDRESS ${options.owner} ignored, snapshot owner is ${snapshot.owner}`);
  }

  return attachApiState(rebuildEngine(snapshot), stores, options.clock);
}
