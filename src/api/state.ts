import { StakingRewards } from '../stakingRewards';
import { InMemoryToken } from '../token';
import { CallContext } from '../types';
import { Stores } from '../persistence/interfaces';
import { EngineJournal, CommitResult } from '../persistence/journal';
import { RebuiltEngine } from '../persistence/engineSnapshot';
import { TokenKind } from './types';

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  engine: StakingRewards;
  tokens: Record<TokenKind, InMemoryToken>;

  // Staker auth: accountId → sha256 hex of its account key
  accountKeys: Map<string, string>;

  // Storage backends
  stores: Stores;
  journal: EngineJournal;

  /** Current time in Unix seconds */
  clock: () => bigint;
}

export interface ApiStateOptions {
  owner?: string;
  address?: string;
  stakingTokenSymbol?: string;
  rewardsTokenSymbol?: string;
  clock?: () => bigint;
}

export const DEFAULT_OWNER = 'owner';
export const DEFAULT_ENGINE_ADDRESS = 'staking-rewards';

export function systemClock(): bigint {
  return BigInt(Math.floor(Date.now() / 1000));
}

/**
 * Create API state around a fresh, unconfigured engine
 */
export function createApiState(stores: Stores, options: ApiStateOptions = {}): ApiState {
  const stakingToken = new InMemoryToken(options.stakingTokenSymbol ?? 'STK');
  const rewardsToken = new InMemoryToken(options.rewardsTokenSymbol ?? 'RWD');
  const engine = new StakingRewards({
    owner: options.owner ?? DEFAULT_OWNER,
    address: options.address ?? DEFAULT_ENGINE_ADDRESS,
    stakingToken,
    rewardsToken,
  });

  return attachApiState({ engine, stakingToken, rewardsToken }, stores, options.clock);
}

/**
 * Wrap an existing engine and its ledgers
 */
export function attachApiState(
  rebuilt: RebuiltEngine,
  stores: Stores,
  clock: () => bigint = systemClock
): ApiState {
  return {
    engine: rebuilt.engine,
    tokens: { staking: rebuilt.stakingToken, rewards: rebuilt.rewardsToken },
    accountKeys: new Map(),
    stores,
    journal: new EngineJournal(rebuilt.engine, stores),
    clock,
  };
}

export function callContext(state: ApiState, caller: string): CallContext {
  return { caller, now: state.clock() };
}

/**
 * Journal whatever the last call committed and save a snapshot
 */
export async function persistOperation(state: ApiState): Promise<CommitResult> {
  try {
    return await state.journal.commit(state.clock());
  } catch (err) {
    console.error('Persistence: commit failed:', err);
    throw err;
  }
}
