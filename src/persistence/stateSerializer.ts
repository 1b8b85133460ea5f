/**
 * Engine snapshot serializer.
 * bigint → decimal string, Map → entries array, so JSON.stringify
 * round-trips without loss.
 */

import { StakingState, UserRewardCheckpoint } from '../types';
import { TokenSnapshot } from '../token';

/**
 * Everything needed to rebuild an engine and its two ledgers
 */
export interface EngineSnapshot {
  owner: string;
  address: string;
  stakingToken: { symbol: string; ledger: TokenSnapshot };
  rewardsToken: { symbol: string; ledger: TokenSnapshot };
  /** Staking and rewards token are the same ledger */
  sharedLedger: boolean;
  state: StakingState;
}

// ── Serializable shapes ────────────────────────────────────────────

interface SerializedCheckpoint {
  userRewardPerTokenPaid: string;
  rewards: string;
}

interface SerializedState {
  program: {
    duration: string;
    finishAt: string;
    updatedAt: string;
    rewardRate: string;
    rewardPerTokenStored: string;
  };
  balances: Array<[string, string]>;
  totalSupply: string;
  checkpoints: Array<[string, SerializedCheckpoint]>;
}

interface SerializedLedger {
  balances: Array<[string, string]>;
  allowances: Array<[string, string]>;
  totalSupply: string;
}

interface SerializedSnapshot {
  owner: string;
  address: string;
  stakingToken: { symbol: string; ledger: SerializedLedger };
  rewardsToken: { symbol: string; ledger: SerializedLedger };
  sharedLedger: boolean;
  state: SerializedState;
}

// ── Serialize ──────────────────────────────────────────────────────

export function serializeEngineSnapshot(snapshot: EngineSnapshot): string {
  const serialized: SerializedSnapshot = {
    owner: snapshot.owner,
    address: snapshot.address,
    stakingToken: {
      symbol: snapshot.stakingToken.symbol,
      ledger: serializeLedger(snapshot.stakingToken.ledger),
    },
    rewardsToken: {
      symbol: snapshot.rewardsToken.symbol,
      ledger: serializeLedger(snapshot.rewardsToken.ledger),
    },
    sharedLedger: snapshot.sharedLedger,
    state: serializeState(snapshot.state),
  };
  return JSON.stringify(serialized);
}

function serializeState(state: StakingState): SerializedState {
  const { program } = state;
  return {
    program: {
      duration: program.duration.toString(),
      finishAt: program.finishAt.toString(),
      updatedAt: program.updatedAt.toString(),
      rewardRate: program.rewardRate.toString(),
      rewardPerTokenStored: program.rewardPerTokenStored.toString(),
    },
    balances: [...state.balances.entries()].map(([account, b]): [string, string] => [account, b.toString()]),
    totalSupply: state.totalSupply.toString(),
    checkpoints: [...state.checkpoints.entries()].map(([account, c]): [string, SerializedCheckpoint] => [
      account,
      { userRewardPerTokenPaid: c.userRewardPerTokenPaid.toString(), rewards: c.rewards.toString() },
    ]),
  };
}

function serializeLedger(ledger: TokenSnapshot): SerializedLedger {
  return {
    balances: ledger.balances.map(([k, v]): [string, string] => [k, v.toString()]),
    allowances: ledger.allowances.map(([k, v]): [string, string] => [k, v.toString()]),
    totalSupply: ledger.totalSupply.toString(),
  };
}

// ── Deserialize ────────────────────────────────────────────────────

export function deserializeEngineSnapshot(json: string): EngineSnapshot {
  const raw = JSON.parse(json) as SerializedSnapshot;
  return {
    owner: raw.owner,
    address: raw.address,
    stakingToken: {
      symbol: raw.stakingToken.symbol,
      ledger: deserializeLedger(raw.stakingToken.ledger),
    },
    rewardsToken: {
      symbol: raw.rewardsToken.symbol,
      ledger: deserializeLedger(raw.rewardsToken.ledger),
    },
    sharedLedger: raw.sharedLedger === true,
    state: deserializeState(raw.state),
  };
}

function deserializeState(raw: SerializedState): StakingState {
  return {
    program: {
      duration: BigInt(raw.program.duration),
      finishAt: BigInt(raw.program.finishAt),
      updatedAt: BigInt(raw.program.updatedAt),
      rewardRate: BigInt(raw.program.rewardRate),
      rewardPerTokenStored: BigInt(raw.program.rewardPerTokenStored),
    },
    balances: new Map(raw.balances.map(([account, b]): [string, bigint] => [account, BigInt(b)])),
    totalSupply: BigInt(raw.totalSupply),
    checkpoints: new Map(
      raw.checkpoints.map(([account, c]): [string, UserRewardCheckpoint] => [
        account,
        { userRewardPerTokenPaid: BigInt(c.userRewardPerTokenPaid), rewards: BigInt(c.rewards) },
      ])
    ),
  };
}

function deserializeLedger(raw: SerializedLedger): TokenSnapshot {
  return {
    balances: raw.balances.map(([k, v]): [string, bigint] => [k, BigInt(v)]),
    allowances: raw.allowances.map(([k, v]): [string, bigint] => [k, BigInt(v)]),
    totalSupply: BigInt(raw.totalSupply),
  };
}
