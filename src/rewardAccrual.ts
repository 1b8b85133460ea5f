/**
 * Reward Accrual - time-weighted, pro-rata reward accounting
 *
 * Pure functions over StakingState. Nothing here mutates its input; every
 * transition returns a new state value so a caller can discard it on failure.
 *
 * The accrual index (rewardPerTokenStored) grows by
 *   elapsed * rewardRate * SCALE / totalSupply
 * and an account's reward is its balance times the growth of the index since
 * the account's last checkpoint.
 */

import { Address, ProgramPhase, RewardProgram, StakingState, UserRewardCheckpoint } from './types';
import { SCALE, minBigInt } from './fixedPoint';
import { StakingError, StakingErrorCodes } from './errors';

const EMPTY_CHECKPOINT: UserRewardCheckpoint = Object.freeze({
  userRewardPerTokenPaid: 0n,
  rewards: 0n,
});

export function createEmptyProgram(): RewardProgram {
  return {
    duration: 0n,
    finishAt: 0n,
    updatedAt: 0n,
    rewardRate: 0n,
    rewardPerTokenStored: 0n,
  };
}

export function createEmptyStakingState(): StakingState {
  return {
    program: createEmptyProgram(),
    balances: new Map(),
    totalSupply: 0n,
    checkpoints: new Map(),
  };
}

export function balanceOf(state: StakingState, account: Address): bigint {
  return state.balances.get(account) ?? 0n;
}

export function getCheckpoint(state: StakingState, account: Address): Readonly<UserRewardCheckpoint> {
  return state.checkpoints.get(account) ?? EMPTY_CHECKPOINT;
}

/**
 * min(now, finishAt): accrual never extrapolates past the funded period
 */
export function lastTimeRewardApplicable(state: StakingState, now: bigint): bigint {
  return minBigInt(now, state.program.finishAt);
}

/**
 * Current value of the accrual index.
 * Frozen at rewardPerTokenStored while nothing is staked.
 */
export function rewardPerToken(state: StakingState, now: bigint): bigint {
  const { program, totalSupply } = state;
  if (totalSupply === 0n) {
    return program.rewardPerTokenStored;
  }

  const applicable = lastTimeRewardApplicable(state, now);
  // A clock earlier than the last checkpoint accrues nothing
  const elapsed = applicable > program.updatedAt ? applicable - program.updatedAt : 0n;

  return program.rewardPerTokenStored + (elapsed * program.rewardRate * SCALE) / totalSupply;
}

/**
 * Reward owed to an account right now (claimed or not yet checkpointed)
 */
export function earned(state: StakingState, account: Address, now: bigint): bigint {
  const checkpoint = getCheckpoint(state, account);
  const indexDelta = rewardPerToken(state, now) - checkpoint.userRewardPerTokenPaid;
  return (balanceOf(state, account) * indexDelta) / SCALE + checkpoint.rewards;
}

/**
 * Advance the global checkpoint to `now` and, for a real account, settle its
 * accrued reward into `rewards`.
 *
 * Must run before any balance change: the index has to be frozen at the old
 * supply, otherwise the balance change would be applied retroactively.
 *
 * @param account null checkpoints the program without crediting anyone
 */
export function updateReward(
  state: StakingState,
  account: Address | null,
  now: bigint
): StakingState {
  const rewardPerTokenStored = rewardPerToken(state, now);
  const applicable = lastTimeRewardApplicable(state, now);
  const program: RewardProgram = {
    ...state.program,
    rewardPerTokenStored,
    // Monotonic: an earlier `now` keeps the last checkpoint
    updatedAt: applicable > state.program.updatedAt ? applicable : state.program.updatedAt,
  };

  if (account === null) {
    return { ...state, program };
  }

  const rewards = earned(state, account, now);
  const checkpoints = new Map(state.checkpoints);
  checkpoints.set(account, { userRewardPerTokenPaid: rewardPerTokenStored, rewards });

  return { ...state, program, checkpoints };
}

/**
 * Credit `amount` to an account's stake
 */
export function increaseStake(state: StakingState, account: Address, amount: bigint): StakingState {
  const balances = new Map(state.balances);
  balances.set(account, balanceOf(state, account) + amount);
  return { ...state, balances, totalSupply: state.totalSupply + amount };
}

/**
 * Debit `amount` from an account's stake
 *
 * @throws StakingError INSUFFICIENT_BALANCE if amount exceeds the stake
 */
export function decreaseStake(state: StakingState, account: Address, amount: bigint): StakingState {
  const current = balanceOf(state, account);
  if (amount > current) {
    throw new StakingError(
      StakingErrorCodes.INSUFFICIENT_BALANCE,
      `Withdraw amount ${amount} exceeds staked balance ${current} for ${account}`
    );
  }

  const balances = new Map(state.balances);
  if (current === amount) {
    balances.delete(account);
  } else {
    balances.set(account, current - amount);
  }
  return { ...state, balances, totalSupply: state.totalSupply - amount };
}

/**
 * Zero an account's unclaimed reward, keeping its index checkpoint
 */
export function clearRewards(state: StakingState, account: Address): StakingState {
  const checkpoints = new Map(state.checkpoints);
  checkpoints.set(account, { ...getCheckpoint(state, account), rewards: 0n });
  return { ...state, checkpoints };
}

/**
 * Emission rate for a new funding of `amount` at `now`.
 *
 * A lapsed (or never started) period spreads `amount` over `duration`; a
 * running period first rolls its unemitted remainder into the new amount.
 * Division truncates; the dust stays with the engine.
 *
 * @throws StakingError ZERO_REWARD_RATE if duration is unset or the rate truncates to zero
 */
export function computeRewardRate(state: StakingState, amount: bigint, now: bigint): bigint {
  const { duration, finishAt, rewardRate } = state.program;

  if (duration === 0n) {
    throw new StakingError(StakingErrorCodes.ZERO_REWARD_RATE, 'Reward duration is not set');
  }

  let newRate: bigint;
  if (now >= finishAt) {
    newRate = amount / duration;
  } else {
    const remaining = (finishAt - now) * rewardRate;
    newRate = (amount + remaining) / duration;
  }

  if (newRate === 0n) {
    throw new StakingError(
      StakingErrorCodes.ZERO_REWARD_RATE,
      `Reward amount ${amount} is too small to emit over ${duration}s`
    );
  }

  return newRate;
}

/**
 * Start a new period at `now` emitting `rewardRate` per second.
 * `now` must not precede the last checkpoint.
 */
export function startRewardPeriod(state: StakingState, rewardRate: bigint, now: bigint): StakingState {
  return {
    ...state,
    program: {
      ...state.program,
      rewardRate,
      finishAt: now + state.program.duration,
      updatedAt: now,
    },
  };
}

export function setDuration(state: StakingState, duration: bigint): StakingState {
  return { ...state, program: { ...state.program, duration } };
}

/**
 * Total emission of one full period at the current rate
 */
export function getRewardForDuration(state: StakingState): bigint {
  return state.program.rewardRate * state.program.duration;
}

export function getProgramPhase(state: StakingState, now: bigint): ProgramPhase {
  const { duration, finishAt } = state.program;
  if (finishAt === 0n) {
    return duration === 0n ? 'UNCONFIGURED' : 'CONFIGURED';
  }
  return now < finishAt ? 'ACTIVE' : 'EXPIRED';
}
