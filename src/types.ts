/**
 * Core types for the staking rewards engine.
 *
 * Every quantity is an unsigned integer held as bigint; timestamps are unix
 * seconds. Nothing here is ever negative.
 */

/**
 * Opaque account identity (a wallet address, a user id, the engine's own
 * custody account)
 */
export type Address = string;

/**
 * Global reward emission parameters and the accrual checkpoint
 */
export interface RewardProgram {
  /** Seconds a funded period lasts. 0 until configured. */
  duration: bigint;
  /** Absolute timestamp when the current period ends */
  finishAt: bigint;
  /** Timestamp of the last accrual checkpoint */
  updatedAt: bigint;
  /** Reward units emitted per second (derived on funding) */
  rewardRate: bigint;
  /** Cumulative reward per staked unit up to updatedAt, times SCALE */
  rewardPerTokenStored: bigint;
}

/**
 * Per-account accrual checkpoint. Absent entries read as zero.
 */
export interface UserRewardCheckpoint {
  /** rewardPerTokenStored as of the account's last interaction */
  userRewardPerTokenPaid: bigint;
  /** Accrued but unclaimed reward */
  rewards: bigint;
}

/**
 * Immutable engine state. Operations return a new value.
 */
export interface StakingState {
  readonly program: Readonly<RewardProgram>;
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly totalSupply: bigint;
  readonly checkpoints: ReadonlyMap<Address, Readonly<UserRewardCheckpoint>>;
}

/**
 * Caller identity and block time for one engine call
 */
export interface CallContext {
  caller: Address;
  now: bigint;
}

/**
 * Lifecycle of the reward program relative to `now`
 */
export type ProgramPhase = 'UNCONFIGURED' | 'CONFIGURED' | 'ACTIVE' | 'EXPIRED';

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export type StakingEventType =
  | 'STAKED'
  | 'WITHDRAWN'
  | 'REWARD_PAID'
  | 'REWARD_ADDED'
  | 'DURATION_UPDATED';

interface StakingEventBase {
  at: bigint;
}

export interface StakedEvent extends StakingEventBase {
  type: 'STAKED';
  account: Address;
  amount: bigint;
}

export interface WithdrawnEvent extends StakingEventBase {
  type: 'WITHDRAWN';
  account: Address;
  amount: bigint;
}

export interface RewardPaidEvent extends StakingEventBase {
  type: 'REWARD_PAID';
  account: Address;
  amount: bigint;
}

export interface RewardAddedEvent extends StakingEventBase {
  type: 'REWARD_ADDED';
  amount: bigint;
  rewardRate: bigint;
  finishAt: bigint;
}

export interface DurationUpdatedEvent extends StakingEventBase {
  type: 'DURATION_UPDATED';
  duration: bigint;
}

export type StakingEvent =
  | StakedEvent
  | WithdrawnEvent
  | RewardPaidEvent
  | RewardAddedEvent
  | DurationUpdatedEvent;

export type StakingListener = (event: StakingEvent) => void;

/**
 * One week in seconds, the customary reward period
 */
export const ONE_WEEK = 604_800n;

export const ONE_DAY = 86_400n;
