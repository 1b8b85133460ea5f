/**
 * Staking Rewards Engine
 *
 * Owns one reward program and its stake ledger, pulls principal from the
 * staking token and pays out of the reward token held in its own custody
 * account.
 *
 * Every mutating call is atomic: engine state, both token ledgers and the
 * buffered notifications are restored if anything throws. Notifications of a
 * top-level call reach subscribers only after it has committed.
 */

import {
  Address,
  CallContext,
  ProgramPhase,
  StakingEvent,
  StakingListener,
  StakingState,
} from './types';
import { IFungibleToken, TokenSnapshot } from './token';
import { StakingError, StakingErrorCodes } from './errors';
import {
  balanceOf,
  clearRewards,
  computeRewardRate,
  createEmptyStakingState,
  decreaseStake,
  earned,
  getCheckpoint,
  getProgramPhase,
  getRewardForDuration,
  increaseStake,
  lastTimeRewardApplicable,
  rewardPerToken,
  setDuration,
  startRewardPeriod,
  updateReward,
} from './rewardAccrual';

export interface StakingRewardsOptions {
  owner: Address;
  /** Custody account holding staked principal and reward funds */
  address: Address;
  stakingToken: IFungibleToken;
  rewardsToken: IFungibleToken;
  /** Restored state; defaults to an unconfigured program */
  initialState?: StakingState;
}

export class StakingRewards {
  readonly owner: Address;
  readonly address: Address;
  readonly stakingToken: IFungibleToken;
  readonly rewardsToken: IFungibleToken;

  private state: StakingState;
  private listeners = new Set<StakingListener>();
  private pending: StakingEvent[] = [];
  private depth = 0;

  constructor(options: StakingRewardsOptions) {
    this.owner = options.owner;
    this.address = options.address;
    this.stakingToken = options.stakingToken;
    this.rewardsToken = options.rewardsToken;
    this.state = options.initialState ? copyState(options.initialState) : createEmptyStakingState();
  }

  // ── Read accessors ──────────────────────────────────────────────

  get duration(): bigint {
    return this.state.program.duration;
  }

  get finishAt(): bigint {
    return this.state.program.finishAt;
  }

  get updatedAt(): bigint {
    return this.state.program.updatedAt;
  }

  get rewardRate(): bigint {
    return this.state.program.rewardRate;
  }

  get rewardPerTokenStored(): bigint {
    return this.state.program.rewardPerTokenStored;
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return balanceOf(this.state, account);
  }

  rewards(account: Address): bigint {
    return getCheckpoint(this.state, account).rewards;
  }

  userRewardPerTokenPaid(account: Address): bigint {
    return getCheckpoint(this.state, account).userRewardPerTokenPaid;
  }

  earned(account: Address, now: bigint): bigint {
    return earned(this.state, account, now);
  }

  lastTimeRewardApplicable(now: bigint): bigint {
    return lastTimeRewardApplicable(this.state, now);
  }

  rewardPerToken(now: bigint): bigint {
    return rewardPerToken(this.state, now);
  }

  getRewardForDuration(): bigint {
    return getRewardForDuration(this.state);
  }

  programPhase(now: bigint): ProgramPhase {
    return getProgramPhase(this.state, now);
  }

  /** Current state. Immutable: every call swaps in a new value. */
  getState(): StakingState {
    return this.state;
  }

  // ── Observers ───────────────────────────────────────────────────

  subscribe(listener: StakingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── User operations ─────────────────────────────────────────────

  stake(ctx: CallContext, amount: bigint): void {
    ctx = this.settle(ctx);
    this.atomic(() => {
      this.requireStaker(ctx);
      requirePositive(amount, 'stake');

      this.state = updateReward(this.state, ctx.caller, ctx.now);
      this.state = increaseStake(this.state, ctx.caller, amount);
      this.stakingToken.transferFrom(this.address, ctx.caller, this.address, amount);

      this.emit({ type: 'STAKED', at: ctx.now, account: ctx.caller, amount });
    });
  }

  withdraw(ctx: CallContext, amount: bigint): void {
    ctx = this.settle(ctx);
    this.atomic(() => this.withdrawInternal(ctx, amount));
  }

  /**
   * Pay out everything owed to the caller. Returns the amount paid; nothing
   * owed is a successful no-op.
   */
  getReward(ctx: CallContext): bigint {
    ctx = this.settle(ctx);
    return this.atomic(() => this.getRewardInternal(ctx));
  }

  /**
   * Withdraw the whole stake and claim, in one call
   */
  exit(ctx: CallContext): bigint {
    ctx = this.settle(ctx);
    return this.atomic(() => {
      this.withdrawInternal(ctx, this.balanceOf(ctx.caller));
      return this.getRewardInternal(ctx);
    });
  }

  // ── Owner operations ────────────────────────────────────────────

  setRewardsDuration(ctx: CallContext, duration: bigint): void {
    ctx = this.settle(ctx);
    this.atomic(() => {
      this.requireOwner(ctx);

      if (ctx.now < this.state.program.finishAt) {
        throw new StakingError(
          StakingErrorCodes.REWARD_PERIOD_ACTIVE,
          `Reward period active until ${this.state.program.finishAt}`
        );
      }

      this.state = setDuration(this.state, duration);
      this.emit({ type: 'DURATION_UPDATED', at: ctx.now, duration });
    });
  }

  /**
   * Fund a new reward period of `duration` seconds starting now. The reward
   * tokens must already sit in the engine's custody account.
   */
  notifyRewardAmount(ctx: CallContext, amount: bigint): void {
    ctx = this.settle(ctx);
    this.atomic(() => {
      this.requireOwner(ctx);

      this.state = updateReward(this.state, null, ctx.now);
      const rate = computeRewardRate(this.state, amount, ctx.now);

      const promised = rate * this.state.program.duration;
      const held = this.rewardsToken.balanceOf(this.address);
      if (promised > held) {
        throw new StakingError(
          StakingErrorCodes.INSUFFICIENT_FUNDING,
          `Reward emission ${promised} exceeds held balance ${held}`
        );
      }

      this.state = startRewardPeriod(this.state, rate, ctx.now);
      this.emit({
        type: 'REWARD_ADDED',
        at: ctx.now,
        amount,
        rewardRate: rate,
        finishAt: this.state.program.finishAt,
      });
    });
  }

  // ── Internals ───────────────────────────────────────────────────

  private withdrawInternal(ctx: CallContext, amount: bigint): void {
    this.requireStaker(ctx);
    requirePositive(amount, 'withdraw');

    this.state = updateReward(this.state, ctx.caller, ctx.now);
    this.state = decreaseStake(this.state, ctx.caller, amount);
    this.stakingToken.transfer(this.address, ctx.caller, amount);

    this.emit({ type: 'WITHDRAWN', at: ctx.now, account: ctx.caller, amount });
  }

  private getRewardInternal(ctx: CallContext): bigint {
    this.requireStaker(ctx);
    this.state = updateReward(this.state, ctx.caller, ctx.now);

    const reward = getCheckpoint(this.state, ctx.caller).rewards;
    if (reward === 0n) {
      return 0n;
    }

    // Zeroed before paying so a re-entrant claim sees nothing owed
    this.state = clearRewards(this.state, ctx.caller);
    this.rewardsToken.transfer(this.address, ctx.caller, reward);

    this.emit({ type: 'REWARD_PAID', at: ctx.now, account: ctx.caller, amount: reward });
    return reward;
  }

  /**
   * Clamp a clock reading that lags the last checkpoint up to it, so a
   * stepped-back clock can neither re-accrue nor re-fund elapsed time.
   */
  private settle(ctx: CallContext): CallContext {
    const floor = this.state.program.updatedAt;
    return ctx.now < floor ? { ...ctx, now: floor } : ctx;
  }

  private requireStaker(ctx: CallContext): void {
    if (ctx.caller === this.address) {
      throw new StakingError(
        StakingErrorCodes.NOT_AUTHORIZED,
        `${ctx.caller} is the custody account and cannot stake or claim`
      );
    }
  }

  private requireOwner(ctx: CallContext): void {
    if (ctx.caller !== this.owner) {
      throw new StakingError(
        StakingErrorCodes.NOT_AUTHORIZED,
        `${ctx.caller} is not the owner`
      );
    }
  }

  private emit(event: StakingEvent): void {
    this.pending.push(event);
  }

  private atomic<T>(fn: () => T): T {
    const stateBefore = this.state;
    const stakingBefore: TokenSnapshot = this.stakingToken.snapshot();
    const rewardsBefore: TokenSnapshot = this.rewardsToken.snapshot();
    const pendingBefore = this.pending.length;

    this.depth++;
    let committed = false;
    try {
      const result = fn();
      committed = true;
      return result;
    } catch (err) {
      this.state = stateBefore;
      this.rewardsToken.restore(rewardsBefore);
      this.stakingToken.restore(stakingBefore);
      this.pending.length = pendingBefore;
      throw err;
    } finally {
      this.depth--;
      if (committed && this.depth === 0) {
        this.flush();
      }
    }
  }

  private flush(): void {
    const events = this.pending;
    this.pending = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        listener(event);
      }
    }
  }
}

function copyState(state: StakingState): StakingState {
  return {
    program: { ...state.program },
    balances: new Map(state.balances),
    totalSupply: state.totalSupply,
    checkpoints: new Map(state.checkpoints),
  };
}

function requirePositive(amount: bigint, operation: string): void {
  if (amount <= 0n) {
    throw new StakingError(
      StakingErrorCodes.INVALID_AMOUNT,
      `Cannot ${operation} ${amount}`
    );
  }
}
