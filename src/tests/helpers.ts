/**
 * Shared fixtures for engine tests.
 */

import { StakingRewards } from '../stakingRewards';
import { InMemoryToken } from '../token';
import { StakingError, StakingErrorCode } from '../errors';
import { MAX_UINT256 } from '../fixedPoint';
import { StakingEvent } from '../types';

export const E18 = 10n ** 18n;
export const T0 = 1_700_000_000n;

export const OWNER = 'owner';
export const ENGINE = 'staking-rewards';
export const ALICE = 'alice';
export const BOB = 'bob';

export interface Fixture {
  engine: StakingRewards;
  stakingToken: InMemoryToken;
  rewardsToken: InMemoryToken;
  events: StakingEvent[];
}

/**
 * Engine with 1000 staking tokens and an unlimited approval for each user,
 * and `rewardFunds` reward tokens already in the engine's custody.
 */
export function createFixture(rewardFunds: bigint = 1_000n * E18, users: string[] = [ALICE, BOB]): Fixture {
  const stakingToken = new InMemoryToken('STK');
  const rewardsToken = new InMemoryToken('RWD');
  const engine = new StakingRewards({
    owner: OWNER,
    address: ENGINE,
    stakingToken,
    rewardsToken,
  });

  for (const user of users) {
    stakingToken.mint(user, 1_000n * E18);
    stakingToken.approve(user, ENGINE, MAX_UINT256);
  }
  rewardsToken.mint(ENGINE, rewardFunds);

  const events: StakingEvent[] = [];
  engine.subscribe(event => events.push(event));

  return { engine, stakingToken, rewardsToken, events };
}

/**
 * Run `fn` and return the StakingError it throws
 */
export function catchStakingError(fn: () => unknown): StakingError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StakingError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a StakingError to be thrown');
}

export function expectStakingError(fn: () => unknown, code: StakingErrorCode): void {
  expect(catchStakingError(fn).code).toBe(code);
}
