import { captureEngineSnapshot, rebuildEngine } from '../engineSnapshot';
import { serializeEngineSnapshot, deserializeEngineSnapshot } from '../stateSerializer';
import { computeStateHash } from '../eventBuilder';
import { StakingRewards } from '../../stakingRewards';
import { InMemoryToken } from '../../token';
import { ONE_DAY, ONE_WEEK } from '../../types';
import { ALICE, BOB, E18, ENGINE, OWNER, T0, createFixture } from '../../tests/helpers';

const at = (caller: string, now: bigint) => ({ caller, now });

describe('engine snapshots', () => {
  function runningProgram() {
    const fixture = createFixture();
    const { engine } = fixture;
    engine.setRewardsDuration(at(OWNER, T0), ONE_WEEK);
    engine.notifyRewardAmount(at(OWNER, T0), 100n * E18);
    engine.stake(at(ALICE, T0), 10n * E18);
    engine.stake(at(BOB, T0 + ONE_DAY), 30n * E18);
    return fixture;
  }

  it('should survive JSON serialization unchanged', () => {
    const { engine } = runningProgram();
    const snapshot = captureEngineSnapshot(engine);

    const restored = deserializeEngineSnapshot(serializeEngineSnapshot(snapshot));

    expect(restored).toEqual(snapshot);
    expect(computeStateHash(restored)).toBe(computeStateHash(snapshot));
  });

  it('should keep allowances in the serialized ledger', () => {
    const { engine } = runningProgram();
    const json = serializeEngineSnapshot(captureEngineSnapshot(engine));
    const restored = deserializeEngineSnapshot(json);

    const allowances = new Map(restored.stakingToken.ledger.allowances);
    expect(allowances.size).toBe(2);
  });

  it('should rebuild an engine that accrues the same rewards', () => {
    const { engine, stakingToken, rewardsToken } = runningProgram();
    const later = T0 + 3n * ONE_DAY;

    const rebuilt = rebuildEngine(
      deserializeEngineSnapshot(serializeEngineSnapshot(captureEngineSnapshot(engine)))
    );

    expect(rebuilt.engine.owner).toBe(OWNER);
    expect(rebuilt.engine.address).toBe(ENGINE);
    expect(rebuilt.engine.getState()).toEqual(engine.getState());
    expect(rebuilt.engine.earned(ALICE, later)).toBe(engine.earned(ALICE, later));
    expect(rebuilt.engine.earned(BOB, later)).toBe(engine.earned(BOB, later));
    expect(rebuilt.stakingToken.balanceOf(ENGINE)).toBe(stakingToken.balanceOf(ENGINE));
    expect(rebuilt.rewardsToken.balanceOf(ENGINE)).toBe(rewardsToken.balanceOf(ENGINE));
    expect(rebuilt.stakingToken).not.toBe(rebuilt.rewardsToken);
  });

  it('should let the rebuilt engine keep operating', () => {
    const { engine } = runningProgram();
    const rebuilt = rebuildEngine(captureEngineSnapshot(engine));

    const paid = rebuilt.engine.getReward(at(ALICE, T0 + ONE_WEEK));

    expect(paid).toBe(engine.earned(ALICE, T0 + ONE_WEEK));
    expect(rebuilt.rewardsToken.balanceOf(ALICE)).toBe(paid);
  });

  it('should restore a shared staking and rewards token as one ledger', () => {
    const token = new InMemoryToken('SAME');
    const engine = new StakingRewards({ owner: OWNER, address: ENGINE, stakingToken: token, rewardsToken: token });
    token.mint(ENGINE, 50n * E18);

    const rebuilt = rebuildEngine(captureEngineSnapshot(engine));

    expect(rebuilt.stakingToken).toBe(rebuilt.rewardsToken);
    expect(rebuilt.stakingToken.balanceOf(ENGINE)).toBe(50n * E18);
  });

  it('should keep two ledgers with the same symbol apart', () => {
    const stakingToken = new InMemoryToken('TKN');
    const rewardsToken = new InMemoryToken('TKN');
    const engine = new StakingRewards({ owner: OWNER, address: ENGINE, stakingToken, rewardsToken });
    stakingToken.mint(ALICE, 10n * E18);
    rewardsToken.mint(ENGINE, 100n * E18);

    const snapshot = deserializeEngineSnapshot(serializeEngineSnapshot(captureEngineSnapshot(engine)));
    const rebuilt = rebuildEngine(snapshot);

    expect(snapshot.sharedLedger).toBe(false);
    expect(rebuilt.stakingToken).not.toBe(rebuilt.rewardsToken);
    expect(rebuilt.engine.rewardsToken).toBe(rebuilt.rewardsToken);
    expect(rebuilt.rewardsToken.balanceOf(ENGINE)).toBe(100n * E18);
    expect(rebuilt.stakingToken.balanceOf(ENGINE)).toBe(0n);
    expect(rebuilt.stakingToken.balanceOf(ALICE)).toBe(10n * E18);
  });
});
