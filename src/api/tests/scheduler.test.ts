import { FundingScheduler } from '../scheduler';
import { createTestApi, TestApi } from './helpers';
import { E18, T0 } from '../../tests/helpers';
import { ONE_WEEK } from '../../types';

const RATE = 165_343_915_343_915n;

describe('FundingScheduler', () => {
  let api: TestApi;
  let scheduler: FundingScheduler;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    api = createTestApi();
    scheduler = new FundingScheduler(api.state, { cron: '0 0 * * 1', timezone: 'UTC', amount: 100n * E18 });
  });

  afterEach(() => {
    scheduler.stop();
    jest.restoreAllMocks();
  });

  function configure(): void {
    const { engine, tokens } = api.state;
    engine.setRewardsDuration({ caller: engine.owner, now: T0 }, ONE_WEEK);
    tokens.rewards.mint(engine.address, 100n * E18);
  }

  it('should skip while no duration is set', async () => {
    expect(await scheduler.runOnce()).toEqual({ status: 'skipped', reason: 'no duration' });
  });

  it('should fund a configured program and journal it', async () => {
    configure();

    const outcome = await scheduler.runOnce();

    expect(outcome).toEqual({ status: 'funded', rewardRate: RATE, finishAt: T0 + ONE_WEEK });
    const added = await api.stores.event.queryByType('REWARD_ADDED');
    expect(added).toHaveLength(1);
    expect(added[0].actorId).toBe('owner');
  });

  it('should skip while the period is running', async () => {
    configure();
    await scheduler.runOnce();

    api.clock.now = T0 + ONE_WEEK - 1n;
    expect(await scheduler.runOnce()).toEqual({ status: 'skipped', reason: 'period active' });
  });

  it('should report a funding failure without throwing', async () => {
    configure();
    await scheduler.runOnce();
    api.clock.now = T0 + ONE_WEEK;

    const greedy = new FundingScheduler(api.state, { cron: '0 0 * * 1', timezone: 'UTC', amount: 200n * E18 });
    const outcome = await greedy.runOnce();

    expect(outcome).toEqual({
      status: 'failed',
      error: 'Reward emission 199999999999999584000 exceeds held balance 100000000000000000000',
    });
    expect(api.state.engine.finishAt).toBe(T0 + ONE_WEEK);
  });

  it('should reject an invalid cron expression', () => {
    const broken = new FundingScheduler(api.state, { cron: 'every monday', timezone: 'UTC', amount: 1n });
    expect(() => broken.start()).toThrow('Invalid FUNDING_CRON expression: "every monday"');
    expect(broken.running).toBe(false);
  });

  it('should start and stop the cron job', () => {
    scheduler.start();
    expect(scheduler.running).toBe(true);
    scheduler.stop();
    expect(scheduler.running).toBe(false);
  });
});
