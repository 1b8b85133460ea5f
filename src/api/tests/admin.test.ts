import request from 'supertest';
import { ErrorCodes } from '../types';
import { ADMIN_KEY, TestApi, createTestApi, fundStaker, startProgram } from './helpers';
import { E18, T0 } from '../../tests/helpers';
import { ONE_DAY, ONE_WEEK } from '../../types';

describe('/admin endpoints', () => {
  let api: TestApi;

  beforeEach(() => {
    api = createTestApi();
  });

  describe('authentication', () => {
    it('should reject without X-Admin-Key header', async () => {
      const response = await request(api.app).post('/admin/duration').send({ duration: '100' });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe(ErrorCodes.MISSING_ADMIN_KEY);
      expect(api.state.engine.duration).toBe(0n);
    });

    it('should reject with invalid admin key', async () => {
      const response = await request(api.app)
        .post('/admin/duration')
        .set('X-Admin-Key', 'wrong-key')
        .send({ duration: '100' });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe(ErrorCodes.INVALID_ADMIN_KEY);
    });
  });

  describe('POST /admin/duration', () => {
    it('should set the duration as the owner', async () => {
      const response = await request(api.app)
        .post('/admin/duration')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ duration: '604800' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, duration: '604800', sequenceNumber: 0 });
    });

    it('should refuse while a period is running', async () => {
      await startProgram(api.app, 100n * E18, ONE_WEEK);
      api.clock.now = T0 + ONE_DAY;

      const response = await request(api.app)
        .post('/admin/duration')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ duration: '100' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        success: false,
        error: `Reward period active until ${T0 + ONE_WEEK}`,
        code: ErrorCodes.REWARD_PERIOD_ACTIVE,
      });
    });
  });

  describe('POST /admin/fund', () => {
    it('should start a period and report the rate', async () => {
      await startProgram(api.app, 100n * E18, ONE_WEEK);

      const response = await request(api.app).get('/program');

      expect(response.status).toBe(200);
      expect(response.body.phase).toBe('ACTIVE');
      expect(response.body.rewardRate).toBe('165343915343915');
      expect(response.body.finishAt).toBe((T0 + ONE_WEEK).toString());
      expect(response.body.rewardForDuration).toBe('99999999999999792000');
      expect(response.body.rewardsToken).toEqual({ symbol: 'RWD', held: '100000000000000000000' });
    });

    it('should need a duration first', async () => {
      const response = await request(api.app)
        .post('/admin/fund')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ amount: '1000' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        success: false,
        error: 'Reward duration is not set',
        code: ErrorCodes.ZERO_REWARD_RATE,
      });
    });

    it('should refuse to promise more than the engine holds', async () => {
      await request(api.app)
        .post('/admin/duration')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ duration: ONE_WEEK.toString() })
        .expect(200);

      const response = await request(api.app)
        .post('/admin/fund')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ amount: (100n * E18).toString() });

      expect(response.status).toBe(422);
      expect(response.body.code).toBe(ErrorCodes.INSUFFICIENT_FUNDING);
      expect(response.body.error).toBe('Reward emission 99999999999999792000 exceeds held balance 0');
      expect(api.state.engine.finishAt).toBe(0n);
    });
  });

  describe('token administration', () => {
    it('should mint to any account', async () => {
      const response = await request(api.app)
        .post('/admin/tokens/staking/mint')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ to: 'carol', amount: '500' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, token: 'STK', to: 'carol', balance: '500', totalSupply: '500' });
    });

    it('should refuse to mint zero', async () => {
      const response = await request(api.app)
        .post('/admin/tokens/rewards/mint')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ to: 'carol', amount: '0' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.INVALID_AMOUNT);
    });

    it('should answer 404 for an unknown token', async () => {
      const response = await request(api.app)
        .post('/admin/tokens/gold/mint')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ to: 'carol', amount: '1' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'Unknown token: gold', code: ErrorCodes.UNKNOWN_TOKEN });
    });

    it('should not deposit more than the owner holds', async () => {
      const response = await request(api.app)
        .post('/admin/rewards/deposit')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ amount: '1' });

      expect(response.status).toBe(422);
      expect(response.body.error).toBe('RWD: transfer amount 1 exceeds balance 0 of owner');
    });

    it('should show balances through the token view', async () => {
      await fundStaker(api.app, 'dave', 42n);

      const response = await request(api.app).get('/tokens/staking/balances/dave');

      expect(response.body).toEqual({
        success: true,
        token: 'STK',
        account: 'dave',
        balance: '42',
        totalSupply: '42',
      });
    });
  });

  describe('GET /admin/events', () => {
    beforeEach(async () => {
      const aliceKey = await fundStaker(api.app, 'alice', 10n);
      const bobKey = await fundStaker(api.app, 'bob', 10n);
      await request(api.app)
        .post('/staking/stake')
        .set('X-Account-Key', aliceKey)
        .send({ accountId: 'alice', amount: '5' })
        .expect(200);
      await request(api.app)
        .post('/staking/stake')
        .set('X-Account-Key', bobKey)
        .send({ accountId: 'bob', amount: '5' })
        .expect(200);
      await request(api.app)
        .post('/staking/withdraw')
        .set('X-Account-Key', aliceKey)
        .send({ accountId: 'alice', amount: '5' })
        .expect(200);
    });

    it('should filter by type', async () => {
      const response = await request(api.app)
        .get('/admin/events?type=STAKED')
        .set('X-Admin-Key', ADMIN_KEY);

      expect(response.body.count).toBe(2);
      expect(response.body.events.map((e: { actorId: string }) => e.actorId)).toEqual(['alice', 'bob']);
    });

    it('should filter by type and actor together', async () => {
      const response = await request(api.app)
        .get('/admin/events?type=STAKED&actor=bob')
        .set('X-Admin-Key', ADMIN_KEY);

      expect(response.body.count).toBe(1);
      expect(response.body.events[0].sequenceNumber).toBe(1);
    });

    it('should reject an unknown type', async () => {
      const response = await request(api.app)
        .get('/admin/events?type=MINTED')
        .set('X-Admin-Key', ADMIN_KEY);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Unknown event type: MINTED');
    });
  });

  describe('GET /admin/verify', () => {
    it('should confirm an intact journal', async () => {
      const aliceKey = await fundStaker(api.app, 'alice', 10n);
      await request(api.app)
        .post('/staking/stake')
        .set('X-Account-Key', aliceKey)
        .send({ accountId: 'alice', amount: '5' })
        .expect(200);

      const response = await request(api.app).get('/admin/verify').set('X-Admin-Key', ADMIN_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        eventCount: 1,
        hashChainValid: true,
        snapshotValid: true,
        errors: [],
      });
    });
  });
});

describe('GET /health', () => {
  it('should summarize the engine', async () => {
    const { app } = createTestApi();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'ok',
      phase: 'UNCONFIGURED',
      stakers: 0,
      totalSupply: '0',
      pendingEvents: 0,
    });
  });
});
