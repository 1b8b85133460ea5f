/**
 * Test helpers for the HTTP layer: an app on in-memory stores with a
 * hand-driven clock.
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../app';
import { ApiState, DEFAULT_OWNER, createApiState } from '../state';
import { createInMemoryStores } from '../../persistence/inMemoryStores';
import { Stores } from '../../persistence/interfaces';
import { T0 } from '../../tests/helpers';

export const ADMIN_KEY = 'test-admin-key';

export interface TestClock {
  now: bigint;
}

export interface TestApi {
  app: Express;
  state: ApiState;
  stores: Stores;
  clock: TestClock;
}

export function createTestApi(stores: Stores = createInMemoryStores()): TestApi {
  const clock: TestClock = { now: T0 };
  const state = createApiState(stores, { clock: () => clock.now });
  const app = createApp(state, { adminKey: ADMIN_KEY });
  return { app, state, stores, clock };
}

/**
 * Register `account` and return its X-Account-Key
 */
export async function registerAccount(app: Express, account: string): Promise<string> {
  const response = await request(app).post('/accounts/register').send({ accountId: account }).expect(201);
  return response.body.accountKey;
}

/**
 * Register `account`, mint it staking tokens and approve the engine for all
 * of them. Returns the account key.
 */
export async function fundStaker(app: Express, account: string, amount: bigint): Promise<string> {
  const accountKey = await registerAccount(app, account);
  await request(app)
    .post('/admin/tokens/staking/mint')
    .set('X-Admin-Key', ADMIN_KEY)
    .send({ to: account, amount: amount.toString() })
    .expect(200);
  await request(app)
    .post('/tokens/staking/approve')
    .set('X-Account-Key', accountKey)
    .send({ owner: account, amount: amount.toString() })
    .expect(200);
  return accountKey;
}

/**
 * Put `amount` reward tokens in custody and start a period of `duration` seconds
 */
export async function startProgram(app: Express, amount: bigint, duration: bigint): Promise<void> {
  await request(app)
    .post('/admin/tokens/rewards/mint')
    .set('X-Admin-Key', ADMIN_KEY)
    .send({ to: DEFAULT_OWNER, amount: amount.toString() })
    .expect(200);
  await request(app)
    .post('/admin/rewards/deposit')
    .set('X-Admin-Key', ADMIN_KEY)
    .send({ amount: amount.toString() })
    .expect(200);
  await request(app)
    .post('/admin/duration')
    .set('X-Admin-Key', ADMIN_KEY)
    .send({ duration: duration.toString() })
    .expect(200);
  await request(app)
    .post('/admin/fund')
    .set('X-Admin-Key', ADMIN_KEY)
    .send({ amount: amount.toString() })
    .expect(200);
}
