import { Router, Request, Response, NextFunction } from 'express';
import { ApiState } from '../state';
import {
  AccountResponse,
  ErrorCodes,
  EventsResponse,
  RegisterAccountRequest,
  RegisterAccountResponse,
} from '../types';
import { readAccountId, sendError } from '../validation';
import { generateAccountKey, hashAccountKey } from '../middleware/accountAuth';

/**
 * Create router for per-account views
 */
export function createAccountsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /accounts/register
   * Issue the key a staker sends as X-Account-Key. Only its hash is kept.
   */
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<RegisterAccountRequest>;
    const accountId = readAccountId(res, body.accountId, 'accountId');
    if (accountId === undefined) return;

    if (accountId === state.engine.address) {
      sendError(res, 403, ErrorCodes.NOT_AUTHORIZED, `${accountId} is the custody account`);
      return;
    }

    if (state.accountKeys.has(accountId)) {
      sendError(res, 409, ErrorCodes.ACCOUNT_ALREADY_REGISTERED, `Account already registered: ${accountId}`);
      return;
    }

    const accountKey = generateAccountKey();
    const keyHash = hashAccountKey(accountKey);
    state.accountKeys.set(accountId, keyHash);

    try {
      await state.stores.accountKey.saveAccountKey(accountId, keyHash);
    } catch (err) {
      state.accountKeys.delete(accountId);
      next(err);
      return;
    }

    const response: RegisterAccountResponse = { success: true, accountId, accountKey };
    res.status(201).json(response);
  });

  /**
   * GET /accounts/:address
   * Stake, reward checkpoint and wallet balances
   */
  router.get('/:address', (req: Request, res: Response) => {
    const address = readAccountId(res, req.params.address, 'address');
    if (address === undefined) return;

    const { engine, tokens } = state;
    const response: AccountResponse = {
      success: true,
      address,
      staked: engine.balanceOf(address).toString(),
      earned: engine.earned(address, state.clock()).toString(),
      rewards: engine.rewards(address).toString(),
      userRewardPerTokenPaid: engine.userRewardPerTokenPaid(address).toString(),
      stakingTokenBalance: tokens.staking.balanceOf(address).toString(),
      rewardsTokenBalance: tokens.rewards.balanceOf(address).toString(),
      allowance: tokens.staking.allowance(address, engine.address).toString(),
    };

    res.status(200).json(response);
  });

  /**
   * GET /accounts/:address/events
   * Journal entries recorded for this account
   */
  router.get('/:address/events', async (req: Request, res: Response, next: NextFunction) => {
    const address = readAccountId(res, req.params.address, 'address');
    if (address === undefined) return;

    try {
      const events = await state.stores.event.queryByActor(address);
      const response: EventsResponse = { success: true, count: events.length, events };
      res.status(200).json(response);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
