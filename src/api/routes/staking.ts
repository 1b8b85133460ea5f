import { Router, Request, Response, NextFunction } from 'express';
import { ApiState, callContext, persistOperation } from '../state';
import { AccountRequest, AmountRequest, StakingOperationResponse } from '../types';
import { readAccountId, readUint } from '../validation';
import { requireAccountKey } from '../middleware/accountAuth';

type AmountOperation = 'stake' | 'withdraw';

/**
 * Create router for staker operations
 */
export function createStakingRouter(state: ApiState): Router {
  const router = Router();

  // Every staker call acts as the account named in the body
  router.use(requireAccountKey(state, 'accountId'));

  async function respond(res: Response, accountId: string, paid?: bigint): Promise<void> {
    const { snapshot } = await persistOperation(state);
    const response: StakingOperationResponse = {
      success: true,
      accountId,
      staked: state.engine.balanceOf(accountId).toString(),
      totalSupply: state.engine.totalSupply.toString(),
      paid: paid?.toString(),
      sequenceNumber: snapshot.sequenceNumber,
    };
    res.status(200).json(response);
  }

  function amountRoute(operation: AmountOperation) {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const body = req.body as Partial<AmountRequest>;
      const accountId = readAccountId(res, body.accountId, 'accountId');
      if (accountId === undefined) return;
      const amount = readUint(res, body.amount, 'amount');
      if (amount === undefined) return;

      try {
        const ctx = callContext(state, accountId);
        if (operation === 'stake') {
          state.engine.stake(ctx, amount);
        } else {
          state.engine.withdraw(ctx, amount);
        }
        await respond(res, accountId);
      } catch (err) {
        next(err);
      }
    };
  }

  /**
   * POST /staking/stake
   * Pull `amount` staking tokens from the caller (needs an allowance)
   */
  router.post('/stake', amountRoute('stake'));

  /**
   * POST /staking/withdraw
   */
  router.post('/withdraw', amountRoute('withdraw'));

  /**
   * POST /staking/claim
   * Pay out everything earned so far
   */
  router.post('/claim', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<AccountRequest>;
    const accountId = readAccountId(res, body.accountId, 'accountId');
    if (accountId === undefined) return;

    try {
      const paid = state.engine.getReward(callContext(state, accountId));
      await respond(res, accountId, paid);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /staking/exit
   * Withdraw the whole stake and claim
   */
  router.post('/exit', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<AccountRequest>;
    const accountId = readAccountId(res, body.accountId, 'accountId');
    if (accountId === undefined) return;

    try {
      const paid = state.engine.exit(callContext(state, accountId));
      await respond(res, accountId, paid);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
