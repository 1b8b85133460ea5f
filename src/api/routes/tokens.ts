import { Router, Request, Response, NextFunction } from 'express';
import { ApiState, persistOperation } from '../state';
import { ApproveRequest, ErrorCodes, TokenBalanceResponse, isTokenKind } from '../types';
import { InMemoryToken } from '../../token';
import { readAccountId, readUint, sendError } from '../validation';
import { requireAccountKey } from '../middleware/accountAuth';

/**
 * Resolve :kind to a ledger, answering 404 for anything else
 */
export function resolveToken(state: ApiState, res: Response, kind: string): InMemoryToken | undefined {
  if (!isTokenKind(kind)) {
    sendError(res, 404, ErrorCodes.UNKNOWN_TOKEN, `Unknown token: ${kind}`);
    return undefined;
  }
  return state.tokens[kind];
}

/**
 * Create router for token ledger endpoints
 */
export function createTokensRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /tokens/:kind/balances/:account
   */
  router.get('/:kind/balances/:account', (req: Request, res: Response) => {
    const token = resolveToken(state, res, req.params.kind);
    if (!token) return;
    const account = readAccountId(res, req.params.account, 'account');
    if (account === undefined) return;

    const response: TokenBalanceResponse = {
      success: true,
      token: token.symbol,
      account,
      balance: token.balanceOf(account).toString(),
      totalSupply: token.totalSupply().toString(),
    };
    res.status(200).json(response);
  });

  const requireOwnerKey = requireAccountKey(state, 'owner');

  /**
   * POST /tokens/:kind/approve
   * Set the engine's allowance over `owner`'s tokens (needs the owner's X-Account-Key)
   */
  router.post('/:kind/approve', requireOwnerKey, async (req: Request, res: Response, next: NextFunction) => {
    const token = resolveToken(state, res, req.params.kind);
    if (!token) return;
    const body = req.body as Partial<ApproveRequest>;
    const owner = readAccountId(res, body.owner, 'owner');
    if (owner === undefined) return;
    const amount = readUint(res, body.amount, 'amount');
    if (amount === undefined) return;

    try {
      token.approve(owner, state.engine.address, amount);
      await persistOperation(state);
      res.status(200).json({
        success: true,
        token: token.symbol,
        owner,
        spender: state.engine.address,
        allowance: token.allowance(owner, state.engine.address).toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
