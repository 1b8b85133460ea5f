import { Router, Request, Response, NextFunction } from 'express';
import { requireAdminKey } from '../middleware/adminAuth';
import { ApiState, callContext, persistOperation } from '../state';
import { resolveToken } from './tokens';
import {
  DurationRequest,
  ErrorCodes,
  EventsResponse,
  FundRequest,
  FundResponse,
  MintRequest,
} from '../types';
import { readAccountId, readUint, sendError } from '../validation';
import { auditJournal } from '../../persistence/auditJournal';
import { DomainEventType, GENESIS_HASH, isDomainEventType } from '../../persistence/eventTypes';

/**
 * Create router for admin endpoints. Every call acts as the engine owner.
 */
export function createAdminRouter(state: ApiState, adminKey?: string): Router {
  const router = Router();

  // All admin routes require X-Admin-Key
  router.use(requireAdminKey(adminKey));

  const asOwner = () => callContext(state, state.engine.owner);

  /**
   * POST /admin/duration
   * Set the length of the next reward period
   */
  router.post('/duration', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<DurationRequest>;
    const duration = readUint(res, body.duration, 'duration');
    if (duration === undefined) return;

    try {
      state.engine.setRewardsDuration(asOwner(), duration);
      const { snapshot } = await persistOperation(state);
      res.status(200).json({
        success: true,
        duration: state.engine.duration.toString(),
        sequenceNumber: snapshot.sequenceNumber,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /admin/fund
   * Start or top up the reward period with `amount` already in custody
   */
  router.post('/fund', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<FundRequest>;
    const amount = readUint(res, body.amount, 'amount');
    if (amount === undefined) return;

    try {
      state.engine.notifyRewardAmount(asOwner(), amount);
      const { snapshot } = await persistOperation(state);
      const response: FundResponse = {
        success: true,
        amount: amount.toString(),
        rewardRate: state.engine.rewardRate.toString(),
        finishAt: state.engine.finishAt.toString(),
        sequenceNumber: snapshot.sequenceNumber,
      };
      res.status(200).json(response);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /admin/tokens/:kind/mint
   */
  router.post('/tokens/:kind/mint', async (req: Request, res: Response, next: NextFunction) => {
    const token = resolveToken(state, res, req.params.kind);
    if (!token) return;
    const body = req.body as Partial<MintRequest>;
    const to = readAccountId(res, body.to, 'to');
    if (to === undefined) return;
    const amount = readUint(res, body.amount, 'amount');
    if (amount === undefined) return;
    if (amount === 0n) {
      sendError(res, 400, ErrorCodes.INVALID_AMOUNT, 'Cannot mint 0');
      return;
    }

    try {
      token.mint(to, amount);
      await persistOperation(state);
      res.status(200).json({
        success: true,
        token: token.symbol,
        to,
        balance: token.balanceOf(to).toString(),
        totalSupply: token.totalSupply().toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /admin/rewards/deposit
   * Move reward tokens from the owner into the engine's custody
   */
  router.post('/rewards/deposit', async (req: Request, res: Response, next: NextFunction) => {
    const body = req.body as Partial<FundRequest>;
    const amount = readUint(res, body.amount, 'amount');
    if (amount === undefined) return;

    try {
      const { engine, tokens } = state;
      tokens.rewards.transfer(engine.owner, engine.address, amount);
      await persistOperation(state);
      res.status(200).json({
        success: true,
        held: tokens.rewards.balanceOf(engine.address).toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /admin/events?type=STAKED&actor=alice
   * Journal entries, optionally filtered
   */
  router.get('/events', async (req: Request, res: Response, next: NextFunction) => {
    const { type, actor } = req.query;

    let eventType: DomainEventType | undefined;
    if (type !== undefined) {
      if (typeof type !== 'string' || !isDomainEventType(type)) {
        sendError(res, 400, ErrorCodes.INVALID_REQUEST, `Unknown event type: ${String(type)}`);
        return;
      }
      eventType = type;
    }
    if (actor !== undefined && typeof actor !== 'string') {
      sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'Invalid actor');
      return;
    }

    try {
      let events = eventType
        ? await state.stores.event.queryByType(eventType)
        : await state.stores.event.listAll();
      if (typeof actor === 'string') {
        events = events.filter(e => e.actorId === actor);
      }
      const response: EventsResponse = { success: true, count: events.length, events };
      res.status(200).json(response);
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /admin/verify
   * Re-check the journal hash chain and the latest snapshot
   */
  router.get('/verify', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await auditJournal(state.stores, GENESIS_HASH);
      res.status(200).json({ success: true, ...report });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
