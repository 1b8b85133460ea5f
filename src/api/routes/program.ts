import { Router, Request, Response } from 'express';
import { ApiState } from '../state';
import { ProgramResponse } from '../types';

/**
 * Create router for the reward program view
 */
export function createProgramRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /program
   * Program accessors evaluated at the current time
   */
  router.get('/', (_req: Request, res: Response) => {
    const { engine, tokens } = state;
    const now = state.clock();

    const response: ProgramResponse = {
      success: true,
      now: now.toString(),
      phase: engine.programPhase(now),
      owner: engine.owner,
      address: engine.address,
      duration: engine.duration.toString(),
      finishAt: engine.finishAt.toString(),
      updatedAt: engine.updatedAt.toString(),
      rewardRate: engine.rewardRate.toString(),
      rewardPerTokenStored: engine.rewardPerTokenStored.toString(),
      rewardPerToken: engine.rewardPerToken(now).toString(),
      lastTimeRewardApplicable: engine.lastTimeRewardApplicable(now).toString(),
      rewardForDuration: engine.getRewardForDuration().toString(),
      totalSupply: engine.totalSupply.toString(),
      stakingToken: {
        symbol: tokens.staking.symbol,
        held: tokens.staking.balanceOf(engine.address).toString(),
      },
      rewardsToken: {
        symbol: tokens.rewards.symbol,
        held: tokens.rewards.balanceOf(engine.address).toString(),
      },
    };

    res.status(200).json(response);
  });

  return router;
}
