/**
 * Cron-based funding scheduler.
 * Starts a new reward period with a fixed amount whenever the previous one has ended.
 */

import * as cron from 'node-cron';
import { ApiState, callContext, persistOperation } from './state';
import { formatUnits } from '../fixedPoint';

export interface FundingSchedulerConfig {
  cron: string;      // e.g. '0 0 * * 1' (Monday midnight)
  timezone: string;  // e.g. 'UTC'
  amount: bigint;    // base units per period
}

export type FundingOutcome =
  | { status: 'funded'; rewardRate: bigint; finishAt: bigint }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export class FundingScheduler {
  private job: cron.ScheduledTask | null = null;

  constructor(
    private state: ApiState,
    private config: FundingSchedulerConfig
  ) {}

  start(): void {
    if (!cron.validate(this.config.cron)) {
      throw new Error(`Invalid FUNDING_CRON expression: "${this.config.cron}"`);
    }

    this.job = cron.schedule(this.config.cron, () => {
      this.runOnce().catch(err => {
        console.error('Scheduler: funding run crashed:', err);
      });
    }, { timezone: this.config.timezone });

    console.log(
      `Scheduler: fund ${formatUnits(this.config.amount)} on "${this.config.cron}" (${this.config.timezone})`
    );
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  get running(): boolean {
    return this.job !== null;
  }

  /**
   * One scheduler tick. Funds only when no period is running and a duration is set.
   */
  async runOnce(): Promise<FundingOutcome> {
    const { engine } = this.state;
    const ctx = callContext(this.state, engine.owner);
    const phase = engine.programPhase(ctx.now);

    if (phase === 'ACTIVE') {
      console.log(`Scheduler: skip funding, period active until ${engine.finishAt}`);
      return { status: 'skipped', reason: 'period active' };
    }

    if (phase === 'UNCONFIGURED') {
      console.log('Scheduler: skip funding, no reward duration set');
      return { status: 'skipped', reason: 'no duration' };
    }

    try {
      engine.notifyRewardAmount(ctx, this.config.amount);
      await persistOperation(this.state);
    } catch (err) {
      console.error('Scheduler: funding failed:', err);
      return { status: 'failed', error: err instanceof Error ? err.message : String(err) };
    }

    console.log(
      `Scheduler: funded ${formatUnits(this.config.amount)}, rate ${engine.rewardRate}/s until ${engine.finishAt}`
    );
    return { status: 'funded', rewardRate: engine.rewardRate, finishAt: engine.finishAt };
  }
}
