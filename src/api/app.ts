import express, { Express, Request, Response } from 'express';
import { ApiState } from './state';
import { createProgramRouter } from './routes/program';
import { createAccountsRouter } from './routes/accounts';
import { createStakingRouter } from './routes/staking';
import { createTokensRouter } from './routes/tokens';
import { createAdminRouter } from './routes/admin';
import { errorHandler } from './middleware/errorHandler';

export interface AppOptions {
  /** Defaults to ADMIN_KEY from the environment */
  adminKey?: string;
}

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState, options: AppOptions = {}): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const now = state.clock();
    res.json({
      status: 'ok',
      phase: state.engine.programPhase(now),
      stakers: state.engine.getState().balances.size,
      totalSupply: state.engine.totalSupply.toString(),
      pendingEvents: state.journal.pendingCount,
    });
  });

  // Mount routes
  app.use('/program', createProgramRouter(state));
  app.use('/accounts', createAccountsRouter(state));
  app.use('/staking', createStakingRouter(state));
  app.use('/tokens', createTokensRouter(state));
  app.use('/admin', createAdminRouter(state, options.adminKey));

  // Global error handler
  app.use(errorHandler);

  return app;
}
