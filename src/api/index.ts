// API Types
export * from './types';

// API State
export {
  ApiState,
  ApiStateOptions,
  createApiState,
  attachApiState,
  callContext,
  persistOperation,
  systemClock,
} from './state';
export { restoreApiState } from './restore';
export { loadConfig, ServerConfig } from './config';

// Express App
export { createApp, AppOptions } from './app';

// Middleware
export { requireAdminKey, getAdminKey } from './middleware/adminAuth';
export { requireAccountKey, generateAccountKey, hashAccountKey } from './middleware/accountAuth';
export { errorHandler } from './middleware/errorHandler';

// Routes
export { createProgramRouter } from './routes/program';
export { createAccountsRouter } from './routes/accounts';
export { createStakingRouter } from './routes/staking';
export { createTokensRouter } from './routes/tokens';
export { createAdminRouter } from './routes/admin';

// Scheduler
export { FundingScheduler, FundingSchedulerConfig, FundingOutcome } from './scheduler';
