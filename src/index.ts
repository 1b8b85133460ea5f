// Engine
export { StakingRewards, StakingRewardsOptions } from './stakingRewards';
export * from './rewardAccrual';
export * from './types';
export * from './errors';
export * from './fixedPoint';

// Tokens
export * from './token';

// Persistence
export * from './persistence';

// HTTP API
export * from './api';
