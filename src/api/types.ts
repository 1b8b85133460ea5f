import { StakingErrorCode, StakingErrorCodes } from '../errors';
import { ProgramPhase } from '../types';
import { DomainEvent } from '../persistence/eventTypes';

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  ...StakingErrorCodes,
  MISSING_ADMIN_KEY: 'MISSING_ADMIN_KEY',
  INVALID_ADMIN_KEY: 'INVALID_ADMIN_KEY',
  MISSING_ACCOUNT_KEY: 'MISSING_ACCOUNT_KEY',
  INVALID_ACCOUNT_KEY: 'INVALID_ACCOUNT_KEY',
  ACCOUNT_ALREADY_REGISTERED: 'ACCOUNT_ALREADY_REGISTERED',
  INVALID_REQUEST: 'INVALID_REQUEST',
  UNKNOWN_TOKEN: 'UNKNOWN_TOKEN',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}

/**
 * HTTP status for a rejected engine call
 */
export const STAKING_ERROR_STATUS: Record<StakingErrorCode, number> = {
  INVALID_AMOUNT: 400,
  NOT_AUTHORIZED: 403,
  REWARD_PERIOD_ACTIVE: 409,
  INSUFFICIENT_BALANCE: 422,
  ZERO_REWARD_RATE: 422,
  INSUFFICIENT_FUNDING: 422,
};

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind = 'staking' | 'rewards';

export function isTokenKind(value: string): value is TokenKind {
  return value === 'staking' || value === 'rewards';
}

// ============================================================================
// Requests
// (amounts are base-unit integer strings)
// ============================================================================

export interface AmountRequest {
  accountId: string;
  amount: string;
}

export interface AccountRequest {
  accountId: string;
}

export interface RegisterAccountRequest {
  accountId: string;
}

export interface ApproveRequest {
  owner: string;
  amount: string;
}

export interface DurationRequest {
  duration: string;
}

export interface FundRequest {
  amount: string;
}

export interface MintRequest {
  to: string;
  amount: string;
}

// ============================================================================
// Responses
// ============================================================================

export interface ProgramResponse {
  success: true;
  now: string;
  phase: ProgramPhase;
  owner: string;
  address: string;
  duration: string;
  finishAt: string;
  updatedAt: string;
  rewardRate: string;
  rewardPerTokenStored: string;
  rewardPerToken: string;
  lastTimeRewardApplicable: string;
  rewardForDuration: string;
  totalSupply: string;
  stakingToken: { symbol: string; held: string };
  rewardsToken: { symbol: string; held: string };
}

export interface RegisterAccountResponse {
  success: true;
  accountId: string;
  /** Shown once; send it as X-Account-Key */
  accountKey: string;
}

export interface AccountResponse {
  success: true;
  address: string;
  staked: string;
  earned: string;
  rewards: string;
  userRewardPerTokenPaid: string;
  stakingTokenBalance: string;
  rewardsTokenBalance: string;
  allowance: string;
}

export interface StakingOperationResponse {
  success: true;
  accountId: string;
  staked: string;
  totalSupply: string;
  /** Reward paid out by claim or exit */
  paid?: string;
  sequenceNumber: number;
}

export interface FundResponse {
  success: true;
  amount: string;
  rewardRate: string;
  finishAt: string;
  sequenceNumber: number;
}

export interface TokenBalanceResponse {
  success: true;
  token: string;
  account: string;
  balance: string;
  totalSupply: string;
}

export interface EventsResponse {
  success: true;
  count: number;
  events: DomainEvent[];
}
