export const StakingErrorCodes = {
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  REWARD_PERIOD_ACTIVE: 'REWARD_PERIOD_ACTIVE',
  ZERO_REWARD_RATE: 'ZERO_REWARD_RATE',
  INSUFFICIENT_FUNDING: 'INSUFFICIENT_FUNDING',
} as const;

export type StakingErrorCode = (typeof StakingErrorCodes)[keyof typeof StakingErrorCodes];

/**
 * Failure raised by the engine or a token ledger. Aborts the whole call.
 */
export class StakingError extends Error {
  readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string) {
    super(message);
    this.name = 'StakingError';
    this.code = code;
  }
}

export function isStakingError(err: unknown): err is StakingError {
  return err instanceof StakingError;
}
