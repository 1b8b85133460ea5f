import { Request, Response, NextFunction } from 'express';
import { isStakingError } from '../../errors';
import { ErrorCodes, STAKING_ERROR_STATUS } from '../types';
import { sendError } from '../validation';

/**
 * Global error handler. Engine rejections keep their code; anything else is a 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isStakingError(err)) {
    sendError(res, STAKING_ERROR_STATUS[err.code], err.code, err.message);
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    sendError(res, 400, ErrorCodes.INVALID_REQUEST, 'Malformed JSON body');
    return;
  }

  console.error('Unhandled error:', err);
  sendError(res, 500, ErrorCodes.INTERNAL_ERROR, 'Internal server error');
}
