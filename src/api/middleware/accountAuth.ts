import * as crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiState } from '../state';
import { ErrorCodes } from '../types';
import { readAccountId, sendError } from '../validation';
import { keysMatch } from './adminAuth';

const ACCOUNT_KEY_HEADER = 'x-account-key';

/** Field of the request body naming the acting account */
export type AccountField = 'accountId' | 'owner';

export function generateAccountKey(): string {
  return crypto.randomBytes(32).toString('hex');
}

export function hashAccountKey(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}

/**
 * Middleware that admits a staker call only when X-Account-Key belongs to
 * the account named in the body. The engine's custody address never has a
 * key and is refused outright.
 */
export function requireAccountKey(state: ApiState, field: AccountField): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body = req.body as Partial<Record<AccountField, unknown>> | undefined;
    const accountId = readAccountId(res, body?.[field], field);
    if (accountId === undefined) return;

    if (accountId === state.engine.address) {
      sendError(res, 403, ErrorCodes.NOT_AUTHORIZED, `${accountId} is the custody account`);
      return;
    }

    const providedKey = req.header(ACCOUNT_KEY_HEADER);
    if (!providedKey) {
      sendError(res, 401, ErrorCodes.MISSING_ACCOUNT_KEY, 'Missing X-Account-Key header');
      return;
    }

    const storedHash = state.accountKeys.get(accountId);
    if (storedHash === undefined || !keysMatch(hashAccountKey(providedKey), storedHash)) {
      sendError(res, 401, ErrorCodes.INVALID_ACCOUNT_KEY, `Invalid account key for ${accountId}`);
      return;
    }

    next();
  };
}
