import * as crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ErrorCodes } from '../types';
import { sendError } from '../validation';

const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Get the admin key from environment or use default for testing
 */
export function getAdminKey(): string {
  return process.env.ADMIN_KEY || 'test-admin-key';
}

export function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Middleware that admits only callers presenting X-Admin-Key.
 * Admitted callers act as the engine owner.
 */
export function requireAdminKey(expectedKey: string = getAdminKey()): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const providedKey = req.header(ADMIN_KEY_HEADER);

    if (!providedKey) {
      sendError(res, 401, ErrorCodes.MISSING_ADMIN_KEY, 'Missing X-Admin-Key header');
      return;
    }

    if (!keysMatch(providedKey, expectedKey)) {
      sendError(res, 401, ErrorCodes.INVALID_ADMIN_KEY, 'Invalid admin key');
      return;
    }

    next();
  };
}
