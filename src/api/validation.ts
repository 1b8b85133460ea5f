import { Response } from 'express';
import { parseUint } from '../fixedPoint';
import { ErrorCode, ErrorCodes, ErrorResponse } from './types';

/** Validate account id format: 1-64 chars, no control characters */
export function isValidAccountId(id: unknown): id is string {
  return typeof id === 'string' && id.length >= 1 && id.length <= 64 && !/[\x00-\x1f]/.test(id);
}

export function sendError(res: Response, status: number, code: ErrorCode, error: string): void {
  const body: ErrorResponse = { success: false, error, code };
  res.status(status).json(body);
}

/**
 * Read an account id from the request, answering 400 when it is malformed
 */
export function readAccountId(res: Response, value: unknown, field: string): string | undefined {
  if (!isValidAccountId(value)) {
    sendError(res, 400, ErrorCodes.INVALID_REQUEST, `Invalid ${field}`);
    return undefined;
  }
  return value;
}

/**
 * Read a uint256 decimal string from the request, answering 400 when it is malformed
 */
export function readUint(res: Response, value: unknown, field: string): bigint | undefined {
  try {
    return parseUint(value, field);
  } catch (err) {
    sendError(res, 400, ErrorCodes.INVALID_REQUEST, err instanceof Error ? err.message : String(err));
    return undefined;
  }
}
