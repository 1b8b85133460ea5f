/**
 * Fixed-Point Arithmetic for Reward Accounting
 *
 * Token amounts are bigint base units with 18 decimals (1 token = 1e18 units).
 * Reward-per-token values carry an extra SCALE factor so that integer division
 * of small rates by large supplies does not truncate to zero.
 */

/**
 * Decimals of every token the engine handles
 */
export const TOKEN_DECIMALS = 18;

/**
 * Fixed-point factor applied to reward-per-token values (1e18)
 */
export const SCALE = 10n ** 18n;

/**
 * Largest value an unsigned 256-bit ledger slot can hold
 */
export const MAX_UINT256 = 2n ** 256n - 1n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a human-readable decimal string into base units
 *
 * @throws Error if the string is not a plain non-negative decimal or has more
 * fractional digits than `decimals`
 */
export function parseUnits(value: string, decimals: number = TOKEN_DECIMALS): bigint {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid decimal amount: "${value}"`);
  }

  const [, whole, fraction = ''] = match;
  if (fraction.length > decimals) {
    throw new Error(`Too many decimal places in "${value}" (max ${decimals})`);
  }

  const base = 10n ** BigInt(decimals);
  return BigInt(whole) * base + BigInt(fraction.padEnd(decimals, '0') || '0');
}

/**
 * Format base units as a decimal string, trimming trailing zeros
 *
 * Example: formatUnits(1_500_000_000_000_000_000n) === "1.5"
 */
export function formatUnits(amount: bigint, decimals: number = TOKEN_DECIMALS): string {
  if (amount < 0n) {
    throw new Error(`Cannot format negative amount: ${amount}`);
  }

  const base = 10n ** BigInt(decimals);
  const whole = amount / base;
  const fraction = (amount % base).toString().padStart(decimals, '0').replace(/0+$/, '');

  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}

/**
 * Parse an unsigned integer given as a decimal string (API wire format)
 *
 * @throws Error on anything but digits, or on values above MAX_UINT256
 */
export function parseUint(value: unknown, field: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new Error(`${field} must be a non-negative integer string`);
  }

  const parsed = BigInt(value);
  if (parsed > MAX_UINT256) {
    throw new Error(`${field} exceeds uint256 range`);
  }
  return parsed;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

