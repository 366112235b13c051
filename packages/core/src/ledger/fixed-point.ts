/**
 * Fixed-point arithmetic
 *
 * Ledger values are signed integers with 18 implied decimal digits.
 * 1.0 is stored as 10^18. All arithmetic uses bigint; no floating point.
 */

export const DECIMALS = 18;

export const WAD = 10n ** 18n;

export const INT128_MIN = -(2n ** 127n);
export const INT128_MAX = 2n ** 127n - 1n;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,18}))?$/;

/**
 * Multiply two fixed-point values and renormalise to 18 decimals.
 * bigint division truncates toward zero.
 */
export function mulWad(a: bigint, b: bigint): bigint {
  return (a * b) / WAD;
}

export function isInt128(value: bigint): boolean {
  return value >= INT128_MIN && value <= INT128_MAX;
}

/**
 * Parse a decimal string such as "12.5" or "-0.000001" into fixed-point.
 * Returns null for anything that is not a plain decimal with at most 18 fractional digits.
 */
export function parseFixed(input: string): bigint | null {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }

  const [, sign, whole = '0', fraction = ''] = match;
  const magnitude = BigInt(whole) * WAD + BigInt(fraction.padEnd(DECIMALS, '0'));
  return sign ? -magnitude : magnitude;
}

/**
 * Format fixed-point as a decimal string without trailing fractional zeros
 */
export function formatFixed(value: bigint): string {
  const negative = value < 0n;
  const magnitude = negative ? -value : value;
  const whole = magnitude / WAD;
  const fraction = (magnitude % WAD).toString().padStart(DECIMALS, '0').replace(/0+$/, '');
  const body = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

/**
 * Convenience for tests and fixtures: whole units to fixed-point
 */
export function toWad(units: number | bigint): bigint {
  return BigInt(units) * WAD;
}
