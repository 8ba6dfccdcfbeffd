// ================================================================================================
// FIXED POINT MATH: 18-decimal unsigned arithmetic on bigint
// ================================================================================================

import { formatUnits, parseUnits } from 'ethers';
import { ensure } from '../errors';

export const BONE = 10n ** 18n;

export const MIN_BPOW_BASE = 1n;
export const MAX_BPOW_BASE = 2n * BONE - 1n;
export const BPOW_PRECISION = BONE / 10n ** 10n;

// ================================================================================================
// CONVERSIONS
// ================================================================================================

/** Parse a plain decimal string ("0.25"; exponent forms are rejected) into a fixed-point value */
export function toFixed(value: string): bigint {
  return parseUnits(value, 18);
}

/** Format a fixed-point value as a decimal string */
export function fromFixed(value: bigint): string {
  return formatUnits(value, 18);
}

/** Lossy conversion for display and approximate comparisons */
export function toNumber(value: bigint): number {
  return parseFloat(formatUnits(value, 18));
}

// ================================================================================================
// ARITHMETIC
// ================================================================================================

export function btoi(a: bigint): bigint {
  return a / BONE;
}

export function bfloor(a: bigint): bigint {
  return btoi(a) * BONE;
}

export function badd(a: bigint, b: bigint): bigint {
  return a + b;
}

export function bsub(a: bigint, b: bigint): bigint {
  ensure(a >= b, 'ERR_SUB_UNDERFLOW');
  return a - b;
}

export function bsubSign(a: bigint, b: bigint): [diff: bigint, negative: boolean] {
  return a >= b ? [a - b, false] : [b - a, true];
}

/** Multiplication rounded half up */
export function bmul(a: bigint, b: bigint): bigint {
  return (a * b + BONE / 2n) / BONE;
}

/** Division rounded half up */
export function bdiv(a: bigint, b: bigint): bigint {
  ensure(b !== 0n, 'ERR_DIV_ZERO');
  return (a * BONE + b / 2n) / b;
}

/** Integer power of a fixed-point base (exponent is a plain integer) */
export function bpowi(a: bigint, n: bigint): bigint {
  let z = n % 2n !== 0n ? a : BONE;
  for (n /= 2n; n !== 0n; n /= 2n) {
    a = bmul(a, a);
    if (n % 2n !== 0n) z = bmul(z, a);
  }
  return z;
}

/**
 * Fixed-point power with a fractional exponent.
 * The whole part goes through bpowi, the remainder through a binomial series.
 */
export function bpow(base: bigint, exp: bigint): bigint {
  ensure(base >= MIN_BPOW_BASE, 'ERR_BPOW_BASE_TOO_LOW');
  ensure(base <= MAX_BPOW_BASE, 'ERR_BPOW_BASE_TOO_HIGH');

  const whole = bfloor(exp);
  const remain = exp - whole;
  const wholePow = bpowi(base, btoi(whole));
  if (remain === 0n) return wholePow;

  const partialResult = bpowApprox(base, remain, BPOW_PRECISION);
  return bmul(wholePow, partialResult);
}

/**
 * Binomial expansion of base^exp for 0 <= exp < 1, stopping once a term drops below
 * `precision`.
 */
export function bpowApprox(base: bigint, exp: bigint, precision: bigint): bigint {
  const a = exp;
  const [x, xneg] = bsubSign(base, BONE);
  let term = BONE;
  let sum = term;
  let negative = false;

  for (let i = 1n; term >= precision; i++) {
    const bigK = i * BONE;
    const [c, cneg] = bsubSign(a, bigK - BONE);
    term = bmul(term, bmul(c, x));
    term = bdiv(term, bigK);
    if (term === 0n) break;

    if (xneg) negative = !negative;
    if (cneg) negative = !negative;
    sum = negative ? bsub(sum, term) : badd(sum, term);
  }

  return sum;
}

/** Integer square root (floor) of a raw bigint */
export function isqrt(value: bigint): bigint {
  ensure(value >= 0n, 'ERR_SQRT_NEGATIVE');
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/** Square root of a fixed-point value, result in fixed point */
export function bsqrt(value: bigint): bigint {
  return isqrt(value * BONE);
}
