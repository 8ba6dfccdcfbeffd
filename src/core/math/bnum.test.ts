import { describe, it, expect } from 'vitest';

import { BONE, bdiv, bmul, bpow, bpowi, bsqrt, bsub, fromFixed, isqrt, toFixed, toNumber } from './bnum';
import { calcInGivenOut, calcOutGivenIn, calcPoolOutGivenSingleIn, calcSingleInGivenPoolOut, calcSpotPrice } from './pool-math';

function relError(actual: number, expected: number): number {
  return Math.abs(actual - expected) / Math.abs(expected);
}

describe('fixed point arithmetic', () => {
  it('rounds multiplication and division half up', () => {
    expect(bmul(toFixed('1.5'), toFixed('2'))).toBe(3n * BONE);
    expect(bdiv(BONE, 3n * BONE)).toBe(333333333333333333n);
    expect(bdiv(2n * BONE, 3n * BONE)).toBe(666666666666666667n);
  });

  it('rejects underflow and division by zero', () => {
    expect(() => bsub(1n, 2n)).toThrow('ERR_SUB_UNDERFLOW');
    expect(() => bdiv(BONE, 0n)).toThrow('ERR_DIV_ZERO');
  });

  it('converts between decimals and fixed point', () => {
    expect(toFixed('0.25')).toBe(250000000000000000n);
    expect(toFixed('0.0000001')).toBe(100_000_000_000n);
    expect(() => toFixed('1e-7')).toThrow();
    expect(fromFixed(BONE)).toBe('1.0');
    expect(toNumber(toFixed('0.3'))).toBe(0.3);
  });

  it('raises to whole and fractional powers', () => {
    expect(bpowi(2n * BONE, 3n)).toBe(8n * BONE);
    expect(relError(toNumber(bpow(toFixed('1.5'), toFixed('0.5'))), Math.sqrt(1.5))).toBeLessThan(1e-9);
    expect(relError(toNumber(bpow(toFixed('0.5'), toFixed('2.5'))), 0.5 ** 2.5)).toBeLessThan(1e-9);
  });

  it('bounds the base of bpow', () => {
    expect(() => bpow(0n, BONE)).toThrow('ERR_BPOW_BASE_TOO_LOW');
    expect(() => bpow(2n * BONE, BONE)).toThrow('ERR_BPOW_BASE_TOO_HIGH');
  });

  it('takes integer and fixed-point square roots', () => {
    expect(isqrt(16n)).toBe(4n);
    expect(isqrt(17n)).toBe(4n);
    expect(bsqrt(4n * BONE)).toBe(2n * BONE);
    expect(bsqrt(2n * BONE)).toBe(1414213562373095048n);
  });
});

describe('weighted pool formulas', () => {
  const fee = toFixed('0.025');

  it('includes the swap fee in the spot price', () => {
    expect(calcSpotPrice(BONE, BONE, BONE, BONE, 0n)).toBe(BONE);
    expect(calcSpotPrice(BONE, BONE, BONE, BONE, fee)).toBe(1025641025641025641n);
  });

  it('prices exact-in and exact-out swaps consistently', () => {
    const balanceIn = toFixed('10');
    const balanceOut = toFixed('4');
    const weightIn = toFixed('0.6');
    const weightOut = toFixed('1.8');
    const amountIn = toFixed('1');

    const amountOut = calcOutGivenIn(balanceIn, weightIn, balanceOut, weightOut, amountIn, fee);
    const expectedOut = 4 * (1 - (10 / (10 + 0.975)) ** (0.6 / 1.8));
    expect(relError(toNumber(amountOut), expectedOut)).toBeLessThan(1e-8);

    const amountInBack = calcInGivenOut(balanceIn, weightIn, balanceOut, weightOut, amountOut, fee);
    expect(relError(toNumber(amountInBack), 1)).toBeLessThan(1e-8);
  });

  it('mints shares for a single-sided deposit that cost the same deposit back', () => {
    const supply = toFixed('100');
    const balance = toFixed('5');
    const weight = toFixed('0.5');
    const totalWeight = toFixed('1.5');

    const poolOut = calcPoolOutGivenSingleIn(balance, weight, supply, totalWeight, toFixed('0.5'), fee);
    const tokenIn = calcSingleInGivenPoolOut(balance, weight, supply, totalWeight, poolOut, fee);
    expect(relError(toNumber(tokenIn), 0.5)).toBeLessThan(1e-8);
  });
});
