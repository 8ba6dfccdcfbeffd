// ================================================================================================
// WEIGHTED POOL MATH: closed-form formulas of the weighted constant-value curve
// All inputs and outputs are 18-decimal fixed-point bigints. Weights are denormalized.
// ================================================================================================

import { EXIT_FEE } from '../pool/constants';
import { BONE, badd, bdiv, bmul, bpow, bsub } from './bnum';

/**
 * 💰 SPOT PRICE: tokens in per token out, fee included
 *   sP = (bI / wI) / (bO / wO) * 1 / (1 - fee)
 */
export function calcSpotPrice(
  tokenBalanceIn: bigint,
  tokenWeightIn: bigint,
  tokenBalanceOut: bigint,
  tokenWeightOut: bigint,
  swapFee: bigint,
): bigint {
  const numer = bdiv(tokenBalanceIn, tokenWeightIn);
  const denom = bdiv(tokenBalanceOut, tokenWeightOut);
  const ratio = bdiv(numer, denom);
  const scale = bdiv(BONE, bsub(BONE, swapFee));
  return bmul(ratio, scale);
}

/**
 * 💱 OUT GIVEN IN
 *   aO = bO * (1 - (bI / (bI + aI * (1 - fee))) ^ (wI / wO))
 */
export function calcOutGivenIn(
  tokenBalanceIn: bigint,
  tokenWeightIn: bigint,
  tokenBalanceOut: bigint,
  tokenWeightOut: bigint,
  tokenAmountIn: bigint,
  swapFee: bigint,
): bigint {
  const weightRatio = bdiv(tokenWeightIn, tokenWeightOut);
  const adjustedIn = bmul(tokenAmountIn, bsub(BONE, swapFee));
  const y = bdiv(tokenBalanceIn, badd(tokenBalanceIn, adjustedIn));
  const foo = bpow(y, weightRatio);
  const bar = bsub(BONE, foo);
  return bmul(tokenBalanceOut, bar);
}

/**
 * 💱 IN GIVEN OUT
 *   aI = bI * ((bO / (bO - aO)) ^ (wO / wI) - 1) / (1 - fee)
 */
export function calcInGivenOut(
  tokenBalanceIn: bigint,
  tokenWeightIn: bigint,
  tokenBalanceOut: bigint,
  tokenWeightOut: bigint,
  tokenAmountOut: bigint,
  swapFee: bigint,
): bigint {
  const weightRatio = bdiv(tokenWeightOut, tokenWeightIn);
  const diff = bsub(tokenBalanceOut, tokenAmountOut);
  const y = bdiv(tokenBalanceOut, diff);
  const foo = bsub(bpow(y, weightRatio), BONE);
  return bdiv(bmul(tokenBalanceIn, foo), bsub(BONE, swapFee));
}

/**
 * ➕ POOL OUT GIVEN SINGLE IN
 * Only the share of the deposit that would have to be swapped into the other tokens pays the fee.
 */
export function calcPoolOutGivenSingleIn(
  tokenBalanceIn: bigint,
  tokenWeightIn: bigint,
  poolSupply: bigint,
  totalWeight: bigint,
  tokenAmountIn: bigint,
  swapFee: bigint,
): bigint {
  const normalizedWeight = bdiv(tokenWeightIn, totalWeight);
  const zaz = bmul(bsub(BONE, normalizedWeight), swapFee);
  const tokenAmountInAfterFee = bmul(tokenAmountIn, bsub(BONE, zaz));
  const newTokenBalanceIn = badd(tokenBalanceIn, tokenAmountInAfterFee);
  const tokenInRatio = bdiv(newTokenBalanceIn, tokenBalanceIn);

  const poolRatio = bpow(tokenInRatio, normalizedWeight);
  const newPoolSupply = bmul(poolRatio, poolSupply);
  return bsub(newPoolSupply, poolSupply);
}

/** ➕ SINGLE IN GIVEN POOL OUT */
export function calcSingleInGivenPoolOut(
  tokenBalanceIn: bigint,
  tokenWeightIn: bigint,
  poolSupply: bigint,
  totalWeight: bigint,
  poolAmountOut: bigint,
  swapFee: bigint,
): bigint {
  const normalizedWeight = bdiv(tokenWeightIn, totalWeight);
  const newPoolSupply = badd(poolSupply, poolAmountOut);
  const poolRatio = bdiv(newPoolSupply, poolSupply);

  const boo = bdiv(BONE, normalizedWeight);
  const tokenInRatio = bpow(poolRatio, boo);
  const newTokenBalanceIn = bmul(tokenInRatio, tokenBalanceIn);
  const tokenAmountInAfterFee = bsub(newTokenBalanceIn, tokenBalanceIn);

  const zar = bmul(bsub(BONE, normalizedWeight), swapFee);
  return bdiv(tokenAmountInAfterFee, bsub(BONE, zar));
}

/** ➖ SINGLE OUT GIVEN POOL IN (exit fee charged on the burned shares) */
export function calcSingleOutGivenPoolIn(
  tokenBalanceOut: bigint,
  tokenWeightOut: bigint,
  poolSupply: bigint,
  totalWeight: bigint,
  poolAmountIn: bigint,
  swapFee: bigint,
  exitFee: bigint = EXIT_FEE,
): bigint {
  const normalizedWeight = bdiv(tokenWeightOut, totalWeight);
  const poolAmountInAfterExitFee = bmul(poolAmountIn, bsub(BONE, exitFee));
  const newPoolSupply = bsub(poolSupply, poolAmountInAfterExitFee);
  const poolRatio = bdiv(newPoolSupply, poolSupply);

  const tokenOutRatio = bpow(poolRatio, bdiv(BONE, normalizedWeight));
  const newTokenBalanceOut = bmul(tokenOutRatio, tokenBalanceOut);
  const tokenAmountOutBeforeSwapFee = bsub(tokenBalanceOut, newTokenBalanceOut);

  const zaz = bmul(bsub(BONE, normalizedWeight), swapFee);
  return bmul(tokenAmountOutBeforeSwapFee, bsub(BONE, zaz));
}

/** ➖ POOL IN GIVEN SINGLE OUT */
export function calcPoolInGivenSingleOut(
  tokenBalanceOut: bigint,
  tokenWeightOut: bigint,
  poolSupply: bigint,
  totalWeight: bigint,
  tokenAmountOut: bigint,
  swapFee: bigint,
  exitFee: bigint = EXIT_FEE,
): bigint {
  const normalizedWeight = bdiv(tokenWeightOut, totalWeight);
  const zoo = bsub(BONE, normalizedWeight);
  const zar = bmul(zoo, swapFee);
  const tokenAmountOutBeforeSwapFee = bdiv(tokenAmountOut, bsub(BONE, zar));

  const newTokenBalanceOut = bsub(tokenBalanceOut, tokenAmountOutBeforeSwapFee);
  const tokenOutRatio = bdiv(newTokenBalanceOut, tokenBalanceOut);

  const poolRatio = bpow(tokenOutRatio, normalizedWeight);
  const newPoolSupply = bmul(poolRatio, poolSupply);
  const poolAmountInAfterExitFee = bsub(poolSupply, newPoolSupply);

  return bdiv(poolAmountInAfterExitFee, bsub(BONE, exitFee));
}
