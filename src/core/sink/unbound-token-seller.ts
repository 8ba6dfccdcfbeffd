/**
 * 🧺 UNBOUND TOKEN SELLER: liquidity sink for tokens a pool has evicted
 *
 * The seller holds what a pool pushes out on unbind and sells it for tokens the pool
 * still binds, at the averaged oracle price plus a premium in the buyer's favour. Every
 * input goes straight to the pool and is gulped, so the pool re-absorbs the value.
 */
import type { Logger } from '@/utils';
import { ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import type { IPriceSource } from '../oracle/price-oracle';
import type { UnbindHandler } from '../pool/records';

export const MIN_PREMIUM = 1;
export const MAX_PREMIUM = 19;

/** What the seller needs from the pool it serves */
export interface SellerPool {
  readonly address: string;
  isBound(token: string): boolean;
  gulp(token: string): bigint;
}

export interface UnboundTokenSellerInput {
  logger: Logger;
  ledger: Ledger;
  address: string;
  pool: SellerPool;
  controller: string;
  oracle: IPriceSource;
  premiumPercent: number;
}

interface SellerState {
  premiumPercent: number;
}

export function validatePremium(premiumPercent: number): void {
  ensure(
    Number.isInteger(premiumPercent) && premiumPercent >= MIN_PREMIUM && premiumPercent <= MAX_PREMIUM,
    'ERR_PREMIUM',
    `premium must be ${MIN_PREMIUM}..${MAX_PREMIUM}%, got ${premiumPercent}`,
  );
}

export class UnboundTokenSeller implements UnbindHandler, Stateful<SellerState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  private readonly pool: SellerPool;
  private readonly controller: string;
  private readonly oracle: IPriceSource;
  readonly address: string;

  private premiumPercent: number;

  constructor(input: UnboundTokenSellerInput) {
    validatePremium(input.premiumPercent);
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.address = input.address;
    this.pool = input.pool;
    this.controller = input.controller;
    this.oracle = input.oracle;
    this.premiumPercent = input.premiumPercent;
    this.ledger.register(this);
  }

  // ================================================================================================
  // POOL AND CONTROLLER HOOKS
  // ================================================================================================

  handleUnbindToken(caller: string, token: string, amount: bigint): void {
    ensure(caller === this.pool.address, 'ERR_NOT_POOL', `${caller} is not ${this.pool.address}`);
    this.ledger.emit({ type: 'sink-token-received', sink: this.address, token, amount });
    this.logger.info(`🧺 received ${amount} of ${token} from ${caller}`);
  }

  setPremiumPercent(caller: string, premiumPercent: number): void {
    this.ledger.transact(() => {
      ensure(caller === this.controller, 'ERR_NOT_CONTROLLER');
      validatePremium(premiumPercent);
      this.premiumPercent = premiumPercent;
      this.ledger.emit({ type: 'premium-set', sink: this.address, premiumPercent });
    });
  }

  // ================================================================================================
  // PRICING
  // ================================================================================================

  private checkPair(tokenIn: string, tokenOut: string): void {
    ensure(this.pool.isBound(tokenIn), 'ERR_IN_TOKEN_NOT_BOUND', tokenIn);
    ensure(!this.pool.isBound(tokenOut), 'ERR_OUT_TOKEN_BOUND', tokenOut);
  }

  private checkHolding(tokenOut: string, amountOut: bigint): void {
    const held = this.ledger.balanceOf(tokenOut, this.address);
    ensure(amountOut <= held, 'ERR_INSUFFICIENT_BAL', `sink holds ${held} of ${tokenOut}`);
  }

  /** Amount of `tokenOut` bought with `amountIn`; the premium raises the output */
  calcOutGivenIn(tokenIn: string, tokenOut: string, amountIn: bigint): bigint {
    this.checkPair(tokenIn, tokenOut);
    const valueIn = this.oracle.computeAverageEthForTokens(tokenIn, amountIn);
    const valueOut = (valueIn * 100n) / BigInt(100 - this.premiumPercent);
    const amountOut = this.oracle.computeAverageTokensForEth(tokenOut, valueOut);
    this.checkHolding(tokenOut, amountOut);
    return amountOut;
  }

  /** Amount of `tokenIn` needed for `amountOut`; the premium lowers the input */
  calcInGivenOut(tokenIn: string, tokenOut: string, amountOut: bigint): bigint {
    this.checkPair(tokenIn, tokenOut);
    this.checkHolding(tokenOut, amountOut);
    const valueOut = this.oracle.computeAverageEthForTokens(tokenOut, amountOut);
    const valueIn = (valueOut * BigInt(100 - this.premiumPercent)) / 100n;
    return this.oracle.computeAverageTokensForEth(tokenIn, valueIn);
  }

  // ================================================================================================
  // SWAPS
  // ================================================================================================

  swapExactTokensForTokens(
    caller: string,
    tokenIn: string,
    tokenOut: string,
    amountIn: bigint,
    minAmountOut: bigint,
  ): bigint {
    return this.ledger.transact(() => {
      const amountOut = this.calcOutGivenIn(tokenIn, tokenOut, amountIn);
      ensure(amountOut >= minAmountOut, 'ERR_MIN_AMOUNT_OUT');
      this.settle(caller, tokenIn, tokenOut, amountIn, amountOut);
      return amountOut;
    });
  }

  swapTokensForExactTokens(
    caller: string,
    tokenIn: string,
    tokenOut: string,
    amountOut: bigint,
    maxAmountIn: bigint,
  ): bigint {
    return this.ledger.transact(() => {
      const amountIn = this.calcInGivenOut(tokenIn, tokenOut, amountOut);
      ensure(amountIn <= maxAmountIn, 'ERR_MAX_AMOUNT_IN');
      this.settle(caller, tokenIn, tokenOut, amountIn, amountOut);
      return amountIn;
    });
  }

  private settle(caller: string, tokenIn: string, tokenOut: string, amountIn: bigint, amountOut: bigint): void {
    this.ledger.transfer(tokenIn, caller, this.pool.address, amountIn);
    this.pool.gulp(tokenIn);
    this.ledger.transfer(tokenOut, this.address, caller, amountOut);
    this.ledger.emit({ type: 'sink-swap', sink: this.address, caller, tokenIn, tokenOut, amountIn, amountOut });
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  getPremiumPercent(): number {
    return this.premiumPercent;
  }

  getPool(): string {
    return this.pool.address;
  }

  getBalance(token: string): bigint {
    return this.ledger.balanceOf(token, this.address);
  }

  captureState(): SellerState {
    return { premiumPercent: this.premiumPercent };
  }

  restoreState(state: SellerState): void {
    this.premiumPercent = state.premiumPercent;
  }
}
