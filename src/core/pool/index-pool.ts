/**
 * 🏊 INDEX POOL: weighted constant-value pool whose weights drift toward controller targets
 *
 * Token records move through bound (not ready) -> ready -> evicted. A not-ready token is
 * priced at its minimum balance and MIN_WEIGHT until its real balance reaches the minimum.
 * Weights never jump: each touch of a token moves `denorm` a bounded step toward
 * `desiredDenorm` once WEIGHT_UPDATE_DELAY has passed since the last step.
 */
import type { Logger } from '@/utils';
import type { PoolSnapshot, TokenRecord } from '../types';
import { RevertError, ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import { badd, bdiv, bmul, bsub } from '../math/bnum';
import {
  calcInGivenOut,
  calcOutGivenIn,
  calcPoolInGivenSingleOut,
  calcPoolOutGivenSingleIn,
  calcSingleInGivenPoolOut,
  calcSingleOutGivenPoolIn,
  calcSpotPrice,
} from '../math/pool-math';
import {
  DEFAULT_SWAP_FEE,
  EXIT_FEE,
  FLASH_FEE_RATE,
  INIT_POOL_SUPPLY,
  MAX_BOUND_TOKENS,
  MAX_FEE,
  MAX_IN_RATIO,
  MAX_OUT_RATIO,
  MAX_READY_WEIGHT,
  MAX_TOTAL_WEIGHT,
  MAX_WEIGHT,
  MIN_BALANCE,
  MIN_BOUND_TOKENS,
  MIN_FEE,
  MIN_WEIGHT,
  WEIGHT_CHANGE_PCT,
  WEIGHT_UPDATE_DELAY,
} from './constants';
import {
  cloneRecord,
  cloneRecords,
  type FlashLoanRecipient,
  type PricedToken,
  type SwapResult,
  type UnbindHandler,
} from './records';

export interface IndexPoolInput {
  logger: Logger;
  ledger: Ledger;
  address: string;
  name: string;
  symbol: string;
  controller: string;
}

interface IndexPoolState {
  controller: string;
  initialized: boolean;
  publicSwap: boolean;
  swapFee: bigint;
  exitFeeRecipient: string;
  maxPoolTokens: bigint;
  unbindHandler: UnbindHandler | null;
  records: Map<string, TokenRecord>;
  currentTokens: string[];
  totalWeight: bigint;
}

// ================================================================================================
// INDEX POOL CLASS
// ================================================================================================

export class IndexPool implements Stateful<IndexPoolState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;

  readonly address: string;
  readonly name: string;
  readonly symbol: string;

  private controller: string;
  private initialized = false;
  private publicSwap = false;
  private swapFee: bigint = DEFAULT_SWAP_FEE;
  private exitFeeRecipient = '';
  private maxPoolTokens = 0n; // 0 = unlimited
  private unbindHandler: UnbindHandler | null = null;

  private records: Map<string, TokenRecord> = new Map();
  private currentTokens: string[] = [];
  private totalWeight = 0n;

  // not part of the snapshot: released on every exit path
  private mutex = false;

  constructor(input: IndexPoolInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.address = input.address;
    this.name = input.name;
    this.symbol = input.symbol;
    this.controller = input.controller;
    this.ledger.register(this);
  }

  // ================================================================================================
  // CALL GUARDS
  // ================================================================================================

  private lock<T>(fn: () => T): T {
    ensure(!this.mutex, 'ERR_REENTRY');
    this.mutex = true;
    try {
      return fn();
    } finally {
      this.mutex = false;
    }
  }

  /** Atomic and re-entrancy locked */
  private call<T>(fn: () => T): T {
    return this.ledger.transact(() => this.lock(fn));
  }

  private viewLock(): void {
    ensure(!this.mutex, 'ERR_REENTRY');
  }

  private onlyController(caller: string): void {
    ensure(caller === this.controller, 'ERR_NOT_CONTROLLER', `${caller} is not the controller of ${this.address}`);
  }

  private onlyPublic(): void {
    ensure(this.publicSwap, 'ERR_NOT_PUBLIC');
  }

  // ================================================================================================
  // INITIALIZATION
  // ================================================================================================

  /**
   * 🚀 INITIALIZE: bind the first tokens ready, pull their balances from `tokenProvider`
   * and mint INIT_POOL_SUPPLY to it.
   */
  initialize(
    caller: string,
    tokens: string[],
    balances: bigint[],
    denorms: bigint[],
    tokenProvider: string,
    unbindHandler: UnbindHandler,
    exitFeeRecipient: string,
  ): void {
    this.call(() => {
      this.onlyController(caller);
      ensure(!this.initialized, 'ERR_INITIALIZED');
      const len = tokens.length;
      ensure(len >= MIN_BOUND_TOKENS, 'ERR_MIN_TOKENS');
      ensure(len <= MAX_BOUND_TOKENS, 'ERR_MAX_TOKENS');
      ensure(len === balances.length && len === denorms.length, 'ERR_ARR_LEN');

      const now = this.ledger.now();
      let totalWeight = 0n;
      for (let i = 0; i < len; i++) {
        const token = tokens[i];
        const balance = balances[i];
        const denorm = denorms[i];
        ensure(!this.records.get(token)?.bound, 'ERR_IS_BOUND', token);
        ensure(denorm >= MIN_WEIGHT, 'ERR_MIN_WEIGHT');
        ensure(denorm <= MAX_WEIGHT, 'ERR_MAX_WEIGHT');
        ensure(balance >= MIN_BALANCE, 'ERR_MIN_BALANCE');

        this.records.set(token, {
          bound: true,
          ready: true,
          denorm,
          desiredDenorm: denorm,
          balance,
          minimumBalance: 0n,
          lastDenormUpdate: now,
          index: i,
        });
        this.currentTokens.push(token);
        totalWeight = badd(totalWeight, denorm);
      }
      ensure(totalWeight <= MAX_TOTAL_WEIGHT, 'ERR_MAX_TOTAL_WEIGHT');
      for (let i = 0; i < len; i++) {
        this.ledger.transfer(tokens[i], tokenProvider, this.address, balances[i]);
      }

      this.totalWeight = totalWeight;
      this.unbindHandler = unbindHandler;
      this.exitFeeRecipient = exitFeeRecipient;
      this.publicSwap = true;
      this.initialized = true;
      this.ledger.mint(this.address, tokenProvider, INIT_POOL_SUPPLY);
      this.ledger.emit({ type: 'pool-initialized', pool: this.address, tokens: [...tokens], denorms: [...denorms] });
      this.logger.info(`🚀 Pool ${this.symbol} initialized with ${len} tokens`);
    });
  }

  // ================================================================================================
  // CONTROLLER ACTIONS
  // ================================================================================================

  setSwapFee(caller: string, swapFee: bigint): void {
    this.call(() => {
      this.onlyController(caller);
      ensure(swapFee >= MIN_FEE, 'ERR_MIN_FEE');
      ensure(swapFee <= MAX_FEE, 'ERR_MAX_FEE');
      this.swapFee = swapFee;
      this.ledger.emit({ type: 'swap-fee-set', pool: this.address, swapFee });
    });
  }

  setExitFeeRecipient(caller: string, exitFeeRecipient: string): void {
    this.call(() => {
      this.onlyController(caller);
      this.exitFeeRecipient = exitFeeRecipient;
    });
  }

  setController(caller: string, controller: string): void {
    this.call(() => {
      this.onlyController(caller);
      this.controller = controller;
    });
  }

  setMaxPoolTokens(caller: string, maxPoolTokens: bigint): void {
    this.call(() => {
      this.onlyController(caller);
      this.maxPoolTokens = maxPoolTokens;
    });
  }

  /**
   * ⚖️ REWEIGH: set new target weights for bound tokens. A target of 0 schedules removal.
   */
  reweighTokens(caller: string, tokens: string[], desiredDenorms: bigint[]): void {
    this.call(() => {
      this.onlyController(caller);
      ensure(tokens.length === desiredDenorms.length, 'ERR_ARR_LEN');
      for (let i = 0; i < tokens.length; i++) {
        this.setDesiredDenorm(tokens[i], desiredDenorms[i]);
      }
    });
  }

  /**
   * 🔁 REINDEX: replace the membership. Listed tokens get their new target (at least
   * MIN_WEIGHT); unlisted ones are bound not ready. Omitted ready tokens are scheduled for
   * removal, omitted not-ready tokens carry no weight and are unbound right away.
   */
  reindexTokens(caller: string, tokens: string[], desiredDenorms: bigint[], minimumBalances: bigint[]): void {
    this.call(() => {
      this.onlyController(caller);
      const len = tokens.length;
      ensure(len === desiredDenorms.length && len === minimumBalances.length, 'ERR_ARR_LEN');

      const listed = new Set(tokens);
      const omitted = this.currentTokens.filter((token) => !listed.has(token));
      for (const token of omitted) {
        const record = this.requireBound(token);
        if (record.ready) this.setDesiredDenorm(token, 0n);
        else this.unbind(token);
      }

      for (let i = 0; i < len; i++) {
        const token = tokens[i];
        let denorm = desiredDenorms[i];
        if (denorm < MIN_WEIGHT) denorm = MIN_WEIGHT;
        ensure(denorm <= MAX_WEIGHT, 'ERR_MAX_WEIGHT');

        const record = this.records.get(token);
        if (record?.bound) {
          this.setDesiredDenorm(token, denorm);
          if (!record.ready) this.assignMinimumBalance(token, record, minimumBalances[i]);
        } else {
          this.bind(token, minimumBalances[i], denorm);
        }
      }
    });
  }

  /**
   * 🎚️ SET MINIMUM BALANCE: only while the token is not ready
   */
  setMinimumBalance(caller: string, token: string, minimumBalance: bigint): void {
    this.call(() => {
      this.onlyController(caller);
      const record = this.requireBound(token);
      ensure(!record.ready, 'ERR_READY');
      this.assignMinimumBalance(token, record, minimumBalance);
    });
  }

  // ================================================================================================
  // SWAPS
  // ================================================================================================

  /**
   * 💱 SWAP EXACT AMOUNT IN
   */
  swapExactAmountIn(
    caller: string,
    tokenIn: string,
    tokenAmountIn: bigint,
    tokenOut: string,
    minAmountOut: bigint,
    maxPrice: bigint,
  ): SwapResult {
    return this.call(() => {
      this.onlyPublic();
      const inToken = this.getInputToken(tokenIn);
      const outToken = this.getOutputToken(tokenOut);

      ensure(tokenAmountIn <= bmul(inToken.balance, MAX_IN_RATIO), 'ERR_MAX_IN_RATIO');
      const spotPriceBefore = this.priceOf(inToken, outToken);
      ensure(spotPriceBefore <= maxPrice, 'ERR_BAD_LIMIT_PRICE');

      const tokenAmountOut = calcOutGivenIn(
        inToken.balance,
        inToken.denorm,
        outToken.balance,
        outToken.denorm,
        tokenAmountIn,
        this.swapFee,
      );
      ensure(tokenAmountOut > 0n, 'ERR_MATH_APPROX', 'swap rounds to zero output');
      ensure(tokenAmountOut >= minAmountOut, 'ERR_LIMIT_OUT');
      ensure(tokenAmountOut <= bmul(outToken.balance, MAX_OUT_RATIO), 'ERR_MAX_OUT_RATIO');

      const priceAfterTrade = this.checkPriceAfter(inToken, outToken, tokenAmountIn, tokenAmountOut, spotPriceBefore, maxPrice);
      this.settleSwap(caller, tokenIn, tokenAmountIn, tokenOut, tokenAmountOut);

      return {
        tokenAmountIn,
        tokenAmountOut,
        spotPriceAfter: this.priceAfterSettlement(tokenIn, tokenOut, priceAfterTrade),
      };
    });
  }

  /**
   * 💱 SWAP EXACT AMOUNT OUT
   */
  swapExactAmountOut(
    caller: string,
    tokenIn: string,
    maxAmountIn: bigint,
    tokenOut: string,
    tokenAmountOut: bigint,
    maxPrice: bigint,
  ): SwapResult {
    return this.call(() => {
      this.onlyPublic();
      const inToken = this.getInputToken(tokenIn);
      const outToken = this.getOutputToken(tokenOut);

      ensure(tokenAmountOut <= bmul(outToken.balance, MAX_OUT_RATIO), 'ERR_MAX_OUT_RATIO');
      const spotPriceBefore = this.priceOf(inToken, outToken);
      ensure(spotPriceBefore <= maxPrice, 'ERR_BAD_LIMIT_PRICE');

      const tokenAmountIn = calcInGivenOut(
        inToken.balance,
        inToken.denorm,
        outToken.balance,
        outToken.denorm,
        tokenAmountOut,
        this.swapFee,
      );
      ensure(tokenAmountIn > 0n, 'ERR_MATH_APPROX', 'swap rounds to zero input');
      ensure(tokenAmountIn <= maxAmountIn, 'ERR_LIMIT_IN');
      ensure(tokenAmountIn <= bmul(inToken.balance, MAX_IN_RATIO), 'ERR_MAX_IN_RATIO');

      const priceAfterTrade = this.checkPriceAfter(inToken, outToken, tokenAmountIn, tokenAmountOut, spotPriceBefore, maxPrice);
      this.settleSwap(caller, tokenIn, tokenAmountIn, tokenOut, tokenAmountOut);

      return {
        tokenAmountIn,
        tokenAmountOut,
        spotPriceAfter: this.priceAfterSettlement(tokenIn, tokenOut, priceAfterTrade),
      };
    });
  }

  /** Limit checks use the weights the trade was priced with */
  private checkPriceAfter(
    inToken: PricedToken,
    outToken: PricedToken,
    tokenAmountIn: bigint,
    tokenAmountOut: bigint,
    spotPriceBefore: bigint,
    maxPrice: bigint,
  ): bigint {
    const priceAfterTrade = calcSpotPrice(
      badd(inToken.balance, tokenAmountIn),
      inToken.denorm,
      bsub(outToken.balance, tokenAmountOut),
      outToken.denorm,
      this.swapFee,
    );
    ensure(priceAfterTrade >= spotPriceBefore, 'ERR_MATH_APPROX');
    ensure(priceAfterTrade <= maxPrice, 'ERR_LIMIT_PRICE');
    ensure(spotPriceBefore <= bdiv(tokenAmountIn, tokenAmountOut), 'ERR_MATH_APPROX');
    return priceAfterTrade;
  }

  private settleSwap(caller: string, tokenIn: string, tokenAmountIn: bigint, tokenOut: string, tokenAmountOut: bigint): void {
    this.ledger.transfer(tokenIn, caller, this.address, tokenAmountIn);
    this.ledger.transfer(tokenOut, this.address, caller, tokenAmountOut);

    const outRecord = this.requireBound(tokenOut);
    outRecord.balance = bsub(outRecord.balance, tokenAmountOut);
    // output first, so its decrease frees room for the input's increase
    this.decreaseDenorm(tokenOut, outRecord);
    const inRecord = this.requireBound(tokenIn);
    this.updateInputToken(tokenIn, inRecord, badd(inRecord.balance, tokenAmountIn), true);

    this.ledger.emit({
      type: 'swap',
      pool: this.address,
      caller,
      tokenIn,
      tokenOut,
      amountIn: tokenAmountIn,
      amountOut: tokenAmountOut,
    });
  }

  /** Spot price with the weights as they stand after this call's adjustments */
  private priceAfterSettlement(tokenIn: string, tokenOut: string, fallback: bigint): bigint {
    const outRecord = this.records.get(tokenOut);
    if (!outRecord?.bound) return fallback;
    return this.priceOf(this.getInputToken(tokenIn), this.getOutputToken(tokenOut));
  }

  // ================================================================================================
  // JOINS
  // ================================================================================================

  /**
   * ➕ JOIN POOL: proportional deposit of every bound token for `poolAmountOut` shares.
   * Not-ready tokens are charged against their minimum balance.
   */
  joinPool(caller: string, poolAmountOut: bigint, maxAmountsIn: bigint[]): bigint[] {
    return this.call(() => {
      this.onlyPublic();
      ensure(maxAmountsIn.length === this.currentTokens.length, 'ERR_ARR_LEN');
      const poolTotal = this.totalSupply();
      const ratio = bdiv(poolAmountOut, poolTotal);
      ensure(ratio !== 0n, 'ERR_MATH_APPROX');
      this.checkMaxPoolTokens(poolTotal, poolAmountOut);

      const amountsIn: bigint[] = [];
      for (const [i, token] of [...this.currentTokens].entries()) {
        const priced = this.getInputToken(token);
        const tokenAmountIn = bmul(ratio, priced.balance);
        ensure(tokenAmountIn !== 0n, 'ERR_MATH_APPROX');
        ensure(tokenAmountIn <= maxAmountsIn[i], 'ERR_LIMIT_IN');

        this.ledger.transfer(token, caller, this.address, tokenAmountIn);
        const record = this.requireBound(token);
        this.updateInputToken(token, record, badd(record.balance, tokenAmountIn), true);
        this.ledger.emit({ type: 'join', pool: this.address, caller, tokenIn: token, amountIn: tokenAmountIn });
        amountsIn.push(tokenAmountIn);
      }

      this.ledger.mint(this.address, caller, poolAmountOut);
      return amountsIn;
    });
  }

  /**
   * ➕ JOINSWAP EXTERN AMOUNT IN: single-sided deposit of an exact token amount
   */
  joinswapExternAmountIn(caller: string, tokenIn: string, tokenAmountIn: bigint, minPoolAmountOut: bigint): bigint {
    return this.call(() => {
      this.onlyPublic();
      ensure(tokenAmountIn !== 0n, 'ERR_ZERO_IN');
      const priced = this.getInputToken(tokenIn);
      ensure(tokenAmountIn <= bmul(priced.balance, MAX_IN_RATIO), 'ERR_MAX_IN_RATIO');

      const poolTotal = this.totalSupply();
      const poolAmountOut = calcPoolOutGivenSingleIn(
        priced.balance,
        priced.denorm,
        poolTotal,
        this.pricingTotalWeight(priced),
        tokenAmountIn,
        this.swapFee,
      );
      ensure(poolAmountOut !== 0n, 'ERR_MATH_APPROX');
      ensure(poolAmountOut >= minPoolAmountOut, 'ERR_LIMIT_OUT');
      this.checkMaxPoolTokens(poolTotal, poolAmountOut);

      this.settleSingleJoin(caller, tokenIn, tokenAmountIn, poolAmountOut);
      return poolAmountOut;
    });
  }

  /**
   * ➕ JOINSWAP POOL AMOUNT OUT: single-sided deposit for an exact share amount
   */
  joinswapPoolAmountOut(caller: string, tokenIn: string, poolAmountOut: bigint, maxAmountIn: bigint): bigint {
    return this.call(() => {
      this.onlyPublic();
      const priced = this.getInputToken(tokenIn);
      const poolTotal = this.totalSupply();
      this.checkMaxPoolTokens(poolTotal, poolAmountOut);

      const tokenAmountIn = calcSingleInGivenPoolOut(
        priced.balance,
        priced.denorm,
        poolTotal,
        this.pricingTotalWeight(priced),
        poolAmountOut,
        this.swapFee,
      );
      ensure(tokenAmountIn !== 0n, 'ERR_MATH_APPROX');
      ensure(tokenAmountIn <= maxAmountIn, 'ERR_LIMIT_IN');
      ensure(tokenAmountIn <= bmul(priced.balance, MAX_IN_RATIO), 'ERR_MAX_IN_RATIO');

      this.settleSingleJoin(caller, tokenIn, tokenAmountIn, poolAmountOut);
      return tokenAmountIn;
    });
  }

  private settleSingleJoin(caller: string, tokenIn: string, tokenAmountIn: bigint, poolAmountOut: bigint): void {
    this.ledger.transfer(tokenIn, caller, this.address, tokenAmountIn);
    const record = this.requireBound(tokenIn);
    this.updateInputToken(tokenIn, record, badd(record.balance, tokenAmountIn), true);
    this.ledger.mint(this.address, caller, poolAmountOut);
    this.ledger.emit({ type: 'join', pool: this.address, caller, tokenIn, amountIn: tokenAmountIn });
  }

  /** A not-ready token joins the weight sum with MIN_WEIGHT while it is priced */
  private pricingTotalWeight(priced: PricedToken): bigint {
    return priced.ready ? this.totalWeight : badd(this.totalWeight, MIN_WEIGHT);
  }

  private checkMaxPoolTokens(poolTotal: bigint, poolAmountOut: bigint): void {
    if (this.maxPoolTokens > 0n) {
      ensure(badd(poolTotal, poolAmountOut) <= this.maxPoolTokens, 'ERR_MAX_POOL_TOKENS');
    }
  }

  // ================================================================================================
  // EXITS
  // ================================================================================================

  /**
   * ➖ EXIT POOL: burn shares for a proportional share of every ready token.
   * Not-ready tokens pay out nothing, so their minimum output must be 0.
   */
  exitPool(caller: string, poolAmountIn: bigint, minAmountsOut: bigint[]): bigint[] {
    return this.call(() => {
      ensure(minAmountsOut.length === this.currentTokens.length, 'ERR_ARR_LEN');
      const poolTotal = this.totalSupply();
      const exitFee = bmul(poolAmountIn, EXIT_FEE);
      const poolAmountInAfterExitFee = bsub(poolAmountIn, exitFee);
      const ratio = bdiv(poolAmountInAfterExitFee, poolTotal);
      ensure(ratio !== 0n, 'ERR_MATH_APPROX');

      this.collectExitShares(caller, poolAmountIn, exitFee);

      const amountsOut: bigint[] = [];
      for (const [i, token] of [...this.currentTokens].entries()) {
        const record = this.requireBound(token);
        if (!record.ready) {
          ensure(minAmountsOut[i] === 0n, 'ERR_OUT_NOT_READY');
          amountsOut.push(0n);
          continue;
        }
        const tokenAmountOut = bmul(ratio, record.balance);
        ensure(tokenAmountOut !== 0n, 'ERR_MATH_APPROX');
        ensure(tokenAmountOut >= minAmountsOut[i], 'ERR_LIMIT_OUT');

        record.balance = bsub(record.balance, tokenAmountOut);
        this.ledger.transfer(token, this.address, caller, tokenAmountOut);
        this.ledger.emit({ type: 'exit', pool: this.address, caller, tokenOut: token, amountOut: tokenAmountOut });
        amountsOut.push(tokenAmountOut);
      }
      return amountsOut;
    });
  }

  /**
   * ➖ EXITSWAP POOL AMOUNT IN: burn an exact share amount for a single token
   */
  exitswapPoolAmountIn(caller: string, tokenOut: string, poolAmountIn: bigint, minAmountOut: bigint): bigint {
    return this.call(() => {
      const priced = this.getOutputToken(tokenOut);
      const tokenAmountOut = calcSingleOutGivenPoolIn(
        priced.balance,
        priced.denorm,
        this.totalSupply(),
        this.totalWeight,
        poolAmountIn,
        this.swapFee,
      );
      ensure(tokenAmountOut >= minAmountOut, 'ERR_LIMIT_OUT');
      ensure(tokenAmountOut <= bmul(priced.balance, MAX_OUT_RATIO), 'ERR_MAX_OUT_RATIO');

      this.settleSingleExit(caller, tokenOut, tokenAmountOut, poolAmountIn);
      return tokenAmountOut;
    });
  }

  /**
   * ➖ EXITSWAP EXTERN AMOUNT OUT: burn shares for an exact amount of a single token
   */
  exitswapExternAmountOut(caller: string, tokenOut: string, tokenAmountOut: bigint, maxPoolAmountIn: bigint): bigint {
    return this.call(() => {
      const priced = this.getOutputToken(tokenOut);
      ensure(tokenAmountOut <= bmul(priced.balance, MAX_OUT_RATIO), 'ERR_MAX_OUT_RATIO');
      const poolAmountIn = calcPoolInGivenSingleOut(
        priced.balance,
        priced.denorm,
        this.totalSupply(),
        this.totalWeight,
        tokenAmountOut,
        this.swapFee,
      );
      ensure(poolAmountIn !== 0n, 'ERR_MATH_APPROX');
      ensure(poolAmountIn <= maxPoolAmountIn, 'ERR_LIMIT_IN');

      this.settleSingleExit(caller, tokenOut, tokenAmountOut, poolAmountIn);
      return poolAmountIn;
    });
  }

  private settleSingleExit(caller: string, tokenOut: string, tokenAmountOut: bigint, poolAmountIn: bigint): void {
    this.collectExitShares(caller, poolAmountIn, bmul(poolAmountIn, EXIT_FEE));
    const record = this.requireBound(tokenOut);
    record.balance = bsub(record.balance, tokenAmountOut);
    this.ledger.transfer(tokenOut, this.address, caller, tokenAmountOut);
    this.decreaseDenorm(tokenOut, record);
    this.ledger.emit({ type: 'exit', pool: this.address, caller, tokenOut, amountOut: tokenAmountOut });
  }

  /** Take the shares, pay the exit fee to its recipient and burn the rest */
  private collectExitShares(caller: string, poolAmountIn: bigint, exitFee: bigint): void {
    this.ledger.transfer(this.address, caller, this.address, poolAmountIn);
    this.ledger.transfer(this.address, this.address, this.exitFeeRecipient, exitFee);
    this.ledger.burn(this.address, this.address, bsub(poolAmountIn, exitFee));
  }

  // ================================================================================================
  // FLASH LOANS AND RECONCILIATION
  // ================================================================================================

  /**
   * ⚡ FLASH BORROW: lend `amount` for the duration of the recipient's callback.
   * The pool stays locked while the callback runs.
   */
  flashBorrow(caller: string, recipient: FlashLoanRecipient, token: string, amount: bigint, data: string): bigint {
    return this.call(() => {
      const record = this.requireBound(token);
      ensure(amount <= record.balance, 'ERR_INSUFFICIENT_BAL');
      const balanceStart = this.ledger.balanceOf(token, this.address);
      const fee = bmul(amount, FLASH_FEE_RATE);
      const amountDue = badd(amount, fee);

      this.ledger.transfer(token, this.address, recipient.address, amount);
      recipient.receiveFlashLoan(token, amount, amountDue, data);

      const balanceEnd = this.ledger.balanceOf(token, this.address);
      ensure(balanceEnd >= badd(balanceStart, fee), 'ERR_INSUFFICIENT_PAYMENT');
      this.updateInputToken(token, record, balanceEnd, true);

      this.ledger.emit({ type: 'flash-loan', pool: this.address, recipient: recipient.address, token, amount, fee });
      this.logger.debug(`⚡ ${caller} borrowed ${amount} of ${token} (fee ${fee})`);
      return fee;
    });
  }

  /**
   * 🔄 GULP: sync the recorded balance with the held amount. A token the pool does not
   * bind is forwarded to the unbind handler.
   */
  gulp(token: string): bigint {
    return this.call(() => {
      const balance = this.ledger.balanceOf(token, this.address);
      const record = this.records.get(token);
      if (record?.bound) {
        this.updateInputToken(token, record, balance, false);
        return record.balance;
      }
      if (balance > 0n && this.unbindHandler) this.pushToUnbindHandler(token, balance);
      return 0n;
    });
  }

  // ================================================================================================
  // POOL SHARES
  // ================================================================================================

  transfer(caller: string, to: string, amount: bigint): void {
    this.ledger.transact(() => this.ledger.transfer(this.address, caller, to, amount));
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply(this.address);
  }

  balanceOf(account: string): bigint {
    return this.ledger.balanceOf(this.address, account);
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  isInitialized(): boolean {
    return this.initialized;
  }

  isPublicSwap(): boolean {
    return this.publicSwap;
  }

  getController(): string {
    return this.controller;
  }

  getSwapFee(): bigint {
    return this.swapFee;
  }

  getExitFee(): bigint {
    return EXIT_FEE;
  }

  getExitFeeRecipient(): string {
    return this.exitFeeRecipient;
  }

  getMaxPoolTokens(): bigint {
    return this.maxPoolTokens;
  }

  getNumTokens(): number {
    return this.currentTokens.length;
  }

  getCurrentTokens(): string[] {
    return [...this.currentTokens];
  }

  /** Tokens that are not scheduled for removal */
  getCurrentDesiredTokens(): string[] {
    return this.currentTokens.filter((token) => this.requireBound(token).desiredDenorm > 0n);
  }

  isBound(token: string): boolean {
    return this.records.get(token)?.bound ?? false;
  }

  getTokenRecord(token: string): TokenRecord {
    return cloneRecord(this.requireBound(token));
  }

  getDenormalizedWeight(token: string): bigint {
    return this.requireBound(token).denorm;
  }

  getTotalDenormalizedWeight(): bigint {
    return this.totalWeight;
  }

  getBalance(token: string): bigint {
    return this.requireBound(token).balance;
  }

  getMinimumBalance(token: string): bigint {
    const record = this.requireBound(token);
    ensure(!record.ready, 'ERR_READY');
    return record.minimumBalance;
  }

  /** Balance the token is priced with: the minimum balance until it is ready */
  getUsedBalance(token: string): bigint {
    this.viewLock();
    const record = this.requireBound(token);
    return record.ready ? record.balance : record.minimumBalance;
  }

  getSpotPrice(tokenIn: string, tokenOut: string): bigint {
    this.viewLock();
    return this.priceOf(this.getInputToken(tokenIn), this.getOutputToken(tokenOut));
  }

  snapshot(): PoolSnapshot {
    return {
      address: this.address,
      name: this.name,
      symbol: this.symbol,
      controller: this.controller,
      initialized: this.initialized,
      publicSwap: this.publicSwap,
      swapFee: this.swapFee,
      exitFee: EXIT_FEE,
      exitFeeRecipient: this.exitFeeRecipient,
      maxPoolTokens: this.maxPoolTokens,
      totalSupply: this.totalSupply(),
      totalWeight: this.totalWeight,
      tokens: this.currentTokens.map((address) => ({ address, ...this.requireBound(address) })),
    };
  }

  // ================================================================================================
  // TOKEN LIFECYCLE
  // ================================================================================================

  private requireBound(token: string): TokenRecord {
    const record = this.records.get(token);
    if (!record?.bound) throw new RevertError('ERR_NOT_BOUND', token);
    return record;
  }

  private getInputToken(token: string): PricedToken {
    const record = this.requireBound(token);
    if (record.ready) return { ready: true, balance: record.balance, denorm: record.denorm };
    const balance = record.balance > record.minimumBalance ? record.balance : record.minimumBalance;
    return { ready: false, balance, denorm: MIN_WEIGHT };
  }

  private getOutputToken(token: string): PricedToken {
    const record = this.requireBound(token);
    ensure(record.ready, 'ERR_OUT_NOT_READY', token);
    return { ready: true, balance: record.balance, denorm: record.denorm };
  }

  private priceOf(inToken: PricedToken, outToken: PricedToken): bigint {
    return calcSpotPrice(inToken.balance, inToken.denorm, outToken.balance, outToken.denorm, this.swapFee);
  }

  private bind(token: string, minimumBalance: bigint, desiredDenorm: bigint): void {
    ensure(this.currentTokens.length < MAX_BOUND_TOKENS, 'ERR_MAX_TOKENS');
    ensure(minimumBalance >= MIN_BALANCE, 'ERR_MIN_BALANCE');
    this.records.set(token, {
      bound: true,
      ready: false,
      denorm: 0n,
      desiredDenorm,
      balance: 0n,
      minimumBalance,
      lastDenormUpdate: this.ledger.now(),
      index: this.currentTokens.length,
    });
    this.currentTokens.push(token);
    this.ledger.emit({ type: 'token-added', pool: this.address, token, desiredDenorm, minimumBalance });
    this.logger.info(`➕ ${this.symbol}: bound ${token} (min balance ${minimumBalance})`);
  }

  /** Swap-with-last removal; the remaining balance goes to the unbind handler */
  private unbind(token: string): void {
    const record = this.requireBound(token);
    const balance = record.balance;
    const lastIndex = this.currentTokens.length - 1;
    const lastToken = this.currentTokens[lastIndex];
    if (record.index !== lastIndex) {
      this.currentTokens[record.index] = lastToken;
      this.requireBound(lastToken).index = record.index;
    }
    this.currentTokens.pop();
    this.records.delete(token);

    if (balance > 0n) this.pushToUnbindHandler(token, balance);
    this.ledger.emit({ type: 'token-removed', pool: this.address, token, balance });
    this.logger.info(`🗑️ ${this.symbol}: unbound ${token}`);
  }

  private pushToUnbindHandler(token: string, amount: bigint): void {
    const handler = this.unbindHandler;
    if (!handler) throw new RevertError('ERR_NOT_INITIALIZED', 'no unbind handler');
    this.ledger.transfer(token, this.address, handler.address, amount);
    handler.handleUnbindToken(this.address, token, amount);
  }

  private setDesiredDenorm(token: string, desiredDenorm: bigint): void {
    const record = this.requireBound(token);
    ensure(desiredDenorm >= MIN_WEIGHT || desiredDenorm === 0n, 'ERR_MIN_WEIGHT');
    ensure(desiredDenorm <= MAX_WEIGHT, 'ERR_MAX_WEIGHT');
    record.desiredDenorm = desiredDenorm;
    record.lastDenormUpdate = this.ledger.now();
    this.ledger.emit({ type: 'desired-denorm-set', pool: this.address, token, desiredDenorm });
  }

  private assignMinimumBalance(token: string, record: TokenRecord, minimumBalance: bigint): void {
    ensure(minimumBalance >= MIN_BALANCE, 'ERR_MIN_BALANCE');
    record.minimumBalance = minimumBalance;
    this.ledger.emit({ type: 'minimum-balance-set', pool: this.address, token, minimumBalance });
  }

  /**
   * 📈 Record a balance increase. Reaching the minimum balance makes the token ready with
   * MIN_WEIGHT plus a bonus proportional to the excess; a ready token steps toward its target.
   */
  private updateInputToken(token: string, record: TokenRecord, realBalance: bigint, interpolate: boolean): void {
    if (!record.ready) {
      const room = MAX_TOTAL_WEIGHT - this.totalWeight;
      if (realBalance >= record.minimumBalance && room < MIN_WEIGHT) {
        this.logger.debug(`⏭️ ${this.symbol}: ${token} stays not ready, total weight ceiling`);
      } else if (realBalance >= record.minimumBalance) {
        const minimumBalance = record.minimumBalance;
        const balRatio = bdiv(bsub(realBalance, minimumBalance), minimumBalance);
        let denorm = badd(MIN_WEIGHT, bmul(MIN_WEIGHT, balRatio));
        if (denorm > MAX_READY_WEIGHT) denorm = MAX_READY_WEIGHT;
        if (denorm > room) denorm = room;

        record.ready = true;
        record.denorm = denorm;
        record.minimumBalance = 0n;
        record.lastDenormUpdate = this.ledger.now();
        this.totalWeight = badd(this.totalWeight, denorm);
        this.ledger.emit({ type: 'token-ready', pool: this.address, token, denorm });
        this.logger.info(`✅ ${this.symbol}: ${token} is ready (denorm ${denorm})`);
      }
    } else if (interpolate) {
      this.increaseDenorm(token, record);
    }
    record.balance = realBalance;
  }

  private canAdjust(record: TokenRecord): boolean {
    return this.ledger.now() - record.lastDenormUpdate >= WEIGHT_UPDATE_DELAY;
  }

  private increaseDenorm(token: string, record: TokenRecord): void {
    const oldWeight = record.denorm;
    if (oldWeight >= record.desiredDenorm || !this.canAdjust(record)) return;

    const maxDiff = bmul(oldWeight, WEIGHT_CHANGE_PCT);
    let denorm = record.desiredDenorm;
    if (denorm - oldWeight > maxDiff) denorm = badd(oldWeight, maxDiff);

    const diff = denorm - oldWeight;
    if (badd(this.totalWeight, diff) > MAX_TOTAL_WEIGHT) {
      this.logger.debug(`⏭️ ${this.symbol}: weight increase of ${token} skipped, total weight ceiling`);
      return;
    }
    this.totalWeight = badd(this.totalWeight, diff);
    record.denorm = denorm;
    record.lastDenormUpdate = this.ledger.now();
  }

  /** Output-side step; evicts a token scheduled for removal once it decays under MIN_WEIGHT */
  private decreaseDenorm(token: string, record: TokenRecord): void {
    const oldWeight = record.denorm;
    if (oldWeight <= record.desiredDenorm || !this.canAdjust(record)) return;

    const maxDiff = bmul(oldWeight, WEIGHT_CHANGE_PCT);
    let denorm = record.desiredDenorm;
    if (oldWeight - denorm > maxDiff) denorm = bsub(oldWeight, maxDiff);

    if (record.desiredDenorm === 0n && denorm < MIN_WEIGHT) {
      this.totalWeight = bsub(this.totalWeight, oldWeight);
      this.unbind(token);
      return;
    }
    this.totalWeight = bsub(this.totalWeight, oldWeight - denorm);
    record.denorm = denorm;
    record.lastDenormUpdate = this.ledger.now();
  }

  // ================================================================================================
  // SNAPSHOT
  // ================================================================================================

  captureState(): IndexPoolState {
    return {
      controller: this.controller,
      initialized: this.initialized,
      publicSwap: this.publicSwap,
      swapFee: this.swapFee,
      exitFeeRecipient: this.exitFeeRecipient,
      maxPoolTokens: this.maxPoolTokens,
      unbindHandler: this.unbindHandler,
      records: cloneRecords(this.records),
      currentTokens: [...this.currentTokens],
      totalWeight: this.totalWeight,
    };
  }

  restoreState(state: IndexPoolState): void {
    this.controller = state.controller;
    this.initialized = state.initialized;
    this.publicSwap = state.publicSwap;
    this.swapFee = state.swapFee;
    this.exitFeeRecipient = state.exitFeeRecipient;
    this.maxPoolTokens = state.maxPoolTokens;
    this.unbindHandler = state.unbindHandler;
    this.records = state.records;
    this.currentTokens = state.currentTokens;
    this.totalWeight = state.totalWeight;
  }
}
