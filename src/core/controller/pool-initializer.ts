/**
 * 🌱 POOL INITIALIZER: escrow that collects a prepared pool's first balances
 *
 * Contributors receive credit equal to the averaged ETH value of what they deposit.
 * Once every desired amount is filled, `finish` hands the tokens to the controller,
 * which initializes the pool and mints INIT_POOL_SUPPLY here. Contributors then claim
 * pool tokens pro rata to their credit.
 */
import type { Logger } from '@/utils';
import { ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import type { IPriceSource } from '../oracle/price-oracle';

/** The controller call that initializes a prepared pool */
export interface PreparedPoolFinisher {
  finishPreparedIndexPool(caller: string, pool: string, tokens: string[], balances: bigint[]): void;
}

export interface PoolInitializerInput {
  logger: Logger;
  ledger: Ledger;
  address: string;
  pool: string;
  controller: PreparedPoolFinisher;
  oracle: IPriceSource;
  tokens: string[];
  amounts: bigint[];
}

interface PoolInitializerState {
  desiredAmounts: Map<string, bigint>;
  credits: Map<string, bigint>;
  totalCredit: bigint;
  finished: boolean;
  poolTokensReceived: bigint;
}

export class PoolInitializer implements Stateful<PoolInitializerState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  private readonly controller: PreparedPoolFinisher;
  private readonly oracle: IPriceSource;
  readonly address: string;
  readonly pool: string;
  private readonly desiredTokens: string[];

  private desiredAmounts: Map<string, bigint> = new Map(); // remaining
  private credits: Map<string, bigint> = new Map();
  private totalCredit = 0n;
  private finished = false;
  private poolTokensReceived = 0n;

  constructor(input: PoolInitializerInput) {
    ensure(input.tokens.length === input.amounts.length, 'ERR_ARR_LEN');
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.address = input.address;
    this.pool = input.pool;
    this.controller = input.controller;
    this.oracle = input.oracle;
    this.desiredTokens = [...input.tokens];
    input.tokens.forEach((token, i) => this.desiredAmounts.set(token, input.amounts[i]));
    this.ledger.register(this);
  }

  // ================================================================================================
  // CONTRIBUTIONS
  // ================================================================================================

  /**
   * 💰 CONTRIBUTE: deposit up to the remaining desired amount of `token`
   * @returns credit granted
   */
  contributeTokens(caller: string, token: string, amountIn: bigint, minimumCredit: bigint): bigint {
    return this.ledger.transact(() => {
      const credit = this.contribute(caller, token, amountIn);
      ensure(credit >= minimumCredit, 'ERR_MIN_CREDIT', `credit ${credit} below ${minimumCredit}`);
      return credit;
    });
  }

  contributeTokensBatch(caller: string, tokens: string[], amountsIn: bigint[], minimumCredit: bigint): bigint {
    return this.ledger.transact(() => {
      ensure(tokens.length === amountsIn.length, 'ERR_ARR_LEN');
      let credit = 0n;
      for (let i = 0; i < tokens.length; i++) {
        credit += this.contribute(caller, tokens[i], amountsIn[i]);
      }
      ensure(credit >= minimumCredit, 'ERR_MIN_CREDIT', `credit ${credit} below ${minimumCredit}`);
      return credit;
    });
  }

  private contribute(caller: string, token: string, amountIn: bigint): bigint {
    ensure(!this.finished, 'ERR_FINISHED');
    const desired = this.desiredAmounts.get(token) ?? 0n;
    ensure(desired > 0n, 'ERR_NOT_NEEDED', token);

    const amount = amountIn > desired ? desired : amountIn;
    const credit = this.oracle.computeAverageEthForTokens(token, amount);
    ensure(credit > 0n, 'ERR_MIN_CREDIT', 'contribution carries no value');

    this.ledger.transfer(token, caller, this.address, amount);
    this.desiredAmounts.set(token, desired - amount);
    this.credits.set(caller, (this.credits.get(caller) ?? 0n) + credit);
    this.totalCredit += credit;
    this.ledger.emit({ type: 'tokens-contributed', initializer: this.address, from: caller, token, amount, credit });
    return credit;
  }

  // ================================================================================================
  // FINISH AND CLAIM
  // ================================================================================================

  /**
   * 🏁 FINISH: callable by anyone once nothing is pending
   */
  finish(): void {
    this.ledger.transact(() => {
      ensure(!this.finished, 'ERR_FINISHED');
      const pending = this.desiredTokens.filter((token) => (this.desiredAmounts.get(token) ?? 0n) > 0n);
      ensure(pending.length === 0, 'ERR_PENDING_TOKENS', pending.join(', '));

      this.finished = true;
      const balances = this.desiredTokens.map((token) => this.ledger.balanceOf(token, this.address));
      this.controller.finishPreparedIndexPool(this.address, this.pool, [...this.desiredTokens], balances);
      this.poolTokensReceived = this.ledger.balanceOf(this.pool, this.address);

      this.ledger.emit({
        type: 'initializer-finished',
        initializer: this.address,
        pool: this.pool,
        poolTokensReceived: this.poolTokensReceived,
      });
      this.logger.info(`🏁 initializer for ${this.pool} finished, received ${this.poolTokensReceived} pool tokens`);
    });
  }

  claimTokens(caller: string): bigint {
    return this.ledger.transact(() => {
      ensure(this.finished, 'ERR_NOT_FINISHED');
      return this.claimFor(caller);
    });
  }

  /** Claim on behalf of several accounts; accounts without credit are skipped */
  claimTokensFor(accounts: string[]): bigint[] {
    return this.ledger.transact(() => {
      ensure(this.finished, 'ERR_NOT_FINISHED');
      return accounts.map((account) => ((this.credits.get(account) ?? 0n) > 0n ? this.claimFor(account) : 0n));
    });
  }

  private claimFor(account: string): bigint {
    const credit = this.credits.get(account) ?? 0n;
    ensure(credit > 0n, 'ERR_NULL_CREDIT', account);
    const amount = (this.poolTokensReceived * credit) / this.totalCredit;
    this.credits.delete(account);
    this.ledger.transfer(this.pool, this.address, account, amount);
    this.ledger.emit({ type: 'tokens-claimed', initializer: this.address, account, amount });
    return amount;
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  getDesiredTokens(): string[] {
    return [...this.desiredTokens];
  }

  getDesiredAmount(token: string): bigint {
    return this.desiredAmounts.get(token) ?? 0n;
  }

  getDesiredAmounts(tokens: string[]): bigint[] {
    return tokens.map((token) => this.getDesiredAmount(token));
  }

  /** Credit a contribution would earn right now, after trimming to the remaining desire */
  getCreditForTokens(token: string, amountIn: bigint): bigint {
    const desired = this.getDesiredAmount(token);
    ensure(desired > 0n, 'ERR_NOT_NEEDED', token);
    return this.oracle.computeAverageEthForTokens(token, amountIn > desired ? desired : amountIn);
  }

  getCreditOf(account: string): bigint {
    return this.credits.get(account) ?? 0n;
  }

  getTotalCredit(): bigint {
    return this.totalCredit;
  }

  isFinished(): boolean {
    return this.finished;
  }

  getPoolTokensReceived(): bigint {
    return this.poolTokensReceived;
  }

  captureState(): PoolInitializerState {
    return structuredClone({
      desiredAmounts: this.desiredAmounts,
      credits: this.credits,
      totalCredit: this.totalCredit,
      finished: this.finished,
      poolTokensReceived: this.poolTokensReceived,
    });
  }

  restoreState(state: PoolInitializerState): void {
    this.desiredAmounts = state.desiredAmounts;
    this.credits = state.credits;
    this.totalCredit = state.totalCredit;
    this.finished = state.finished;
    this.poolTokensReceived = state.poolTokensReceived;
  }
}
