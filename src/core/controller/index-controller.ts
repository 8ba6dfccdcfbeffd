/**
 * 🎛️ INDEX CONTROLLER: deploys, seeds and maintains market-cap-square-root weighted pools
 *
 * Lifecycle of a pool:
 *   prepareIndexPool -> contributions on the initializer -> finishPreparedIndexPool
 *   -> reweighPool every POOL_REWEIGH_DELAY, with every fourth update a reindexPool
 *
 * Weights are proportional to the square root of each token's averaged market cap,
 * scaled so they sum to WEIGHT_MULTIPLIER. Reweigh and reindex are permissionless; the
 * delay and the reweigh counter decide what may run.
 */
import { getCreate2Address, id, keccak256, solidityPacked } from 'ethers';
import { createLogger, type Logger } from '@/utils';
import type { PoolMeta } from '../types';
import { RevertError, ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import { HOUR, WEEK } from '../ledger/clock';
import { BONE, bdiv, bmul, isqrt } from '../math/bnum';
import type { IPriceSource } from '../oracle/price-oracle';
import { MIN_BALANCE, MIN_WEIGHT } from '../pool/constants';
import type { IndexPool } from '../pool/index-pool';
import { ZeroAddress } from '../registry/addresses';
import { implementationIdFor } from '../registry/implementation-registry';
import { POOL_IMPLEMENTATION_NAME, type PoolFactory } from '../registry/pool-factory';
import { UnboundTokenSeller, validatePremium } from '../sink/unbound-token-seller';
import { PoolInitializer, type PreparedPoolFinisher } from './pool-initializer';
import type { TokenCategories } from './token-categories';

export const MIN_INDEX_SIZE = 2;
export const MAX_INDEX_SIZE = 10;
export const WEIGHT_MULTIPLIER = 25n * BONE;
export const POOL_REWEIGH_DELAY = 2 * WEEK;
export const REWEIGHS_BEFORE_REINDEX = 3;
export const MIN_BALANCE_UPDATE_DELAY = 6 * HOUR;
export const MIN_BALANCE_VALUE_SHARE = BONE / 100n; // 1% of the token's share of pool value

const INITIALIZER_INIT_HASH = keccak256(id('PoolInitializer'));
const SELLER_INIT_HASH = keccak256(id('UnboundTokenSeller'));

export interface IndexControllerInput {
  logger: Logger;
  ledger: Ledger;
  address: string;
  categories: TokenCategories;
  oracle: IPriceSource;
  factory: PoolFactory;
  defaultExitFeeRecipient: string;
  defaultSellerPremium: number;
}

interface ManagedPool {
  pool: IndexPool;
  meta: PoolMeta;
  initializer: PoolInitializer;
  seller: UnboundTokenSeller | null;
}

interface IndexControllerState {
  pools: Map<string, ManagedPool>;
  defaultExitFeeRecipient: string;
  defaultSellerPremium: number;
}

export interface PreparedPool {
  pool: string;
  initializer: string;
  tokens: string[];
  balances: bigint[];
}

// ================================================================================================
// WEIGHTING
// ================================================================================================

/** Denormalized weights proportional to sqrt(market cap), summing to WEIGHT_MULTIPLIER */
export function computeSqrtCapDenorms(marketCaps: bigint[]): bigint[] {
  const sqrts = marketCaps.map(isqrt);
  const sum = sqrts.reduce((acc, value) => acc + value, 0n);
  ensure(sum > 0n, 'ERR_DIV_ZERO', 'market caps are all zero');
  return sqrts.map((sqrt) => {
    const denorm = (sqrt * WEIGHT_MULTIPLIER) / sum;
    return denorm < MIN_WEIGHT ? MIN_WEIGHT : denorm;
  });
}

// ================================================================================================
// INDEX CONTROLLER CLASS
// ================================================================================================

export class IndexController implements PreparedPoolFinisher, Stateful<IndexControllerState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  private readonly categories: TokenCategories;
  private readonly oracle: IPriceSource;
  private readonly factory: PoolFactory;
  private readonly poolImplementationID = implementationIdFor(POOL_IMPLEMENTATION_NAME);
  readonly address: string;

  private pools: Map<string, ManagedPool> = new Map();
  private defaultExitFeeRecipient: string;
  private defaultSellerPremium: number;

  constructor(input: IndexControllerInput) {
    ensure(input.defaultExitFeeRecipient !== ZeroAddress, 'ERR_NULL_ADDRESS');
    validatePremium(input.defaultSellerPremium);
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.address = input.address;
    this.categories = input.categories;
    this.oracle = input.oracle;
    this.factory = input.factory;
    this.defaultExitFeeRecipient = input.defaultExitFeeRecipient;
    this.defaultSellerPremium = input.defaultSellerPremium;
    this.ledger.register(this);
  }

  private onlyOwner(caller: string): void {
    this.categories.onlyOwner(caller);
  }

  // ================================================================================================
  // ADDRESSES
  // ================================================================================================

  private poolSalt(categoryID: number, indexSize: number): string {
    return keccak256(solidityPacked(['uint256', 'uint256'], [categoryID, indexSize]));
  }

  computePoolAddress(categoryID: number, indexSize: number): string {
    return this.factory.computePoolAddress(this.poolImplementationID, this.address, this.poolSalt(categoryID, indexSize));
  }

  computeInitializerAddress(pool: string): string {
    return getCreate2Address(this.address, keccak256(pool), INITIALIZER_INIT_HASH);
  }

  computeSellerAddress(pool: string): string {
    return getCreate2Address(this.address, keccak256(pool), SELLER_INIT_HASH);
  }

  // ================================================================================================
  // POOL DEPLOYMENT
  // ================================================================================================

  /**
   * Top `indexSize` tokens of a category and the balances worth `totalValue` ETH split by
   * sqrt-cap weight
   */
  getInitialTokensAndBalances(
    categoryID: number,
    indexSize: number,
    totalValue: bigint,
  ): { tokens: string[]; balances: bigint[] } {
    const tokens = this.categories.getTopCategoryTokens(categoryID, indexSize);
    const sqrts = this.oracle.averageMarketCaps(tokens).map(isqrt);
    const sum = sqrts.reduce((acc, value) => acc + value, 0n);
    ensure(sum > 0n, 'ERR_DIV_ZERO', 'market caps are all zero');

    const balances = tokens.map((token, i) => {
      const balance = this.oracle.computeAverageTokensForEth(token, (totalValue * sqrts[i]) / sum);
      ensure(balance >= MIN_BALANCE, 'ERR_MIN_BALANCE', `${token} balance ${balance}`);
      return balance;
    });
    return { tokens, balances };
  }

  /**
   * 🧪 PREPARE: deploy an uninitialized pool and the initializer that will fund it
   */
  prepareIndexPool(
    caller: string,
    categoryID: number,
    indexSize: number,
    totalValue: bigint,
    name: string,
    symbol: string,
  ): PreparedPool {
    return this.ledger.transact(() => {
      this.onlyOwner(caller);
      ensure(indexSize >= MIN_INDEX_SIZE, 'ERR_MIN_INDEX_SIZE');
      ensure(indexSize <= MAX_INDEX_SIZE, 'ERR_MAX_INDEX_SIZE');
      const { tokens, balances } = this.getInitialTokensAndBalances(categoryID, indexSize, totalValue);

      const poolAddress = this.computePoolAddress(categoryID, indexSize);
      ensure(!this.pools.has(poolAddress), 'ERR_POOL_EXISTS', poolAddress);
      const pool = this.factory.deployPool(this.address, this.poolImplementationID, this.poolSalt(categoryID, indexSize), {
        name,
        symbol,
        controller: this.address,
      });

      const initializerAddress = this.computeInitializerAddress(poolAddress);
      const initializer = new PoolInitializer({
        logger: createLogger(`[Initializer ${symbol}]`),
        ledger: this.ledger,
        address: initializerAddress,
        pool: poolAddress,
        controller: this,
        oracle: this.oracle,
        tokens,
        amounts: balances,
      });

      this.pools.set(poolAddress, {
        pool,
        initializer,
        seller: null,
        meta: {
          initialized: false,
          categoryID,
          indexSize,
          reweighIndex: 0,
          lastReweigh: 0,
          initializer: initializerAddress,
          sink: null,
        },
      });
      this.ledger.emit({ type: 'pool-prepared', pool: poolAddress, initializer: initializerAddress, categoryID, indexSize });
      this.logger.info(`🧪 prepared ${symbol} at ${poolAddress} (category ${categoryID}, ${indexSize} tokens)`);
      return { pool: poolAddress, initializer: initializerAddress, tokens, balances };
    });
  }

  /**
   * 🚀 FINISH: called by the pool's initializer with the tokens it collected. Deploys the
   * liquidity sink and initializes the pool with sqrt-cap weights.
   */
  finishPreparedIndexPool(caller: string, poolAddress: string, tokens: string[], balances: bigint[]): void {
    this.ledger.transact(() => {
      const managed = this.requirePool(poolAddress);
      ensure(caller === managed.meta.initializer, 'ERR_NOT_INITIALIZER', caller);
      ensure(tokens.length === balances.length, 'ERR_ARR_LEN');
      ensure(!managed.meta.initialized, 'ERR_INITIALIZED');

      const denorms = computeSqrtCapDenorms(this.oracle.averageMarketCaps(tokens));
      const seller = new UnboundTokenSeller({
        logger: createLogger(`[Seller ${managed.pool.symbol}]`),
        ledger: this.ledger,
        address: this.computeSellerAddress(poolAddress),
        pool: managed.pool,
        controller: this.address,
        oracle: this.oracle,
        premiumPercent: this.defaultSellerPremium,
      });
      managed.pool.initialize(this.address, tokens, balances, denorms, caller, seller, this.defaultExitFeeRecipient);

      managed.seller = seller;
      managed.meta.initialized = true;
      managed.meta.sink = seller.address;
      managed.meta.lastReweigh = this.ledger.now();
    });
  }

  // ================================================================================================
  // POOL MAINTENANCE
  // ================================================================================================

  /**
   * ⚖️ REWEIGH: refresh target weights of the pool's desired tokens from averaged caps
   */
  reweighPool(poolAddress: string): void {
    this.ledger.transact(() => {
      const managed = this.requireMaintainable(poolAddress);
      const { meta, pool } = managed;
      ensure((meta.reweighIndex + 1) % (REWEIGHS_BEFORE_REINDEX + 1) !== 0, 'ERR_REWEIGH_INDEX');

      const tokens = pool.getCurrentDesiredTokens();
      const denorms = computeSqrtCapDenorms(this.oracle.averageMarketCaps(tokens));
      meta.lastReweigh = this.ledger.now();
      meta.reweighIndex++;
      pool.reweighTokens(this.address, tokens, denorms);

      this.ledger.emit({ type: 'pool-reweighed', pool: poolAddress, reweighIndex: meta.reweighIndex });
      this.logger.info(`⚖️ reweighed ${pool.symbol} (#${meta.reweighIndex})`);
    });
  }

  /**
   * 🔁 REINDEX: replace the pool's membership with the category's current top tokens.
   * Tokens that enter get a minimum balance worth 1% of their target share of pool value.
   */
  reindexPool(poolAddress: string): void {
    this.ledger.transact(() => {
      const managed = this.requireMaintainable(poolAddress);
      const { meta, pool } = managed;
      ensure((meta.reweighIndex + 1) % (REWEIGHS_BEFORE_REINDEX + 1) === 0, 'ERR_REWEIGH_INDEX');

      const tokens = this.categories.getTopCategoryTokens(meta.categoryID, meta.indexSize);
      const denorms = computeSqrtCapDenorms(this.oracle.averageMarketCaps(tokens));
      const poolValue = this.extrapolatePoolValue(pool);
      const minimumBalances = tokens.map((token, i) => {
        if (pool.isBound(token) && pool.getTokenRecord(token).ready) return 0n;
        return this.minimumBalanceFor(token, denorms[i], poolValue);
      });

      meta.lastReweigh = this.ledger.now();
      meta.reweighIndex++;
      pool.reindexTokens(this.address, tokens, denorms, minimumBalances);

      this.ledger.emit({ type: 'pool-reindexed', pool: poolAddress, reweighIndex: meta.reweighIndex });
      this.logger.info(`🔁 reindexed ${pool.symbol}: ${tokens.join(', ')}`);
    });
  }

  /**
   * 🎚️ UPDATE MINIMUM BALANCE of a not-ready token from the current pool value
   */
  updateMinimumBalance(poolAddress: string, token: string): void {
    this.ledger.transact(() => {
      const { pool, meta } = this.requirePool(poolAddress);
      ensure(meta.initialized, 'ERR_NOT_INITIALIZED');
      const record = pool.getTokenRecord(token);
      ensure(!record.ready, 'ERR_TOKEN_READY', token);
      const elapsed = this.ledger.now() - record.lastDenormUpdate;
      ensure(elapsed >= MIN_BALANCE_UPDATE_DELAY, 'ERR_MIN_BALANCE_DELAY', `${elapsed}s since last update`);

      const minimumBalance = this.minimumBalanceFor(token, record.desiredDenorm, this.extrapolatePoolValue(pool));
      pool.setMinimumBalance(this.address, token, minimumBalance);
    });
  }

  /** Pool value in ETH extrapolated from the first ready token's balance and weight */
  private extrapolatePoolValue(pool: IndexPool): bigint {
    for (const token of pool.getCurrentTokens()) {
      const record = pool.getTokenRecord(token);
      if (!record.ready) continue;
      const value = this.oracle.computeAverageEthForTokens(token, record.balance);
      return bdiv(bmul(value, pool.getTotalDenormalizedWeight()), record.denorm);
    }
    throw new RevertError('ERR_NOT_INITIALIZED', `${pool.address} has no ready token`);
  }

  private minimumBalanceFor(token: string, desiredDenorm: bigint, poolValue: bigint): bigint {
    const share = bdiv(desiredDenorm, WEIGHT_MULTIPLIER);
    const value = bmul(bmul(poolValue, share), MIN_BALANCE_VALUE_SHARE);
    return this.oracle.computeAverageTokensForEth(token, value);
  }

  // ================================================================================================
  // OWNER ADMINISTRATION
  // ================================================================================================

  setDefaultSellerPremium(caller: string, premiumPercent: number): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      validatePremium(premiumPercent);
      this.defaultSellerPremium = premiumPercent;
    });
  }

  updateSellerPremium(caller: string, poolAddress: string, premiumPercent: number): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      const { seller } = this.requirePool(poolAddress);
      ensure(seller !== null, 'ERR_NOT_INITIALIZED');
      seller.setPremiumPercent(this.address, premiumPercent);
    });
  }

  setDefaultExitFeeRecipient(caller: string, recipient: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      ensure(recipient !== ZeroAddress && recipient !== '', 'ERR_NULL_ADDRESS');
      this.defaultExitFeeRecipient = recipient;
    });
  }

  setExitFeeRecipient(caller: string, pools: string | string[], recipient: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      ensure(recipient !== ZeroAddress && recipient !== '', 'ERR_NULL_ADDRESS');
      for (const address of toList(pools)) this.requirePool(address).pool.setExitFeeRecipient(this.address, recipient);
    });
  }

  setSwapFee(caller: string, pools: string | string[], swapFee: bigint): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      for (const address of toList(pools)) this.requirePool(address).pool.setSwapFee(this.address, swapFee);
    });
  }

  /** Hand a pool to another controller; this controller can no longer manage it */
  setController(caller: string, poolAddress: string, controller: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      this.requirePool(poolAddress).pool.setController(this.address, controller);
    });
  }

  setMaxPoolTokens(caller: string, poolAddress: string, maxPoolTokens: bigint): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      this.requirePool(poolAddress).pool.setMaxPoolTokens(this.address, maxPoolTokens);
    });
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.categories.transferOwnership(caller, newOwner);
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  getOwner(): string {
    return this.categories.getOwner();
  }

  getDefaultSellerPremium(): number {
    return this.defaultSellerPremium;
  }

  getDefaultExitFeeRecipient(): string {
    return this.defaultExitFeeRecipient;
  }

  getPoolMeta(poolAddress: string): PoolMeta {
    return { ...this.requirePool(poolAddress).meta };
  }

  isRecognizedPool(poolAddress: string): boolean {
    return this.pools.has(poolAddress);
  }

  getPool(poolAddress: string): IndexPool {
    return this.requirePool(poolAddress).pool;
  }

  getInitializer(poolAddress: string): PoolInitializer {
    return this.requirePool(poolAddress).initializer;
  }

  getSeller(poolAddress: string): UnboundTokenSeller {
    const { seller } = this.requirePool(poolAddress);
    ensure(seller !== null, 'ERR_NOT_INITIALIZED', `${poolAddress} has no seller yet`);
    return seller;
  }

  listPools(): Array<{ address: string; meta: PoolMeta }> {
    return Array.from(this.pools, ([address, managed]) => ({ address, meta: { ...managed.meta } }));
  }

  private requirePool(poolAddress: string): ManagedPool {
    const managed = this.pools.get(poolAddress);
    ensure(managed !== undefined, 'ERR_POOL_NOT_FOUND', poolAddress);
    return managed;
  }

  private requireMaintainable(poolAddress: string): ManagedPool {
    const managed = this.requirePool(poolAddress);
    ensure(managed.meta.initialized, 'ERR_NOT_INITIALIZED');
    const elapsed = this.ledger.now() - managed.meta.lastReweigh;
    ensure(elapsed >= POOL_REWEIGH_DELAY, 'ERR_POOL_REWEIGH_DELAY', `${elapsed}s since last update`);
    return managed;
  }

  // ================================================================================================
  // SNAPSHOT
  // ================================================================================================

  // Pools, initializers and sellers snapshot themselves; only the meta here is mutable
  captureState(): IndexControllerState {
    return {
      pools: new Map(Array.from(this.pools, ([address, managed]) => [address, { ...managed, meta: { ...managed.meta } }])),
      defaultExitFeeRecipient: this.defaultExitFeeRecipient,
      defaultSellerPremium: this.defaultSellerPremium,
    };
  }

  restoreState(state: IndexControllerState): void {
    this.pools = state.pools;
    this.defaultExitFeeRecipient = state.defaultExitFeeRecipient;
    this.defaultSellerPremium = state.defaultSellerPremium;
  }
}

function toList(pools: string | string[]): string[] {
  return Array.isArray(pools) ? pools : [pools];
}
