/**
 * 📈 PRICE ORACLE: time-weighted average ETH prices and market caps
 *
 * Each token keeps a running cumulative price (price × seconds) and at most one
 * observation of that cumulative per `observationPeriod` bucket. The average price is
 * taken between the newest observation aged within [minTimeElapsed, maxTimeElapsed]
 * and now. Prices are ETH per whole token, 18-decimal fixed point.
 */
import type { Logger } from '@/utils';
import { RevertError } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import { bdiv, bmul } from '../math/bnum';

export interface IPriceSource {
  bucketKey(timestamp: number): number;
  hasObservationInWindow(token: string, bucketKey: number): boolean;
  computeAverageTokenPrice(token: string): bigint;
  computeAverageEthForTokens(token: string, amount: bigint): bigint;
  computeAverageTokensForEth(token: string, value: bigint): bigint;
  averageMarketCap(token: string): bigint;
  averageMarketCaps(tokens: string[]): bigint[];
}

export class PriceSourceError extends RevertError {
  constructor(code: 'ERR_NO_PRICE_IN_RANGE' | 'ERR_UNKNOWN_TOKEN', message?: string) {
    super(code, message);
    this.name = 'PriceSourceError';
  }
}

export interface PriceOracleInput {
  logger: Logger;
  ledger: Ledger;
  observationPeriod: number;
  minTimeElapsed: number;
  maxTimeElapsed: number;
}

interface Observation {
  timestamp: number;
  priceCumulative: bigint;
}

interface PriceFeed {
  price: bigint;
  updatedAt: number;
  priceCumulative: bigint;
  observations: Observation[]; // ascending by timestamp
}

type PriceOracleState = Map<string, PriceFeed>;

// ================================================================================================
// PRICE ORACLE CLASS
// ================================================================================================

export class PriceOracle implements IPriceSource, Stateful<PriceOracleState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  readonly observationPeriod: number;
  readonly minTimeElapsed: number;
  readonly maxTimeElapsed: number;

  private feeds: Map<string, PriceFeed> = new Map();

  constructor(input: PriceOracleInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.observationPeriod = input.observationPeriod;
    this.minTimeElapsed = input.minTimeElapsed;
    this.maxTimeElapsed = input.maxTimeElapsed;
    this.ledger.register(this);
  }

  // ================================================================================================
  // FEEDING
  // ================================================================================================

  /**
   * 📝 RECORD PRICE: accumulate the previous price up to now, store the new spot price and
   * take an observation if the current bucket has none yet.
   */
  recordPrice(token: string, price: bigint): void {
    if (price <= 0n) throw new PriceSourceError('ERR_NO_PRICE_IN_RANGE', `non-positive price for ${token}`);
    const now = this.ledger.now();
    const feed = this.feeds.get(token);

    if (!feed) {
      this.feeds.set(token, {
        price,
        updatedAt: now,
        priceCumulative: 0n,
        observations: [{ timestamp: now, priceCumulative: 0n }],
      });
      this.logger.debug(`📈 first price for ${token}: ${price}`);
      return;
    }

    feed.priceCumulative = this.cumulativeAt(feed, now);
    feed.price = price;
    feed.updatedAt = now;

    const last = feed.observations[feed.observations.length - 1];
    if (this.bucketKey(last.timestamp) !== this.bucketKey(now)) {
      feed.observations.push({ timestamp: now, priceCumulative: feed.priceCumulative });
    }
  }

  private cumulativeAt(feed: PriceFeed, timestamp: number): bigint {
    return feed.priceCumulative + feed.price * BigInt(timestamp - feed.updatedAt);
  }

  private requireFeed(token: string): PriceFeed {
    const feed = this.feeds.get(token);
    if (!feed) throw new PriceSourceError('ERR_UNKNOWN_TOKEN', token);
    return feed;
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  bucketKey(timestamp: number): number {
    return Math.floor(timestamp / this.observationPeriod);
  }

  hasObservationInWindow(token: string, bucketKey: number): boolean {
    const feed = this.feeds.get(token);
    if (!feed) return false;
    return feed.observations.some((observation) => this.bucketKey(observation.timestamp) === bucketKey);
  }

  getLastPrice(token: string): bigint {
    return this.requireFeed(token).price;
  }

  /**
   * 🔍 AVERAGE PRICE over the window ending now
   */
  computeAverageTokenPrice(token: string): bigint {
    const feed = this.requireFeed(token);
    const now = this.ledger.now();

    for (let i = feed.observations.length - 1; i >= 0; i--) {
      const observation = feed.observations[i];
      const age = now - observation.timestamp;
      if (age < this.minTimeElapsed || age === 0) continue;
      if (age > this.maxTimeElapsed) break;
      return (this.cumulativeAt(feed, now) - observation.priceCumulative) / BigInt(age);
    }
    throw new PriceSourceError('ERR_NO_PRICE_IN_RANGE', token);
  }

  computeAverageEthForTokens(token: string, amount: bigint): bigint {
    return bmul(this.computeAverageTokenPrice(token), amount);
  }

  computeAverageTokensForEth(token: string, value: bigint): bigint {
    return bdiv(value, this.computeAverageTokenPrice(token));
  }

  /** Average price × circulating supply */
  averageMarketCap(token: string): bigint {
    return bmul(this.computeAverageTokenPrice(token), this.ledger.totalSupply(token));
  }

  averageMarketCaps(tokens: string[]): bigint[] {
    return tokens.map((token) => this.averageMarketCap(token));
  }

  // ================================================================================================
  // SNAPSHOT
  // ================================================================================================

  captureState(): PriceOracleState {
    return structuredClone(this.feeds);
  }

  restoreState(state: PriceOracleState): void {
    this.feeds = state;
  }
}
