import { describe, it, expect, beforeEach } from 'vitest';

import { createLogger } from '@/utils';
import { EventBus } from '../event-bus';
import { DAY, HOUR, ManualClock } from '../ledger/clock';
import { Ledger } from '../ledger/ledger';
import { BONE } from '../math/bnum';
import { PriceOracle } from '../oracle/price-oracle';
import type { LedgerLog } from '../types';
import { MAX_CATEGORY_TOKENS, TokenCategories } from './token-categories';

const logger = createLogger('[test]');
const OWNER = 'owner';

describe('TokenCategories', () => {
  let clock: ManualClock;
  let ledger: Ledger;
  let oracle: PriceOracle;
  let categories: TokenCategories;
  let logs: LedgerLog[];

  /** One supply unit per token; the price sets the market cap */
  function listToken(token: string, price: bigint): void {
    ledger.mint(token, 'holder', BONE);
    oracle.recordPrice(token, price);
  }

  function refreshPrices(prices: Record<string, bigint>): void {
    for (const [token, price] of Object.entries(prices)) oracle.recordPrice(token, price);
    clock.advance(HOUR);
    for (const [token, price] of Object.entries(prices)) oracle.recordPrice(token, price);
  }

  beforeEach(() => {
    clock = new ManualClock();
    const eventBus = new EventBus({ logger });
    ledger = new Ledger({ logger, clock, eventBus });
    oracle = new PriceOracle({ logger, ledger, observationPeriod: HOUR, minTimeElapsed: HOUR, maxTimeElapsed: 2 * DAY });
    categories = new TokenCategories({ logger, ledger, oracle, owner: OWNER });
    logs = [];
    eventBus.onLog((entry) => logs.push(entry));

    listToken('A', 10n * BONE);
    listToken('B', 2n * BONE);
    listToken('C', BONE);
    refreshPrices({ A: 10n * BONE, B: 2n * BONE, C: BONE });
  });

  describe('management', () => {
    it('creates sequential categories for the owner only', () => {
      expect(() => categories.createCategory('stranger', '0x01')).toThrow('ERR_NOT_OWNER');
      expect(categories.createCategory(OWNER, '0x01')).toBe(1);
      expect(categories.createCategory(OWNER, '0x02')).toBe(2);
      expect(categories.getCategoryIndex()).toBe(2);
      expect(categories.hasCategory(2)).toBe(true);
      expect(categories.hasCategory(3)).toBe(false);
      expect(logs.filter((entry) => entry.type === 'category-added')).toHaveLength(2);
    });

    it('rejects unknown categories and duplicate tokens', () => {
      const id = categories.createCategory(OWNER, '0x01');
      expect(() => categories.addToken(OWNER, 9, 'A')).toThrow('ERR_CATEGORY_ID');
      categories.addToken(OWNER, id, 'A');
      expect(() => categories.addToken(OWNER, id, 'A')).toThrow('ERR_TOKEN_EXISTS');
      expect(() => categories.addToken('stranger', id, 'B')).toThrow('ERR_NOT_OWNER');
    });

    it('requires a price observation in the current bucket', () => {
      const id = categories.createCategory(OWNER, '0x01');
      expect(() => categories.addToken(OWNER, id, 'UNPRICED')).toThrow('ERR_NO_PRICE');
      clock.advance(HOUR);
      expect(() => categories.addToken(OWNER, id, 'A')).toThrow('ERR_NO_PRICE');
      oracle.recordPrice('A', 10n * BONE);
      categories.addToken(OWNER, id, 'A');
      expect(categories.getCategoryTokens(id)).toEqual(['A']);
    });

    it(`caps a category at ${MAX_CATEGORY_TOKENS} tokens`, () => {
      const id = categories.createCategory(OWNER, '0x01');
      const tokens = Array.from({ length: MAX_CATEGORY_TOKENS + 1 }, (_, i) => `T${i}`);
      for (const token of tokens) oracle.recordPrice(token, BONE);
      categories.addTokens(OWNER, id, tokens.slice(0, MAX_CATEGORY_TOKENS));
      expect(() => categories.addToken(OWNER, id, tokens[MAX_CATEGORY_TOKENS])).toThrow('ERR_MAX_CATEGORY_TOKENS');
    });

    it('adds a batch atomically', () => {
      const id = categories.createCategory(OWNER, '0x01');
      expect(() => categories.addTokens(OWNER, id, ['A', 'B', 'A'])).toThrow('ERR_TOKEN_EXISTS');
      expect(categories.getCategoryTokens(id)).toEqual([]);
      expect(logs.filter((entry) => entry.type === 'category-token-added')).toHaveLength(0);
    });

    it('removes a token', () => {
      const id = categories.createCategory(OWNER, '0x01');
      categories.addTokens(OWNER, id, ['A', 'B', 'C']);
      categories.removeToken(OWNER, id, 'B');
      expect(categories.getCategoryTokens(id)).toEqual(['A', 'C']);
      expect(() => categories.removeToken(OWNER, id, 'B')).toThrow('ERR_TOKEN_NOT_FOUND');
    });
  });

  describe('sorting', () => {
    it('sorts caps of 10:2:1 into descending order A, B, C', () => {
      const id = categories.createCategory(OWNER, '0x01');
      categories.addTokens(OWNER, id, ['C', 'A', 'B']);

      expect(categories.orderCategoryTokensByMarketCap(id)).toEqual(['A', 'B', 'C']);
      expect(categories.getCategoryTokens(id)).toEqual(['A', 'B', 'C']);
      expect(categories.getCategoryMarketCaps(id)).toEqual([10n * BONE, 2n * BONE, BONE]);
      expect(categories.getLastCategoryUpdate(id)).toBe(clock.now());
      expect(logs.at(-1)).toEqual({ type: 'category-sorted', categoryID: id, tokens: ['A', 'B', 'C'] });
    });

    it('serves top tokens only while the sort is fresh', () => {
      const id = categories.createCategory(OWNER, '0x01');
      categories.addTokens(OWNER, id, ['C', 'A', 'B']);
      expect(() => categories.getTopCategoryTokens(id, 2)).toThrow('ERR_CATEGORY_NOT_READY');

      categories.orderCategoryTokensByMarketCap(id);
      expect(categories.getTopCategoryTokens(id, 2)).toEqual(['A', 'B']);
      expect(() => categories.getTopCategoryTokens(id, 4)).toThrow('ERR_CATEGORY_SIZE');

      clock.advance(DAY);
      expect(categories.getTopCategoryTokens(id, 3)).toEqual(['A', 'B', 'C']);
      clock.advance(1);
      expect(() => categories.getTopCategoryTokens(id, 3)).toThrow('ERR_CATEGORY_NOT_READY');
    });
  });

  it('transfers ownership', () => {
    categories.transferOwnership(OWNER, 'next-owner');
    expect(categories.getOwner()).toBe('next-owner');
    expect(() => categories.createCategory(OWNER, '0x01')).toThrow('ERR_NOT_OWNER');
    expect(categories.createCategory('next-owner', '0x01')).toBe(1);
  });
});
