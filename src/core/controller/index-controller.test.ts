import { describe, it, expect } from 'vitest';

import { DAY, HOUR } from '../ledger/clock';
import { BONE, toFixed, toNumber } from '../math/bnum';
import { ZeroAddress } from '../registry/addresses';
import type { LedgerLog } from '../types';
import { FEE_RECIPIENT, OWNER, TREASURY, setupController, type ControllerFixture } from './controller.fixture';
import { MIN_BALANCE_UPDATE_DELAY, POOL_REWEIGH_DELAY, computeSqrtCapDenorms } from './index-controller';

const INITIAL_VALUE = toFixed('3.5');

/** Prepare a 3-token pool, fund it from the treasury and finish it */
function launch(fx: ControllerFixture): string {
  const { controller } = fx.env;
  const prepared = controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'Top Three', 'TOP3');
  const initializer = controller.getInitializer(prepared.pool);
  initializer.contributeTokensBatch(TREASURY, prepared.tokens, prepared.balances, 0n);
  initializer.finish();
  initializer.claimTokens(TREASURY);
  return prepared.pool;
}

function nextUpdateWindow(fx: ControllerFixture): void {
  fx.clock.advance(POOL_REWEIGH_DELAY);
  fx.refreshPrices();
}

describe('computeSqrtCapDenorms', () => {
  it('splits 25 by square root of market cap', () => {
    expect(computeSqrtCapDenorms([16n * BONE, 4n * BONE, BONE])).toEqual([
      14285714285714285714n,
      7142857142857142857n,
      3571428571428571428n,
    ]);
  });

  it('lifts tiny weights to MIN_WEIGHT', () => {
    const [, small] = computeSqrtCapDenorms([10_000n * BONE, BONE]);
    expect(small).toBe(BONE / 4n);
  });

  it('rejects all-zero caps', () => {
    expect(() => computeSqrtCapDenorms([0n, 0n])).toThrow('ERR_DIV_ZERO');
  });
});

describe('IndexController', () => {
  describe('prepareIndexPool', () => {
    it('deploys the pool and initializer at their computed addresses', () => {
      const fx = setupController();
      const { controller, factory } = fx.env;
      const logs: LedgerLog[] = [];
      fx.env.eventBus.onLog((entry) => logs.push(entry));

      const prepared = controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'Top Three', 'TOP3');

      expect(prepared.pool).toBe(controller.computePoolAddress(fx.categoryID, 3));
      expect(prepared.pool).not.toBe(controller.computePoolAddress(fx.categoryID, 2));
      expect(prepared.pool).toMatch(/^0x[0-9a-fA-F]{40}$/);
      expect(prepared.initializer).toBe(controller.computeInitializerAddress(prepared.pool));
      expect(prepared.tokens).toEqual(['A', 'B', 'C']);
      expect(prepared.balances).toEqual([2n * BONE, BONE, BONE / 2n]);
      expect(factory.isRecognizedPool(prepared.pool)).toBe(true);
      expect(controller.isRecognizedPool(prepared.pool)).toBe(true);
      expect(controller.getPoolMeta(prepared.pool)).toEqual({
        initialized: false,
        categoryID: fx.categoryID,
        indexSize: 3,
        reweighIndex: 0,
        lastReweigh: 0,
        initializer: prepared.initializer,
        sink: null,
      });
      expect(controller.getPool(prepared.pool).isInitialized()).toBe(false);
      expect(logs).toContainEqual({
        type: 'pool-prepared',
        pool: prepared.pool,
        initializer: prepared.initializer,
        categoryID: fx.categoryID,
        indexSize: 3,
      });
    });

    it('enforces owner, index size and uniqueness', () => {
      const fx = setupController();
      const { controller } = fx.env;
      expect(() => controller.prepareIndexPool('stranger', fx.categoryID, 3, INITIAL_VALUE, 'X', 'X')).toThrow(
        'ERR_NOT_OWNER',
      );
      expect(() => controller.prepareIndexPool(OWNER, fx.categoryID, 1, INITIAL_VALUE, 'X', 'X')).toThrow(
        'ERR_MIN_INDEX_SIZE',
      );
      expect(() => controller.prepareIndexPool(OWNER, fx.categoryID, 11, INITIAL_VALUE, 'X', 'X')).toThrow(
        'ERR_MAX_INDEX_SIZE',
      );
      controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'X', 'X');
      expect(() => controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'Y', 'Y')).toThrow(
        'ERR_POOL_EXISTS',
      );
      expect(controller.listPools()).toHaveLength(1);
    });

    it('needs a freshly sorted category and balances above MIN_BALANCE', () => {
      const fx = setupController();
      const { controller } = fx.env;
      expect(() => controller.getInitialTokensAndBalances(fx.categoryID, 3, 1_000_000n)).toThrow('ERR_MIN_BALANCE');

      fx.clock.advance(DAY + 1);
      expect(() => controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'X', 'X')).toThrow(
        'ERR_CATEGORY_NOT_READY',
      );
    });
  });

  describe('finishPreparedIndexPool', () => {
    it('initializes the pool with sqrt-cap weights and deploys the seller', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const pool = launch(fx);
      const indexPool = controller.getPool(pool);
      const meta = controller.getPoolMeta(pool);

      expect(indexPool.isInitialized()).toBe(true);
      expect(indexPool.getCurrentTokens()).toEqual(['A', 'B', 'C']);
      expect(indexPool.getDenormalizedWeight('A')).toBe(14285714285714285714n);
      expect(indexPool.getDenormalizedWeight('B')).toBe(7142857142857142857n);
      expect(indexPool.getDenormalizedWeight('C')).toBe(3571428571428571428n);
      expect(indexPool.getBalance('A')).toBe(2n * BONE);
      expect(indexPool.getExitFeeRecipient()).toBe(FEE_RECIPIENT);
      expect(indexPool.balanceOf(TREASURY)).toBe(100n * BONE);

      expect(meta.initialized).toBe(true);
      expect(meta.lastReweigh).toBe(fx.clock.now());
      expect(meta.sink).toBe(controller.computeSellerAddress(pool));
      expect(controller.getSeller(pool).getPremiumPercent()).toBe(2);
    });

    it('accepts only the initializer, once', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const prepared = controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'Top Three', 'TOP3');
      expect(() => controller.finishPreparedIndexPool(OWNER, prepared.pool, prepared.tokens, prepared.balances)).toThrow(
        'ERR_NOT_INITIALIZER',
      );
      expect(() =>
        controller.finishPreparedIndexPool(prepared.initializer, prepared.pool, prepared.tokens, [BONE]),
      ).toThrow('ERR_ARR_LEN');

      const initializer = controller.getInitializer(prepared.pool);
      initializer.contributeTokensBatch(TREASURY, prepared.tokens, prepared.balances, 0n);
      initializer.finish();
      expect(() =>
        controller.finishPreparedIndexPool(prepared.initializer, prepared.pool, prepared.tokens, prepared.balances),
      ).toThrow('ERR_INITIALIZED');
    });

    it('leaves everything untouched while tokens are pending', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const prepared = controller.prepareIndexPool(OWNER, fx.categoryID, 3, INITIAL_VALUE, 'Top Three', 'TOP3');
      const initializer = controller.getInitializer(prepared.pool);
      initializer.contributeTokens(TREASURY, 'A', 2n * BONE, 0n);

      expect(() => initializer.finish()).toThrow('ERR_PENDING_TOKENS');
      expect(initializer.isFinished()).toBe(false);
      expect(controller.getPoolMeta(prepared.pool).initialized).toBe(false);
      expect(() => controller.getSeller(prepared.pool)).toThrow('ERR_NOT_INITIALIZED');
    });
  });

  describe('reweighPool', () => {
    it('waits POOL_REWEIGH_DELAY and then retargets from current caps', () => {
      const fx = setupController();
      const { controller, ledger } = fx.env;
      const pool = launch(fx);
      expect(() => controller.reweighPool(pool)).toThrow('ERR_POOL_REWEIGH_DELAY');

      ledger.mint('C', TREASURY, 3n * BONE); // caps 16:4:4
      nextUpdateWindow(fx);
      controller.reweighPool(pool);

      const indexPool = controller.getPool(pool);
      expect(indexPool.getTokenRecord('A').desiredDenorm).toBe(12_500_000_000_000_000_000n);
      expect(indexPool.getTokenRecord('B').desiredDenorm).toBe(6_250_000_000_000_000_000n);
      expect(indexPool.getTokenRecord('C').desiredDenorm).toBe(6_250_000_000_000_000_000n);
      expect(indexPool.getDenormalizedWeight('C')).toBe(3571428571428571428n);
      expect(controller.getPoolMeta(pool)).toMatchObject({ reweighIndex: 1, lastReweigh: fx.clock.now() });
    });

    it('leaves every fourth update to reindexPool', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const pool = launch(fx);

      nextUpdateWindow(fx);
      expect(() => controller.reindexPool(pool)).toThrow('ERR_REWEIGH_INDEX');
      for (let i = 0; i < 3; i++) {
        controller.reweighPool(pool);
        nextUpdateWindow(fx);
      }
      expect(() => controller.reweighPool(pool)).toThrow('ERR_REWEIGH_INDEX');
      expect(controller.getPoolMeta(pool).reweighIndex).toBe(3);
    });

    it('rolls back the meta when the pool rejects the update', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const pool = launch(fx);
      controller.setController(OWNER, pool, 'other-controller');
      expect(controller.getPool(pool).getController()).toBe('other-controller');

      nextUpdateWindow(fx);
      expect(() => controller.reweighPool(pool)).toThrow('ERR_NOT_CONTROLLER');
      expect(controller.getPoolMeta(pool).reweighIndex).toBe(0);
    });
  });

  describe('reindexPool and updateMinimumBalance', () => {
    /** Launch with A, B, C; list D (cap 9) and spend the three reweighs */
    function reachReindex(): { fx: ControllerFixture; pool: string } {
      const fx = setupController();
      const { controller, ledger, categories } = fx.env;
      const pool = launch(fx);

      ledger.mint('D', TREASURY, 9n * BONE);
      fx.setPrice('D', BONE);
      fx.refreshPrices();
      categories.addToken(OWNER, fx.categoryID, 'D');

      for (let i = 0; i < 3; i++) {
        nextUpdateWindow(fx);
        controller.reweighPool(pool);
      }
      nextUpdateWindow(fx);
      return { fx, pool };
    }

    it('requires a fresh category sort', () => {
      const { fx, pool } = reachReindex();
      fx.clock.advance(DAY);
      fx.refreshPrices();
      expect(() => fx.env.controller.reindexPool(pool)).toThrow('ERR_CATEGORY_NOT_READY');
    });

    it('binds incoming tokens with a minimum balance worth 1% of their share', () => {
      const { fx, pool } = reachReindex();
      const { controller, categories } = fx.env;
      expect(categories.orderCategoryTokensByMarketCap(fx.categoryID)).toEqual(['A', 'D', 'B', 'C']);

      controller.reindexPool(pool);
      const indexPool = controller.getPool(pool);

      expect(indexPool.getCurrentTokens()).toEqual(['A', 'B', 'C', 'D']);
      expect(indexPool.getCurrentDesiredTokens()).toEqual(['A', 'B', 'D']);
      expect(indexPool.getTokenRecord('A').desiredDenorm).toBe(11111111111111111111n);
      expect(indexPool.getTokenRecord('B').desiredDenorm).toBe(5555555555555555555n);
      expect(indexPool.getTokenRecord('C').desiredDenorm).toBe(0n);

      const incoming = indexPool.getTokenRecord('D');
      expect(incoming.ready).toBe(false);
      expect(incoming.desiredDenorm).toBe(8333333333333333333n);
      // pool value 3.5 ETH, D's share 1/3, 1% of that at 1 ETH per token
      expect(toNumber(incoming.minimumBalance)).toBeCloseTo(0.035 / 3, 9);
      expect(controller.getPoolMeta(pool).reweighIndex).toBe(4);
    });

    it('refreshes the minimum balance of a token that is not ready yet', () => {
      const { fx, pool } = reachReindex();
      const { controller, categories } = fx.env;
      categories.orderCategoryTokensByMarketCap(fx.categoryID);
      controller.reindexPool(pool);

      expect(() => controller.updateMinimumBalance(pool, 'A')).toThrow('ERR_TOKEN_READY');
      expect(() => controller.updateMinimumBalance(pool, 'D')).toThrow('ERR_MIN_BALANCE_DELAY');

      fx.clock.advance(MIN_BALANCE_UPDATE_DELAY - HOUR);
      fx.setPrice('D', 2n * BONE);
      fx.refreshPrices();
      controller.updateMinimumBalance(pool, 'D');

      expect(toNumber(controller.getPool(pool).getMinimumBalance('D'))).toBeCloseTo(0.035 / 6, 9);
    });
  });

  describe('owner administration', () => {
    it('forwards pool settings', () => {
      const fx = setupController();
      const { controller } = fx.env;
      const pool = launch(fx);
      const indexPool = controller.getPool(pool);

      controller.setSwapFee(OWNER, [pool], toFixed('0.01'));
      expect(indexPool.getSwapFee()).toBe(toFixed('0.01'));
      controller.setExitFeeRecipient(OWNER, pool, 'new-recipient');
      expect(indexPool.getExitFeeRecipient()).toBe('new-recipient');
      controller.setMaxPoolTokens(OWNER, pool, 1000n * BONE);
      expect(indexPool.getMaxPoolTokens()).toBe(1000n * BONE);
      controller.updateSellerPremium(OWNER, pool, 7);
      expect(controller.getSeller(pool).getPremiumPercent()).toBe(7);

      expect(() => controller.setSwapFee('stranger', pool, toFixed('0.01'))).toThrow('ERR_NOT_OWNER');
      expect(() => controller.setExitFeeRecipient(OWNER, pool, ZeroAddress)).toThrow('ERR_NULL_ADDRESS');
    });

    it('validates defaults', () => {
      const fx = setupController();
      const { controller } = fx.env;
      expect(() => controller.setDefaultSellerPremium(OWNER, 0)).toThrow('ERR_PREMIUM');
      expect(() => controller.setDefaultSellerPremium(OWNER, 20)).toThrow('ERR_PREMIUM');
      controller.setDefaultSellerPremium(OWNER, 5);
      expect(controller.getDefaultSellerPremium()).toBe(5);

      expect(() => controller.setDefaultExitFeeRecipient(OWNER, ZeroAddress)).toThrow('ERR_NULL_ADDRESS');
      controller.setDefaultExitFeeRecipient(OWNER, 'treasury-fees');
      expect(controller.getDefaultExitFeeRecipient()).toBe('treasury-fees');

      const pool = launch(fx);
      expect(controller.getSeller(pool).getPremiumPercent()).toBe(5);
      expect(controller.getPool(pool).getExitFeeRecipient()).toBe('treasury-fees');
    });

    it('transfers ownership', () => {
      const fx = setupController();
      const { controller } = fx.env;
      controller.transferOwnership(OWNER, 'next-owner');
      expect(controller.getOwner()).toBe('next-owner');
      expect(() => controller.setDefaultSellerPremium(OWNER, 5)).toThrow('ERR_NOT_OWNER');
      controller.setDefaultSellerPremium('next-owner', 5);
    });
  });
});
