import { describe, it, expect } from 'vitest';

import { loadUniverse, resolveConfig } from '@/config';
import { createEnvironment, recordUniversePrices, seedUniverse, tokenAddressFor } from './environment';
import { DAY, HOUR, ManualClock } from './ledger/clock';
import { BONE } from './math/bnum';

describe('seedUniverse', () => {
  it('builds the bundled pools from the top of each category', () => {
    const config = resolveConfig({});
    const clock = new ManualClock();
    const env = createEnvironment({ clock, oracle: config.oracle, controller: config.controller });
    const seeded = seedUniverse(env, clock, loadUniverse(config.universeFile));

    expect(seeded.tokens.size).toBe(6);
    expect(seeded.pools).toHaveLength(1);
    const [poolAddress] = seeded.pools;
    const categoryID = seeded.categories.get('defi');
    expect(categoryID).toBeDefined();

    // caps in ETH: LINK 3M, UNI 2.4M, AAVE 0.7M, MKR 0.54M, COMP 0.24M
    const pool = env.controller.getPool(poolAddress);
    expect(pool.getCurrentTokens()).toEqual(['LINK', 'UNI', 'AAVE'].map(tokenAddressFor));
    expect(pool.isInitialized()).toBe(true);
    expect(pool.balanceOf('treasury')).toBe(100n * BONE);
    expect(env.controller.getPoolMeta(poolAddress)).toMatchObject({ initialized: true, categoryID, indexSize: 3 });

    env.destroy();
  });

  it('keeps market caps averageable while prices are re-recorded every period', () => {
    const config = resolveConfig({});
    const clock = new ManualClock();
    const env = createEnvironment({ clock, oracle: config.oracle, controller: config.controller });
    const universe = loadUniverse(config.universeFile);
    const seeded = seedUniverse(env, clock, universe);
    const categoryID = seeded.categories.get('defi') ?? 0;

    clock.advance(3 * DAY);
    expect(() => env.categories.orderCategoryTokensByMarketCap(categoryID)).toThrow('ERR_NO_PRICE_IN_RANGE');

    for (let hour = 0; hour < 3; hour++) {
      recordUniversePrices(env, universe);
      clock.advance(HOUR);
    }
    expect(env.categories.orderCategoryTokensByMarketCap(categoryID)).toEqual(
      ['LINK', 'UNI', 'AAVE', 'MKR', 'COMP'].map(tokenAddressFor),
    );

    env.destroy();
  });

  it('registers the tokens with their supplies', () => {
    const config = resolveConfig({});
    const clock = new ManualClock();
    const env = createEnvironment({ clock, oracle: config.oracle, controller: config.controller });
    seedUniverse(env, clock, loadUniverse(config.universeFile));

    expect(env.tokens.findTokenBySymbol('LINK')?.address).toBe(tokenAddressFor('LINK'));
    expect(env.tokens.findTokenBySymbol('DOGE')).toBeUndefined();
    expect(env.tokens.formatTotalSupply(tokenAddressFor('UNI'))).toBe('600000000.0');
    expect(() => env.tokens.registerToken({ address: tokenAddressFor('UNI'), symbol: 'UNI', name: 'Uniswap', decimals: 18 })).toThrow(
      'ERR_TOKEN_EXISTS',
    );

    env.destroy();
  });
});
