// Shared setup for controller-level tests: an environment with priced tokens in one sorted category

import { createEnvironment, type Environment } from '../environment';
import { DAY, HOUR, ManualClock } from '../ledger/clock';
import { BONE } from '../math/bnum';

export const OWNER = 'owner';
export const TREASURY = 'treasury';
export const FEE_RECIPIENT = 'fee-recipient';

export interface ControllerFixture {
  clock: ManualClock;
  env: Environment;
  categoryID: number;
  prices: Map<string, bigint>;
  /** Record every known price, advance one hour and record again */
  refreshPrices(): void;
  setPrice(token: string, price: bigint): void;
}

/**
 * Tokens priced at 1 ETH with supplies 16, 4 and 1 (caps 16:4:1, square roots 4:2:1),
 * all held by the treasury and sorted into one category.
 */
export function setupController(supplies: Record<string, bigint> = { A: 16n * BONE, B: 4n * BONE, C: BONE }): ControllerFixture {
  const clock = new ManualClock();
  const env = createEnvironment({
    clock,
    oracle: { observationPeriod: HOUR, minTimeElapsed: HOUR, maxTimeElapsed: 2 * DAY },
    controller: { owner: OWNER, defaultExitFeeRecipient: FEE_RECIPIENT, defaultSellerPremium: 2 },
  });
  const prices = new Map<string, bigint>();

  const refreshPrices = (): void => {
    for (const [token, price] of prices) env.oracle.recordPrice(token, price);
    clock.advance(HOUR);
    for (const [token, price] of prices) env.oracle.recordPrice(token, price);
  };

  for (const [token, supply] of Object.entries(supplies)) {
    env.ledger.mint(token, TREASURY, supply);
    prices.set(token, BONE);
  }
  refreshPrices();

  const categoryID = env.categories.createCategory(OWNER, '0xc0ffee');
  env.categories.addTokens(OWNER, categoryID, Object.keys(supplies));
  env.categories.orderCategoryTokensByMarketCap(categoryID);

  return {
    clock,
    env,
    categoryID,
    prices,
    refreshPrices,
    setPrice: (token, price) => {
      prices.set(token, price);
    },
  };
}
