// ================================================================================================
// ENVIRONMENT: wires ledger, oracle, categories, factory and controller into one process
// ================================================================================================

import { id } from 'ethers';
import { createLogger } from '@/utils';
import type { ControllerConfig, OracleConfig, Universe } from '@/config';
import { EventBus } from './event-bus';
import type { Clock, ManualClock } from './ledger/clock';
import { Ledger } from './ledger/ledger';
import { TokenManager } from './ledger/token-manager';
import { toFixed } from './math/bnum';
import { PriceOracle } from './oracle/price-oracle';
import { TokenCategories } from './controller/token-categories';
import { IndexController } from './controller/index-controller';
import { labelAddress } from './registry/addresses';
import { PoolFactory, createPoolRegistry, type PoolRegistry } from './registry/pool-factory';

export const CONTROLLER_ADDRESS = labelAddress('index-controller');
export const FACTORY_ADDRESS = labelAddress('pool-factory');

export interface EnvironmentInput {
  clock: Clock;
  oracle: OracleConfig;
  controller: ControllerConfig;
}

export interface Environment {
  clock: Clock;
  eventBus: EventBus;
  ledger: Ledger;
  tokens: TokenManager;
  oracle: PriceOracle;
  categories: TokenCategories;
  registry: PoolRegistry;
  factory: PoolFactory;
  controller: IndexController;
  owner: string;
  destroy(): void;
}

export function createEnvironment(input: EnvironmentInput): Environment {
  const { owner } = input.controller;
  const eventBus = new EventBus({ logger: createLogger('[EventBus]') });
  const ledger = new Ledger({ logger: createLogger('[Ledger]'), clock: input.clock, eventBus });
  const tokens = new TokenManager({ logger: createLogger('[TokenManager]'), ledger });
  const oracle = new PriceOracle({ logger: createLogger('[PriceOracle]'), ledger, ...input.oracle });
  const categories = new TokenCategories({ logger: createLogger('[Categories]'), ledger, oracle, owner });

  const registry = createPoolRegistry(createLogger('[Registry]'), ledger, owner);
  const factory = new PoolFactory({
    logger: createLogger('[PoolFactory]'),
    ledger,
    address: FACTORY_ADDRESS,
    owner,
    registry,
  });
  const controller = new IndexController({
    logger: createLogger('[Controller]'),
    ledger,
    address: CONTROLLER_ADDRESS,
    categories,
    oracle,
    factory,
    defaultExitFeeRecipient: input.controller.defaultExitFeeRecipient,
    defaultSellerPremium: input.controller.defaultSellerPremium,
  });
  factory.approvePoolController(owner, controller.address);

  return {
    clock: input.clock,
    eventBus,
    ledger,
    tokens,
    oracle,
    categories,
    registry,
    factory,
    controller,
    owner,
    destroy: () => eventBus.destroy(),
  };
}

// ================================================================================================
// SEEDING
// ================================================================================================

export interface SeededUniverse {
  tokens: Map<string, string>; // symbol -> address
  categories: Map<string, number>; // name -> id
  pools: string[];
}

/** Address a seeded token is registered under */
export function tokenAddressFor(symbol: string): string {
  return labelAddress(`token:${symbol}`);
}

/** 💱 Record the universe's configured price of every token for the current bucket */
export function recordUniversePrices(env: Environment, universe: Universe): void {
  for (const token of universe.tokens) {
    env.oracle.recordPrice(tokenAddressFor(token.symbol), toFixed(token.priceEth));
  }
}

/**
 * 🌍 SEED UNIVERSE: register and mint the tokens, warm the oracle up for one averaging
 * window, build and sort the categories, then prepare, fund and finish every pool from
 * the treasury.
 */
export function seedUniverse(env: Environment, clock: ManualClock, universe: Universe): SeededUniverse {
  const log = createLogger('[Seed]');
  const { treasury } = universe;
  const seeded: SeededUniverse = { tokens: new Map(), categories: new Map(), pools: [] };

  for (const token of universe.tokens) {
    const address = tokenAddressFor(token.symbol);
    env.tokens.registerToken({ address, symbol: token.symbol, name: token.name, decimals: token.decimals });
    env.tokens.mint(address, treasury, env.tokens.parseTokenAmount(address, token.supply));
    seeded.tokens.set(token.symbol, address);
  }

  recordUniversePrices(env, universe);
  clock.advance(env.oracle.minTimeElapsed);
  recordUniversePrices(env, universe);

  for (const category of universe.categories) {
    const categoryID = env.categories.createCategory(env.owner, id(category.name));
    env.categories.addTokens(env.owner, categoryID, category.tokens.map(tokenAddressFor));
    env.categories.orderCategoryTokensByMarketCap(categoryID);
    seeded.categories.set(category.name, categoryID);
  }

  for (const poolConfig of universe.pools) {
    const categoryID = seeded.categories.get(poolConfig.category);
    if (categoryID === undefined) throw new Error(`pool ${poolConfig.symbol} names unknown category ${poolConfig.category}`);

    const prepared = env.controller.prepareIndexPool(
      env.owner,
      categoryID,
      poolConfig.indexSize,
      toFixed(poolConfig.initialValueEth),
      poolConfig.name,
      poolConfig.symbol,
    );
    const initializer = env.controller.getInitializer(prepared.pool);
    initializer.contributeTokensBatch(treasury, prepared.tokens, prepared.balances, 0n);
    initializer.finish();
    initializer.claimTokens(treasury);
    seeded.pools.push(prepared.pool);
    log.info(`🌱 ${poolConfig.symbol} live at ${prepared.pool}`);
  }

  return seeded;
}
