import { describe, it, expect, beforeEach } from 'vitest';

import { BONE } from '../math/bnum';
import type { LedgerLog } from '../types';
import { OWNER, TREASURY, setupController, type ControllerFixture } from './controller.fixture';
import type { PoolInitializer } from './pool-initializer';

const ALICE = 'alice';
const BOB = 'bob';

describe('PoolInitializer', () => {
  let fx: ControllerFixture;
  let pool: string;
  let initializer: PoolInitializer;
  let logs: LedgerLog[];

  beforeEach(() => {
    fx = setupController();
    const { controller, ledger } = fx.env;
    // desired amounts: A 2, B 1, C 0.5
    const prepared = controller.prepareIndexPool(OWNER, fx.categoryID, 3, 35n * (BONE / 10n), 'Top Three', 'TOP3');
    pool = prepared.pool;
    initializer = controller.getInitializer(pool);

    for (const account of [ALICE, BOB]) {
      ledger.transfer('A', TREASURY, account, 5n * BONE);
      ledger.transfer('B', TREASURY, account, BONE);
      ledger.transfer('C', TREASURY, account, BONE / 4n);
    }
    logs = [];
    fx.env.eventBus.onLog((entry) => logs.push(entry));
  });

  it('lists what it still needs', () => {
    expect(initializer.getDesiredTokens()).toEqual(['A', 'B', 'C']);
    expect(initializer.getDesiredAmounts(['A', 'B', 'C'])).toEqual([2n * BONE, BONE, BONE / 2n]);
    expect(initializer.getCreditForTokens('A', 5n * BONE)).toBe(2n * BONE);
    expect(() => initializer.getCreditForTokens('D', BONE)).toThrow('ERR_NOT_NEEDED');
  });

  it('trims contributions to the remaining desire', () => {
    expect(initializer.contributeTokens(ALICE, 'A', 5n * BONE, 0n)).toBe(2n * BONE);

    expect(fx.env.ledger.balanceOf('A', ALICE)).toBe(3n * BONE);
    expect(fx.env.ledger.balanceOf('A', initializer.address)).toBe(2n * BONE);
    expect(initializer.getDesiredAmount('A')).toBe(0n);
    expect(initializer.getCreditOf(ALICE)).toBe(2n * BONE);
    expect(logs.at(-1)).toEqual({
      type: 'tokens-contributed',
      initializer: initializer.address,
      from: ALICE,
      token: 'A',
      amount: 2n * BONE,
      credit: 2n * BONE,
    });
    expect(() => initializer.contributeTokens(BOB, 'A', BONE, 0n)).toThrow('ERR_NOT_NEEDED');
  });

  it('rejects a contribution below the minimum credit without moving tokens', () => {
    expect(() => initializer.contributeTokens(ALICE, 'B', BONE / 2n, BONE)).toThrow('ERR_MIN_CREDIT');
    expect(fx.env.ledger.balanceOf('B', ALICE)).toBe(BONE);
    expect(initializer.getDesiredAmount('B')).toBe(BONE);
    expect(initializer.getTotalCredit()).toBe(0n);
  });

  it('splits the pool tokens pro rata to credit', () => {
    initializer.contributeTokensBatch(ALICE, ['A', 'B'], [2n * BONE, BONE], 3n * BONE);
    expect(() => initializer.claimTokens(ALICE)).toThrow('ERR_NOT_FINISHED');
    expect(() => initializer.finish()).toThrow('ERR_PENDING_TOKENS');

    initializer.contributeTokens(BOB, 'C', BONE / 4n, 0n);
    initializer.contributeTokens(ALICE, 'C', BONE / 4n, 0n);
    expect(initializer.getTotalCredit()).toBe(35n * (BONE / 10n));
    initializer.finish();

    expect(initializer.isFinished()).toBe(true);
    expect(initializer.getPoolTokensReceived()).toBe(100n * BONE);
    expect(fx.env.controller.getPool(pool).isInitialized()).toBe(true);

    // alice 3.25 of 3.5 credit, bob 0.25
    expect(initializer.claimTokens(ALICE)).toBe(92857142857142857142n);
    expect(fx.env.ledger.balanceOf(pool, ALICE)).toBe(92857142857142857142n);
    expect(() => initializer.claimTokens(ALICE)).toThrow('ERR_NULL_CREDIT');
    expect(initializer.claimTokensFor([BOB, 'carol'])).toEqual([7142857142857142857n, 0n]);
    expect(() => initializer.contributeTokens(BOB, 'A', BONE, 0n)).toThrow('ERR_FINISHED');
  });

  it('cannot finish twice', () => {
    initializer.contributeTokensBatch(TREASURY, ['A', 'B', 'C'], [2n * BONE, BONE, BONE / 2n], 0n);
    initializer.finish();
    expect(() => initializer.finish()).toThrow('ERR_FINISHED');
  });
});
