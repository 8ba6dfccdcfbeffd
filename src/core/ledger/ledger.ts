// ================================================================================================
// LEDGER: token balances, supplies and atomic transactions
//
// Every externally callable mutation runs inside transact(). Each level takes a savepoint
// of the ledger and of every registered component; a throw restores the savepoint and
// drops the logs emitted since, then rethrows. Logs reach the EventBus only when the
// outermost level commits.
// ================================================================================================

import type { Logger } from '@/utils';
import type { EventBus } from '../event-bus';
import type { LedgerLog } from '../types';
import { ensure } from '../errors';
import type { Clock } from './clock';

/** A component whose state is part of the ledger's atomic unit */
export interface Stateful<S> {
  captureState(): S;
  restoreState(state: S): void;
}

type Restore = () => void;

interface LedgerState {
  balances: Map<string, Map<string, bigint>>;
  supplies: Map<string, bigint>;
}

export interface LedgerInput {
  logger: Logger;
  clock: Clock;
  eventBus?: EventBus;
}

export class Ledger implements Stateful<LedgerState> {
  private readonly logger: Logger;
  readonly clock: Clock;
  private readonly eventBus?: EventBus;

  private balances: Map<string, Map<string, bigint>> = new Map(); // token -> account -> amount
  private supplies: Map<string, bigint> = new Map(); // token -> total supply

  private readonly participants: Array<() => Restore> = [];
  private pendingLogs: LedgerLog[] = [];
  private depth = 0;

  constructor(input: LedgerInput) {
    this.logger = input.logger;
    this.clock = input.clock;
    this.eventBus = input.eventBus;
    this.register(this);
  }

  // ================================================================================================
  // TRANSACTIONS
  // ================================================================================================

  /**
   * 📝 REGISTER: make a component's state part of every savepoint
   */
  register<S>(component: Stateful<S>): void {
    this.participants.push(() => {
      const state = component.captureState();
      return () => component.restoreState(state);
    });
  }

  /**
   * 🔒 TRANSACT: run `fn` atomically. Nested calls take their own savepoint, so a
   * failure caught by an outer level only unwinds the inner call.
   */
  transact<T>(fn: () => T): T {
    const restores = this.participants.map((capture) => capture());
    const logMark = this.pendingLogs.length;
    this.depth++;

    try {
      const result = fn();
      this.depth--;
      if (this.depth === 0) this.flush();
      return result;
    } catch (error) {
      this.depth--;
      for (const restore of restores) restore();
      this.pendingLogs.length = logMark;
      throw error;
    }
  }

  now(): number {
    return this.clock.now();
  }

  /** Record a log; published once the outermost transaction commits */
  emit(entry: LedgerLog): void {
    if (this.depth === 0) {
      this.eventBus?.publish(entry);
      return;
    }
    this.pendingLogs.push(entry);
  }

  private flush(): void {
    const logs = this.pendingLogs;
    this.pendingLogs = [];
    for (const entry of logs) this.eventBus?.publish(entry);
  }

  // ================================================================================================
  // TOKEN ACCOUNTING
  // ================================================================================================

  balanceOf(token: string, account: string): bigint {
    return this.balances.get(token)?.get(account) ?? 0n;
  }

  totalSupply(token: string): bigint {
    return this.supplies.get(token) ?? 0n;
  }

  mint(token: string, to: string, amount: bigint): void {
    ensure(amount >= 0n, 'ERR_NEGATIVE_AMOUNT');
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
    this.supplies.set(token, this.totalSupply(token) + amount);
    this.emit({ type: 'transfer', token, from: '', to, amount });
  }

  burn(token: string, from: string, amount: bigint): void {
    ensure(amount >= 0n, 'ERR_NEGATIVE_AMOUNT');
    const balance = this.balanceOf(token, from);
    ensure(balance >= amount, 'ERR_INSUFFICIENT_BAL', `${from} holds ${balance} of ${token}, needs ${amount}`);
    this.setBalance(token, from, balance - amount);
    this.supplies.set(token, this.totalSupply(token) - amount);
    this.emit({ type: 'transfer', token, from, to: '', amount });
  }

  transfer(token: string, from: string, to: string, amount: bigint): void {
    ensure(amount >= 0n, 'ERR_NEGATIVE_AMOUNT');
    const balance = this.balanceOf(token, from);
    ensure(balance >= amount, 'ERR_INSUFFICIENT_BAL', `${from} holds ${balance} of ${token}, needs ${amount}`);
    this.setBalance(token, from, balance - amount);
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
    this.emit({ type: 'transfer', token, from, to, amount });
  }

  private setBalance(token: string, account: string, amount: bigint): void {
    let accounts = this.balances.get(token);
    if (!accounts) {
      accounts = new Map();
      this.balances.set(token, accounts);
    }
    accounts.set(account, amount);
  }

  // ================================================================================================
  // SNAPSHOT
  // ================================================================================================

  captureState(): LedgerState {
    return structuredClone({ balances: this.balances, supplies: this.supplies });
  }

  restoreState(state: LedgerState): void {
    this.balances = state.balances;
    this.supplies = state.supplies;
    this.logger.debug(`↩️ ledger restored (${state.supplies.size} tokens)`);
  }
}
