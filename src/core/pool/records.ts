// ================================================================================================
// POOL RECORDS: collaborator interfaces and record helpers
// ================================================================================================

import type { TokenRecord } from '../types';

/** Receives the remaining balance of an evicted token */
export interface UnbindHandler {
  readonly address: string;
  handleUnbindToken(caller: string, token: string, amount: bigint): void;
}

/** Borrower callback; must return `amountDue` to the pool before it returns */
export interface FlashLoanRecipient {
  readonly address: string;
  receiveFlashLoan(token: string, amount: bigint, amountDue: bigint, data: string): void;
}

/** Balance and weight a token is priced with */
export interface PricedToken {
  ready: boolean;
  balance: bigint;
  denorm: bigint;
}

export interface SwapResult {
  tokenAmountIn: bigint;
  tokenAmountOut: bigint;
  spotPriceAfter: bigint;
}

export function cloneRecord(record: TokenRecord): TokenRecord {
  return { ...record };
}

export function cloneRecords(records: Map<string, TokenRecord>): Map<string, TokenRecord> {
  return new Map(Array.from(records, ([token, record]) => [token, cloneRecord(record)]));
}
