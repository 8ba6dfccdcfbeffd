// ================================================================================================
// SHARED TYPE DEFINITIONS: records, views and ledger logs used across components
// ================================================================================================

// ── Pool records ──

export interface TokenRecord {
  bound: boolean;
  ready: boolean;
  denorm: bigint; // 0 while not ready
  desiredDenorm: bigint;
  balance: bigint; // real recorded holding
  minimumBalance: bigint; // 0 once ready
  lastDenormUpdate: number; // unix seconds
  index: number; // position in currentTokens
}

/** Plain view of a pool for the API and logs */
export interface PoolSnapshot {
  address: string;
  name: string;
  symbol: string;
  controller: string;
  initialized: boolean;
  publicSwap: boolean;
  swapFee: bigint;
  exitFee: bigint;
  exitFeeRecipient: string;
  maxPoolTokens: bigint;
  totalSupply: bigint;
  totalWeight: bigint;
  tokens: Array<TokenRecord & { address: string }>;
}

// ── Controller records ──

export interface CategoryRecord {
  id: number;
  metadataHash: string;
  tokens: string[];
  lastSortTimestamp: number;
}

export interface PoolMeta {
  initialized: boolean;
  categoryID: number;
  indexSize: number;
  reweighIndex: number;
  lastReweigh: number;
  initializer: string;
  sink: string | null;
}

// ── Ledger logs (published on commit) ──

export type LedgerLog =
  | { type: 'transfer'; token: string; from: string; to: string; amount: bigint }
  | { type: 'swap'; pool: string; caller: string; tokenIn: string; tokenOut: string; amountIn: bigint; amountOut: bigint }
  | { type: 'join'; pool: string; caller: string; tokenIn: string; amountIn: bigint }
  | { type: 'exit'; pool: string; caller: string; tokenOut: string; amountOut: bigint }
  | { type: 'pool-initialized'; pool: string; tokens: string[]; denorms: bigint[] }
  | { type: 'token-ready'; pool: string; token: string; denorm: bigint }
  | { type: 'token-added'; pool: string; token: string; desiredDenorm: bigint; minimumBalance: bigint }
  | { type: 'token-removed'; pool: string; token: string; balance: bigint }
  | { type: 'desired-denorm-set'; pool: string; token: string; desiredDenorm: bigint }
  | { type: 'minimum-balance-set'; pool: string; token: string; minimumBalance: bigint }
  | { type: 'swap-fee-set'; pool: string; swapFee: bigint }
  | { type: 'flash-loan'; pool: string; recipient: string; token: string; amount: bigint; fee: bigint }
  | { type: 'category-added'; categoryID: number; metadataHash: string }
  | { type: 'category-token-added'; categoryID: number; token: string }
  | { type: 'category-token-removed'; categoryID: number; token: string }
  | { type: 'category-sorted'; categoryID: number; tokens: string[] }
  | { type: 'pool-prepared'; pool: string; initializer: string; categoryID: number; indexSize: number }
  | { type: 'pool-reweighed'; pool: string; reweighIndex: number }
  | { type: 'pool-reindexed'; pool: string; reweighIndex: number }
  | { type: 'tokens-contributed'; initializer: string; from: string; token: string; amount: bigint; credit: bigint }
  | { type: 'initializer-finished'; initializer: string; pool: string; poolTokensReceived: bigint }
  | { type: 'tokens-claimed'; initializer: string; account: string; amount: bigint }
  | { type: 'sink-token-received'; sink: string; token: string; amount: bigint }
  | { type: 'sink-swap'; sink: string; caller: string; tokenIn: string; tokenOut: string; amountIn: bigint; amountOut: bigint }
  | { type: 'premium-set'; sink: string; premiumPercent: number };

export type LedgerLogType = LedgerLog['type'];
