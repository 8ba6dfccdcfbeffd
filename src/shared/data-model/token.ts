// ════════════════════════════════════════════════════════════
// TOKEN IDENTITY
// ════════════════════════════════════════════════════════════

export interface TokenBase {
  symbol: string; // canonical: "WETH", "UNI"
  name: string; // full token name, e.g. "Wrapped Ether"
}

/** Ledger token with a known address */
export interface TokenInfo extends TokenBase {
  address: string;
  decimals: number;
}
