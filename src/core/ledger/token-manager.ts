/**
 * 🎯 TOKEN MANAGER: Central token metadata and amount formatting
 */
import { ethers } from 'ethers';
import type { Logger } from '@/utils';
import type { TokenInfo } from '@/shared/data-model/token';
import { RevertError } from '../errors';
import type { Ledger } from './ledger';

export interface TokenManagerInput {
  logger: Logger;
  ledger: Ledger;
}

// ================================================================================================
// TOKEN MANAGER CLASS
// ================================================================================================

export class TokenManager {
  private readonly logger: Logger;
  private readonly ledger: Ledger;

  private tokens: Map<string, TokenInfo> = new Map();

  constructor(input: TokenManagerInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
  }

  // ================================================================================================
  // TOKEN REGISTRATION AND MANAGEMENT
  // ================================================================================================

  /**
   * 📝 REGISTER TOKEN
   */
  registerToken(token: TokenInfo): TokenInfo {
    if (this.tokens.has(token.address)) throw new RevertError('ERR_TOKEN_EXISTS', token.address);
    this.tokens.set(token.address, token);
    this.logger.info(`✅ Registered token ${token.symbol} (addr: ${token.address})`);
    return token;
  }

  requireToken(address: string): TokenInfo {
    const token = this.tokens.get(address);
    if (!token) throw new RevertError('ERR_TOKEN_NOT_FOUND', address);
    return token;
  }

  /**
   * Get all registered tokens as array
   */
  getAllTokensArray(): TokenInfo[] {
    return Array.from(this.tokens.values());
  }

  /**
   * 🔍 FIND TOKEN BY SYMBOL
   */
  findTokenBySymbol(symbol: string): TokenInfo | undefined {
    for (const token of this.tokens.values()) {
      if (token.symbol === symbol) return token;
    }
    return undefined;
  }

  /**
   * 🚰 MINT: create supply of a registered token (seeding balances for the demo and tests)
   */
  mint(address: string, account: string, amount: bigint): void {
    this.requireToken(address);
    this.ledger.transact(() => this.ledger.mint(address, account, amount));
  }

  // ================================================================================================
  // UTILITY METHODS
  // ================================================================================================

  /**
   * 🔢 FORMAT TOKEN AMOUNT: Convert raw amount to human-readable
   */
  formatTokenAmount(address: string, rawAmount: bigint): string {
    return ethers.formatUnits(rawAmount, this.requireToken(address).decimals);
  }

  /**
   * 🔢 PARSE TOKEN AMOUNT: Convert human-readable to raw amount
   */
  parseTokenAmount(address: string, amount: string): bigint {
    return ethers.parseUnits(amount, this.requireToken(address).decimals);
  }

  /**
   * 📊 FORMAT SUPPLY: total supply in whole tokens
   */
  formatTotalSupply(address: string): string {
    return this.formatTokenAmount(address, this.ledger.totalSupply(address));
  }
}
