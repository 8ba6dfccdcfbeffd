/**
 * 🗂️ TOKEN CATEGORIES: owner-curated token lists ranked by averaged market cap
 */
import type { Logger } from '@/utils';
import type { CategoryRecord } from '../types';
import { ensure } from '../errors';
import type { Ledger, Stateful } from '../ledger/ledger';
import type { IPriceSource } from '../oracle/price-oracle';
import { DAY } from '../ledger/clock';

export const MAX_CATEGORY_TOKENS = 25;
export const MAX_SORT_DELAY = DAY;

export interface TokenCategoriesInput {
  logger: Logger;
  ledger: Ledger;
  oracle: IPriceSource;
  owner: string;
}

interface TokenCategoriesState {
  owner: string;
  categoryIndex: number;
  categories: Map<number, CategoryRecord>;
}

export class TokenCategories implements Stateful<TokenCategoriesState> {
  private readonly logger: Logger;
  private readonly ledger: Ledger;
  private readonly oracle: IPriceSource;

  private owner: string;
  private categoryIndex = 0;
  private categories: Map<number, CategoryRecord> = new Map();

  constructor(input: TokenCategoriesInput) {
    this.logger = input.logger;
    this.ledger = input.ledger;
    this.oracle = input.oracle;
    this.owner = input.owner;
    this.ledger.register(this);
  }

  // ================================================================================================
  // OWNERSHIP
  // ================================================================================================

  onlyOwner(caller: string): void {
    ensure(caller === this.owner, 'ERR_NOT_OWNER', `${caller} is not the owner`);
  }

  getOwner(): string {
    return this.owner;
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      this.owner = newOwner;
      this.logger.info(`👑 ownership transferred to ${newOwner}`);
    });
  }

  // ================================================================================================
  // CATEGORY MANAGEMENT
  // ================================================================================================

  createCategory(caller: string, metadataHash: string): number {
    return this.ledger.transact(() => {
      this.onlyOwner(caller);
      const id = ++this.categoryIndex;
      this.categories.set(id, { id, metadataHash, tokens: [], lastSortTimestamp: 0 });
      this.ledger.emit({ type: 'category-added', categoryID: id, metadataHash });
      this.logger.info(`🗂️ category ${id} created`);
      return id;
    });
  }

  addToken(caller: string, categoryID: number, token: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      this.pushToken(this.requireCategory(categoryID), token);
    });
  }

  addTokens(caller: string, categoryID: number, tokens: string[]): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      const category = this.requireCategory(categoryID);
      for (const token of tokens) this.pushToken(category, token);
    });
  }

  removeToken(caller: string, categoryID: number, token: string): void {
    this.ledger.transact(() => {
      this.onlyOwner(caller);
      const category = this.requireCategory(categoryID);
      const index = category.tokens.indexOf(token);
      ensure(index >= 0, 'ERR_TOKEN_NOT_FOUND', `${token} is not in category ${categoryID}`);
      category.tokens.splice(index, 1);
      this.ledger.emit({ type: 'category-token-removed', categoryID, token });
    });
  }

  private pushToken(category: CategoryRecord, token: string): void {
    ensure(category.tokens.length < MAX_CATEGORY_TOKENS, 'ERR_MAX_CATEGORY_TOKENS');
    ensure(!category.tokens.includes(token), 'ERR_TOKEN_EXISTS', token);
    const currentBucket = this.oracle.bucketKey(this.ledger.now());
    ensure(this.oracle.hasObservationInWindow(token, currentBucket), 'ERR_NO_PRICE', token);
    category.tokens.push(token);
    this.ledger.emit({ type: 'category-token-added', categoryID: category.id, token });
  }

  // ================================================================================================
  // SORTING
  // ================================================================================================

  /**
   * 📊 SORT: order the category descending by averaged market cap. Callable by anyone;
   * stamps the sort time that getTopCategoryTokens checks.
   */
  orderCategoryTokensByMarketCap(categoryID: number): string[] {
    return this.ledger.transact(() => {
      const category = this.requireCategory(categoryID);
      const tokens = category.tokens;
      const caps = this.oracle.averageMarketCaps(tokens);

      for (let i = 1; i < tokens.length; i++) {
        const cap = caps[i];
        const token = tokens[i];
        let j = i - 1;
        while (j >= 0 && caps[j] < cap) {
          caps[j + 1] = caps[j];
          tokens[j + 1] = tokens[j];
          j--;
        }
        caps[j + 1] = cap;
        tokens[j + 1] = token;
      }

      category.lastSortTimestamp = this.ledger.now();
      this.ledger.emit({ type: 'category-sorted', categoryID, tokens: [...tokens] });
      this.logger.info(`📊 category ${categoryID} sorted: ${tokens.join(', ')}`);
      return [...tokens];
    });
  }

  // ================================================================================================
  // QUERIES
  // ================================================================================================

  /** Top `num` tokens of a category sorted within MAX_SORT_DELAY */
  getTopCategoryTokens(categoryID: number, num: number): string[] {
    const category = this.requireCategory(categoryID);
    const sinceSort = this.ledger.now() - category.lastSortTimestamp;
    ensure(sinceSort <= MAX_SORT_DELAY, 'ERR_CATEGORY_NOT_READY', `category ${categoryID} sorted ${sinceSort}s ago`);
    ensure(num <= category.tokens.length, 'ERR_CATEGORY_SIZE');
    return category.tokens.slice(0, num);
  }

  getCategoryTokens(categoryID: number): string[] {
    return [...this.requireCategory(categoryID).tokens];
  }

  getCategoryMarketCaps(categoryID: number): bigint[] {
    return this.oracle.averageMarketCaps(this.requireCategory(categoryID).tokens);
  }

  getLastCategoryUpdate(categoryID: number): number {
    return this.requireCategory(categoryID).lastSortTimestamp;
  }

  hasCategory(categoryID: number): boolean {
    return this.categories.has(categoryID);
  }

  getCategoryIndex(): number {
    return this.categoryIndex;
  }

  getCategory(categoryID: number): CategoryRecord {
    const category = this.requireCategory(categoryID);
    return { ...category, tokens: [...category.tokens] };
  }

  listCategories(): CategoryRecord[] {
    return Array.from(this.categories.values(), (category) => ({ ...category, tokens: [...category.tokens] }));
  }

  private requireCategory(categoryID: number): CategoryRecord {
    const category = this.categories.get(categoryID);
    ensure(category !== undefined, 'ERR_CATEGORY_ID', `unknown category ${categoryID}`);
    return category;
  }

  // ================================================================================================
  // SNAPSHOT
  // ================================================================================================

  captureState(): TokenCategoriesState {
    return structuredClone({ owner: this.owner, categoryIndex: this.categoryIndex, categories: this.categories });
  }

  restoreState(state: TokenCategoriesState): void {
    this.owner = state.owner;
    this.categoryIndex = state.categoryIndex;
    this.categories = state.categories;
  }
}
