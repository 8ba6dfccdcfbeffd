// ================================================================================================
// REVERT ERRORS: categorical preconditions that roll back the whole call
// ================================================================================================

export type RevertCategory = 'access' | 'reference' | 'bounds' | 'lifecycle' | 'arithmetic';

const CATEGORY_BY_CODE: Record<string, RevertCategory> = {
  ERR_NOT_CONTROLLER: 'access',
  ERR_NOT_OWNER: 'access',
  ERR_NOT_INITIALIZER: 'access',
  ERR_NOT_POOL: 'access',
  ERR_NOT_APPROVED: 'access',
  ERR_REENTRY: 'access',

  ERR_NOT_BOUND: 'reference',
  ERR_IS_BOUND: 'reference',
  ERR_CATEGORY_ID: 'reference',
  ERR_POOL_NOT_FOUND: 'reference',
  ERR_UNKNOWN_IMPLEMENTATION: 'reference',
  ERR_TOKEN_EXISTS: 'reference',
  ERR_TOKEN_NOT_FOUND: 'reference',
  ERR_NO_PRICE: 'reference',
  ERR_NULL_ADDRESS: 'reference',
  ERR_UNKNOWN_TOKEN: 'reference',
  ERR_IN_TOKEN_NOT_BOUND: 'reference',
  ERR_OUT_TOKEN_BOUND: 'reference',

  ERR_INITIALIZED: 'lifecycle',
  ERR_NOT_INITIALIZED: 'lifecycle',
  ERR_NOT_PUBLIC: 'lifecycle',
  ERR_READY: 'lifecycle',
  ERR_TOKEN_READY: 'lifecycle',
  ERR_OUT_NOT_READY: 'lifecycle',
  ERR_POOL_EXISTS: 'lifecycle',
  ERR_POOL_REWEIGH_DELAY: 'lifecycle',
  ERR_REWEIGH_INDEX: 'lifecycle',
  ERR_CATEGORY_NOT_READY: 'lifecycle',
  ERR_MIN_BALANCE_DELAY: 'lifecycle',
  ERR_FINISHED: 'lifecycle',
  ERR_NOT_FINISHED: 'lifecycle',
  ERR_PENDING_TOKENS: 'lifecycle',
  ERR_NO_PRICE_IN_RANGE: 'lifecycle',
  ERR_NOT_NEEDED: 'lifecycle',

  ERR_MATH_APPROX: 'arithmetic',
  ERR_SUB_UNDERFLOW: 'arithmetic',
  ERR_DIV_ZERO: 'arithmetic',
  ERR_BPOW_BASE_TOO_LOW: 'arithmetic',
  ERR_BPOW_BASE_TOO_HIGH: 'arithmetic',
};

/**
 * Thrown for any rejected call. The ledger catches nothing: the error unwinds to the
 * outermost transaction, which restores every component snapshot before rethrowing.
 */
export class RevertError extends Error {
  readonly code: string;
  readonly category: RevertCategory;

  constructor(code: string, message?: string) {
    super(message ? `${code}: ${message}` : code);
    this.name = 'RevertError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code] ?? 'bounds';
  }
}

/** Ledger-style precondition: throws a RevertError with `code` unless `condition` holds */
export function ensure(condition: boolean, code: string, message?: string): asserts condition {
  if (!condition) throw new RevertError(code, message);
}

export function isRevertError(error: unknown): error is RevertError {
  return error instanceof RevertError;
}
