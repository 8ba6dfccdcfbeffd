// ================================================================================================
// POOL CONSTANTS
// ================================================================================================

import { BONE } from '../math/bnum';

export const MIN_BOUND_TOKENS = 2;
export const MAX_BOUND_TOKENS = 10;

export const MIN_FEE = BONE / 10n ** 6n; // 0.0001%
export const MAX_FEE = BONE / 10n; // 10%
export const DEFAULT_SWAP_FEE = (BONE * 25n) / 1000n; // 2.5%
export const EXIT_FEE = (BONE * 5n) / 1000n; // 0.5%

export const MIN_WEIGHT = BONE / 4n;
export const MAX_WEIGHT = BONE * 25n;
export const MAX_TOTAL_WEIGHT = BONE * 27n;
export const MAX_READY_WEIGHT = MIN_WEIGHT * 2n;

export const MIN_BALANCE = BONE / 10n ** 12n;
export const INIT_POOL_SUPPLY = BONE * 100n;

export const MAX_IN_RATIO = BONE / 2n;
export const MAX_OUT_RATIO = BONE / 3n + 1n;

/** Seconds a token must wait between two automatic weight adjustments */
export const WEIGHT_UPDATE_DELAY = 60 * 60;
/** Largest fraction of the current denorm a single adjustment may move */
export const WEIGHT_CHANGE_PCT = BONE / 100n;

export const FLASH_FEE_RATE = (BONE * 25n) / 1000n; // 2.5%
