/**
 * Launch economics shared by every curve. All amounts are 18-decimal
 * fixed-point integers.
 */

export const TOKEN_DECIMALS = 18;
export const SCALE = 10n ** 18n;

export const TOTAL_ISSUANCE = 1_000_000_000n * SCALE;
/** 80% of issuance is sold through the curve; the rest is kept for liquidity. */
export const TOTAL_SELLABLE_SUPPLY = 800_000_000n * SCALE;
export const SELLABLE_WHOLE_TOKENS = TOTAL_SELLABLE_SUPPLY / SCALE;

export const BASIS_POINTS = 10_000n;
export const PLATFORM_FEE_BPS = 100n;        // 1%
export const MAX_PURCHASE_BPS = 400n;        // 4% of TOTAL_ISSUANCE, not of the sellable supply
export const MAX_PURCHASE_PER_WALLET = (TOTAL_ISSUANCE * MAX_PURCHASE_BPS) / BASIS_POINTS;

/** Fixed, not oracle-derived. */
export const GRADUATION_THRESHOLD = 116_589n * SCALE;

/** Graduation split in percent; the treasury takes whatever is left. */
export const LIQUIDITY_SHARE_PERCENT = 50n;
export const CREATOR_SHARE_PERCENT = 30n;
export const TREASURY_SHARE_PERCENT = 20n;

/** 0.0001 reserve per whole token. */
export const DEFAULT_BASE_PRICE = 10n ** 14n;
export const DEFAULT_CREATION_FEE = SCALE;
