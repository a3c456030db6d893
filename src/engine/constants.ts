// Protocol parameters. Fixed at build time; none of these are governable.
import { MaxUint256 } from 'ethers';

/** Feed answers carry 8 decimals; this lifts them to the 18-decimal scale. */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Fixed-point scale for amounts, USD values and health factors. */
export const PRECISION = 10n ** 18n;

/** Collateral counts at 50% of its USD value (200% over-collateralization). */
export const LIQUIDATION_THRESHOLD = 50n;
export const LIQUIDATION_PRECISION = 100n;

/** Extra value, in percent of the debt repaid, awarded to the liquidator. */
export const LIQUIDATION_BONUS = 10n;

/** Max share of a position's current debt repayable in one liquidation, in percent. */
export const CLOSE_FACTOR = 50n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor reported for a position with no debt. */
export const MAX_HEALTH_FACTOR = MaxUint256;

/** Seizure may fall short of its target by at most 0.01% of rounding loss. */
export const SEIZURE_TOLERANCE_NUMERATOR = 9999n;
export const SEIZURE_TOLERANCE_DENOMINATOR = 10000n;

export const STALE_PRICE_TIMEOUT_SEC = 3 * 60 * 60;
