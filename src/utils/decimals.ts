/**
 * Fixed-point formatting helpers for 18-decimal amounts and 8-decimal feed prices.
 */
import { formatUnits, parseUnits } from 'ethers';

export const WAD_DECIMALS = 18;
export const FEED_DECIMALS = 8;

/**
 * Human-readable 18-decimal amount
 *
 * @example
 * formatWad(2970000000000000000000n) // => "2970.0"
 */
export function formatWad(amount: bigint): string {
  return formatUnits(amount, WAD_DECIMALS);
}

/**
 * Health factor as a display string. MaxUint256 (no debt) renders as "∞".
 */
export function formatHealthFactor(healthFactor: bigint, maxValue: bigint): string {
  if (healthFactor === maxValue) {
    return '∞';
  }
  return Number(formatUnits(healthFactor, WAD_DECIMALS)).toFixed(4);
}

/**
 * Parse a human decimal string ("2000.5") into an 8-decimal feed answer
 */
export function toFeedPrice(usd: string): bigint {
  return parseUnits(usd, FEED_DECIMALS);
}

/**
 * Parse a human decimal string ("1.25") into an 18-decimal amount
 */
export function toWad(amount: string): bigint {
  return parseUnits(amount, WAD_DECIMALS);
}
