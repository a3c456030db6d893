/**
 * Chainlink aggregator answer normalization.
 * The engine prices everything at 8 feed decimals; some aggregators publish 18.
 */

export const ENGINE_FEED_DECIMALS = 8;

/**
 * Rescale an aggregator answer to the engine's 8-decimal feed scale.
 * Scaling down truncates toward zero.
 *
 * @example
 * // 18-decimal feed reporting $1.5
 * scaleFeedAnswer(1500000000000000000n, 18) // => 150000000n
 */
export function scaleFeedAnswer(answer: bigint, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }

  const diff = decimals - ENGINE_FEED_DECIMALS;
  if (diff === 0) {
    return answer;
  }
  if (diff > 0) {
    return answer / 10n ** BigInt(diff);
  }
  return answer * 10n ** BigInt(-diff);
}
