/**
 * PriceOracleAdapter: converts between token amounts and USD value (both at
 * 18-decimal scale) using each asset's registered feed.
 *
 * The two directions deliberately differ in strictness:
 * - usdValue() trusts whatever the feed reports. It is used for aggregate
 *   valuation (health factor, account views), where a momentarily stale price
 *   is tolerated.
 * - tokenAmountFromUsd() sizes liquidation seizures and rejects non-positive
 *   or stale quotes.
 */

import type { PriceQuote } from '../collaborators/types.js';

import { ADDITIONAL_FEED_PRECISION, PRECISION, STALE_PRICE_TIMEOUT_SEC } from './constants.js';
import type { CollateralRegistry } from './CollateralRegistry.js';
import { OracleError } from './errors.js';

export type QuoteRejectionReason = 'invalid_price' | 'stale_price';

export interface PriceOracleAdapterOptions {
  staleTimeoutSec?: number;
  onQuoteRejected?: (asset: string, reason: QuoteRejectionReason, ageSec?: number) => void;
}

export class PriceOracleAdapter {
  readonly staleTimeoutSec: number;
  private readonly onQuoteRejected?: PriceOracleAdapterOptions['onQuoteRejected'];

  constructor(
    private readonly registry: CollateralRegistry,
    options: PriceOracleAdapterOptions = {}
  ) {
    this.staleTimeoutSec = options.staleTimeoutSec ?? STALE_PRICE_TIMEOUT_SEC;
    this.onQuoteRejected = options.onQuoteRejected;
  }

  quoteFor(asset: string): PriceQuote {
    return this.registry.require(asset).priceFeed.latestQuote();
  }

  /** Why `quote` cannot size a seizure at `now`, or undefined when it can. */
  rejectionFor(quote: PriceQuote, now: number): QuoteRejectionReason | undefined {
    if (quote.price <= 0n) return 'invalid_price';
    if (now - quote.updatedAt > this.staleTimeoutSec) return 'stale_price';
    return undefined;
  }

  /** A quote is usable when positive and no older than the staleness timeout. */
  isFresh(quote: PriceQuote, now: number): boolean {
    return this.rejectionFor(quote, now) === undefined;
  }

  /**
   * USD value of `amount` of `asset`: price * 1e10 * amount / 1e18.
   * No validity check on the quote.
   */
  usdValue(asset: string, amount: bigint): bigint {
    const { price } = this.quoteFor(asset);
    return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
  }

  /**
   * Token amount worth `usdAmount`: usdAmount * 1e18 / (price * 1e10).
   *
   * @param now - Unix seconds the quote age is measured against
   * @throws OracleError InvalidPrice when price <= 0, StalePrice when the quote is too old
   */
  tokenAmountFromUsd(asset: string, usdAmount: bigint, now: number): bigint {
    const entry = this.registry.require(asset);
    const quote = entry.priceFeed.latestQuote();
    const rejection = this.rejectionFor(quote, now);

    if (rejection === 'invalid_price') {
      this.onQuoteRejected?.(entry.asset, 'invalid_price');
      throw new OracleError('InvalidPrice', `Invalid price ${quote.price} for ${entry.asset}`, {
        asset: entry.asset,
        price: quote.price
      });
    }

    if (rejection === 'stale_price') {
      const ageSec = now - quote.updatedAt;
      this.onQuoteRejected?.(entry.asset, 'stale_price', ageSec);
      throw new OracleError('StalePrice', `Price for ${entry.asset} is ${ageSec}s old`, {
        asset: entry.asset,
        ageSec,
        timeoutSec: this.staleTimeoutSec
      });
    }

    return (usdAmount * PRECISION) / (quote.price * ADDITIONAL_FEED_PRECISION);
  }
}
