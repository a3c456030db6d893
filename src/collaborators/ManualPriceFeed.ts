import { normalizeAddress } from '../utils/Address.js';

import type { PriceFeed, PriceQuote } from './types.js';

/**
 * Price feed whose answer is pushed by its owner: the bootstrap config, the
 * simulation CLI, or a test.
 */
export class ManualPriceFeed implements PriceFeed {
  readonly id: string;
  private quote: PriceQuote;

  constructor(id: string, price: bigint, updatedAt: number) {
    this.id = normalizeAddress(id);
    this.quote = { price, updatedAt };
  }

  latestQuote(): PriceQuote {
    return { ...this.quote };
  }

  setPrice(price: bigint, updatedAt: number): void {
    this.quote = { price, updatedAt };
  }
}
