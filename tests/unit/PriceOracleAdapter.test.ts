// Unit tests for PriceOracleAdapter
import { describe, it, expect, vi } from 'vitest';

import { InMemoryToken } from '../../src/collaborators/InMemoryToken.js';
import { ManualPriceFeed } from '../../src/collaborators/ManualPriceFeed.js';
import { CollateralRegistry } from '../../src/engine/CollateralRegistry.js';
import { OracleError } from '../../src/engine/errors.js';
import { PriceOracleAdapter } from '../../src/engine/PriceOracleAdapter.js';
import { NOW, captureError, wad } from '../helpers/engineHarness.js';

function setup(options: ConstructorParameters<typeof PriceOracleAdapter>[1] = {}) {
  const feed = new ManualPriceFeed('weth-usd', 200000000000n, NOW);
  const registry = new CollateralRegistry([
    { asset: 'weth', token: new InMemoryToken('weth'), priceFeed: feed }
  ]);
  return { feed, oracle: new PriceOracleAdapter(registry, options) };
}

describe('PriceOracleAdapter', () => {
  describe('usdValue', () => {
    it('should value an amount at the feed price', () => {
      const { oracle } = setup();
      expect(oracle.usdValue('weth', wad(1))).toBe(wad(2000));
      expect(oracle.usdValue('weth', wad(15) / 10n)).toBe(wad(3000));
      expect(oracle.usdValue('weth', 0n)).toBe(0n);
    });

    it('should not check quote age', () => {
      const { oracle, feed } = setup();
      feed.setPrice(200000000000n, 0);
      expect(oracle.usdValue('weth', wad(1))).toBe(wad(2000));
    });

    it('should reject unregistered assets', () => {
      const { oracle } = setup();
      expect(captureError(() => oracle.usdValue('wbtc', 1n))).toMatchObject({ code: 'NotAllowedToken' });
    });
  });

  describe('tokenAmountFromUsd', () => {
    it('should invert usdValue for a whole-wei amount', () => {
      const { oracle } = setup();
      const amount = 123456789123456789n;
      const usd = oracle.usdValue('weth', amount);

      expect(usd).toBe(246913578246913578000n);
      expect(oracle.tokenAmountFromUsd('weth', usd, NOW)).toBe(amount);
    });

    it('should round the token amount down', () => {
      const { oracle } = setup();
      expect(oracle.tokenAmountFromUsd('weth', 1999n, NOW)).toBe(0n);
      expect(oracle.tokenAmountFromUsd('weth', 3999n, NOW)).toBe(1n);
    });

    it('should accept a quote exactly at the staleness timeout', () => {
      const { oracle } = setup();
      expect(oracle.tokenAmountFromUsd('weth', wad(2000), NOW + 10800)).toBe(wad(1));
    });

    it('should reject a quote one second past the timeout and report it', () => {
      const onQuoteRejected = vi.fn();
      const { oracle } = setup({ onQuoteRejected });

      const err = captureError(() => oracle.tokenAmountFromUsd('weth', wad(2000), NOW + 10801));

      expect(err).toBeInstanceOf(OracleError);
      expect(err).toMatchObject({ code: 'StalePrice', details: { asset: 'weth', ageSec: 10801, timeoutSec: 10800 } });
      expect(onQuoteRejected).toHaveBeenCalledWith('weth', 'stale_price', 10801);
    });

    it('should reject zero and negative prices', () => {
      const onQuoteRejected = vi.fn();
      const { oracle, feed } = setup({ onQuoteRejected });

      feed.setPrice(0n, NOW);
      expect(captureError(() => oracle.tokenAmountFromUsd('weth', wad(1), NOW))).toMatchObject({ code: 'InvalidPrice' });
      feed.setPrice(-1n, NOW);
      expect(captureError(() => oracle.tokenAmountFromUsd('weth', wad(1), NOW))).toMatchObject({ code: 'InvalidPrice' });
      expect(onQuoteRejected).toHaveBeenCalledTimes(2);
      expect(onQuoteRejected).toHaveBeenLastCalledWith('weth', 'invalid_price');
    });

    it('should honour a custom staleness timeout', () => {
      const { oracle } = setup({ staleTimeoutSec: 60 });
      expect(oracle.staleTimeoutSec).toBe(60);
      expect(captureError(() => oracle.tokenAmountFromUsd('weth', wad(1), NOW + 61))).toMatchObject({ code: 'StalePrice' });
    });
  });

  describe('isFresh', () => {
    it('should require a positive price within the timeout', () => {
      const { oracle } = setup();
      expect(oracle.isFresh({ price: 1n, updatedAt: NOW }, NOW + 10800)).toBe(true);
      expect(oracle.isFresh({ price: 1n, updatedAt: NOW }, NOW + 10801)).toBe(false);
      expect(oracle.isFresh({ price: 0n, updatedAt: NOW }, NOW)).toBe(false);
    });

    it('should name the reason a quote is unusable', () => {
      const { oracle } = setup();
      expect(oracle.rejectionFor({ price: 1n, updatedAt: NOW }, NOW)).toBeUndefined();
      expect(oracle.rejectionFor({ price: 1n, updatedAt: NOW }, NOW + 10801)).toBe('stale_price');
      expect(oracle.rejectionFor({ price: -1n, updatedAt: NOW }, NOW + 10801)).toBe('invalid_price');
    });
  });

  it('should return the raw quote from quoteFor', () => {
    const { oracle } = setup();
    expect(oracle.quoteFor('WETH')).toEqual({ price: 200000000000n, updatedAt: NOW });
  });
});
