// Unit tests for engine bootstrap from a config file
import { describe, it, expect } from 'vitest';

import { buildEngine } from '../../src/bootstrap/buildEngine.js';
import { engineConfigSchema, loadEngineConfig, type EngineConfigFile } from '../../src/bootstrap/engineConfig.js';
import { EngineLogger } from '../../src/services/EngineLogger.js';
import { NOW, captureError, silentLogger, wad } from '../helpers/engineHarness.js';

const HOLDER = '0x1000000000000000000000000000000000000001';

describe('engine config', () => {
  describe('loadEngineConfig', () => {
    it('should load and validate the example file', () => {
      const file = loadEngineConfig('config/engine.example.json');

      expect(file.syntheticToken).toBe('dusd');
      expect(file.collateral.map(c => c.asset)).toEqual(['weth', 'wbtc']);
      expect(file.collateral[0].priceFeed).toEqual({ type: 'manual', id: 'weth-usd', price: '2000' });
    });
  });

  describe('engineConfigSchema', () => {
    it('should reject a malformed aggregator address', () => {
      const result = engineConfigSchema.safeParse({
        syntheticToken: 'dusd',
        collateral: [{ asset: 'weth', priceFeed: { type: 'chainlink', address: '0x1234' } }]
      });
      expect(result.success).toBe(false);
    });

    it('should require at least one collateral asset', () => {
      expect(engineConfigSchema.safeParse({ syntheticToken: 'dusd', collateral: [] }).success).toBe(false);
    });

    it('should reject signed or exponent prices', () => {
      const result = engineConfigSchema.safeParse({
        syntheticToken: 'dusd',
        collateral: [{ asset: 'weth', priceFeed: { type: 'manual', id: 'weth-usd', price: '-1' } }]
      });
      expect(result.success).toBe(false);
    });
  });

  describe('buildEngine', () => {
    const logger = new EngineLogger(silentLogger());

    it('should wire tokens, manual feeds and opening balances', () => {
      const service = buildEngine(loadEngineConfig('config/engine.example.json'), { clock: () => NOW, logger });

      expect(service.engine.collateralTokens()).toEqual(['weth', 'wbtc']);
      expect(service.engine.engineAccount).toBe('engine');
      expect(service.engine.staleTimeoutSec).toBe(10800);
      expect(service.synthetic.id).toBe('dusd');
      expect(service.engine.syntheticToken()).toBe(service.synthetic);
      expect(service.tokens.get('weth')?.balanceOf(HOLDER)).toBe(wad(10));
      expect(service.tokens.get('wbtc')?.balanceOf(HOLDER)).toBe(wad(1));
      expect(service.manualFeeds.get('wbtc-usd')?.latestQuote()).toEqual({ price: 3000000000000n, updatedAt: NOW });
      expect(service.engine.usdValue('wbtc', wad(1))).toBe(wad(30000));
      expect(service.aggregatorFeeds).toEqual([]);
    });

    it('should honour an explicit engine account and staleness timeout', () => {
      const file: EngineConfigFile = {
        syntheticToken: 'dusd',
        collateral: [{ asset: 'weth', priceFeed: { type: 'manual', id: 'weth-usd', price: '1.5' } }]
      };
      const service = buildEngine(file, { engineAccount: 'Vault', staleTimeoutSec: 60, clock: () => NOW, logger });

      expect(service.engine.engineAccount).toBe('vault');
      expect(service.engine.staleTimeoutSec).toBe(60);
      expect(service.engine.priceFeed('weth').latestQuote().price).toBe(150000000n);
    });

    it('should reject opening balances for an unregistered asset', () => {
      const file: EngineConfigFile = {
        syntheticToken: 'dusd',
        collateral: [{ asset: 'weth', priceFeed: { type: 'manual', id: 'weth-usd', price: '2000' } }],
        balances: { doge: { [HOLDER]: '1' } }
      };
      expect(captureError(() => buildEngine(file, { logger }))).toMatchObject({ code: 'NotAllowedToken' });
    });

    it('should require an RPC URL for aggregator feeds', () => {
      const address = '0xAbCd000000000000000000000000000000000001';
      const file: EngineConfigFile = {
        syntheticToken: 'dusd',
        collateral: [{ asset: 'weth', priceFeed: { type: 'chainlink', address } }]
      };
      expect(() => buildEngine(file, { logger })).toThrow(`RPC_URL is required for aggregator feed ${address}`);
    });
  });
});
