#!/usr/bin/env node
// CLI entry point: play a deposit → mint → price crash → liquidation walkthrough in process
import { buildEngine, type EngineService } from '../bootstrap/buildEngine.js';
import type { EngineConfigFile } from '../bootstrap/engineConfig.js';
import { EngineLogger } from '../services/EngineLogger.js';
import { formatHealthFactor, formatWad, toFeedPrice, toWad } from '../utils/decimals.js';
import { createAppLogger } from '../utils/logger.js';

const BORROWER = '0xb0b0000000000000000000000000000000000001';
const LIQUIDATOR = '0x11c0000000000000000000000000000000000002';

const scenario: EngineConfigFile = {
  syntheticToken: 'dusd',
  collateral: [
    { asset: 'weth', priceFeed: { type: 'manual', id: 'weth-usd', price: '2000' } },
    { asset: 'wbtc', priceFeed: { type: 'manual', id: 'wbtc-usd', price: '30000' } }
  ],
  balances: {
    weth: { [BORROWER]: '5', [LIQUIDATOR]: '10' },
    wbtc: { [BORROWER]: '0.2' }
  }
};

const logger = createAppLogger({ level: process.env.LOG_LEVEL ?? 'info', fileEnabled: false });

function report(service: EngineService, label: string): void {
  const { engine } = service;
  for (const account of [BORROWER, LIQUIDATOR]) {
    const position = engine.position(account);
    logger.info(`[simulate] ${label} ${account.slice(0, 10)}...`, {
      debt: formatWad(position.debt),
      collateralUsd: formatWad(position.collateralValueUsd),
      healthFactor: formatHealthFactor(position.healthFactor, engine.maxHealthFactor),
      balances: Object.fromEntries(position.collateral.map(c => [c.asset, formatWad(c.amount)]))
    });
  }
}

function approve(service: EngineService, account: string, token: string, amount: bigint): void {
  const target = token === service.synthetic.id ? service.synthetic : service.tokens.get(token);
  if (!target) {
    throw new Error(`Unknown token ${token}`);
  }
  target.approve(account, service.engine.engineAccount, amount);
}

function main(): void {
  const service = buildEngine(scenario, {
    engineAccount: 'engine',
    logger: new EngineLogger(logger)
  });
  const { engine } = service;

  approve(service, BORROWER, 'weth', toWad('5'));
  approve(service, BORROWER, 'wbtc', toWad('0.2'));
  engine.depositCollateral(BORROWER, 'weth', toWad('5'));
  engine.depositCollateralAndMintDebt(BORROWER, 'wbtc', toWad('0.2'), toWad('5400'));

  approve(service, LIQUIDATOR, 'weth', toWad('10'));
  engine.depositCollateralAndMintDebt(LIQUIDATOR, 'weth', toWad('10'), toWad('2700'));
  report(service, 'opened');

  const now = Math.floor(Date.now() / 1000);
  service.manualFeeds.get('weth-usd')?.setPrice(toFeedPrice('1000'), now);
  service.manualFeeds.get('wbtc-usd')?.setPrice(toFeedPrice('9000'), now);
  report(service, 'after crash');

  approve(service, LIQUIDATOR, service.synthetic.id, toWad('2700'));
  const result = engine.liquidate(LIQUIDATOR, BORROWER, toWad('2700'));
  for (const seizure of result.seizures) {
    logger.info(`[simulate] seized ${formatWad(seizure.amount)} ${seizure.asset}`, {
      valueUsd: formatWad(seizure.valueUsd)
    });
  }
  logger.info('[simulate] liquidation', {
    debtCovered: formatWad(result.debtCovered),
    valueSeizedUsd: formatWad(result.valueSeizedUsd),
    startingHealthFactor: formatHealthFactor(result.startingHealthFactor, engine.maxHealthFactor),
    endingHealthFactor: formatHealthFactor(result.endingHealthFactor, engine.maxHealthFactor)
  });
  report(service, 'after liquidation');
}

try {
  main();
} catch (err) {
  logger.error('[simulate] failed', { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
}
