// Unit tests for operation logging and the metrics it keeps
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from 'winston';

import { InMemoryToken } from '../../src/collaborators/InMemoryToken.js';
import { engineOperationsTotal, engineRejectionsTotal, liquidationsTotal } from '../../src/metrics/index.js';
import { EngineLogger } from '../../src/services/EngineLogger.js';
import {
  ALICE,
  BOB,
  NOW,
  captureError,
  createHarness,
  silentLogger,
  wad,
  type Harness
} from '../helpers/engineHarness.js';

async function operationCount(operation: string, outcome: string): Promise<number> {
  const { values } = await engineOperationsTotal.get();
  return values.find(v => v.labels.operation === operation && v.labels.outcome === outcome)?.value ?? 0;
}

async function rejectionCount(operation: string, code: string): Promise<number> {
  const { values } = await engineRejectionsTotal.get();
  return values.find(v => v.labels.operation === operation && v.labels.code === code)?.value ?? 0;
}

class RefusingSynthetic extends InMemoryToken {
  override mint(): boolean {
    return false;
  }
}

class StickyToken extends InMemoryToken {
  override transfer(): boolean {
    return false;
  }
}

describe('EngineLogger', () => {
  let logger: Logger;
  let h: Harness;

  beforeEach(() => {
    logger = silentLogger();
    h = createHarness({ logger: new EngineLogger(logger) });
  });

  it('should log a committed operation with its context', async () => {
    const info = vi.spyOn(logger, 'info');
    const before = await operationCount('depositCollateralAndMintDebt', 'committed');
    h.fund(h.weth, ALICE, wad(10));

    h.engine.depositCollateralAndMintDebt(ALICE, 'weth', wad(10), wad(5000));

    expect(info).toHaveBeenCalledWith('Operation committed', {
      operation: 'depositCollateralAndMintDebt',
      caller: ALICE,
      user: undefined,
      asset: 'weth',
      amount: '10000000000000000000',
      healthFactor: '2000000000000000000'
    });
    expect(await operationCount('depositCollateralAndMintDebt', 'committed')).toBe(before + 1);
  });

  it('should log and count a rejected operation once', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const before = await rejectionCount('burnDebt', 'AmountMustBeMoreThanZero');

    captureError(() => h.engine.burnDebt(ALICE, 0n));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Operation rejected', expect.objectContaining({
      operation: 'burnDebt',
      category: 'validation',
      code: 'AmountMustBeMoreThanZero',
      reason: 'amount must be more than zero'
    }));
    expect(await rejectionCount('burnDebt', 'AmountMustBeMoreThanZero')).toBe(before + 1);
  });

  it('should log an incomplete rollback at error level', () => {
    const quiet = silentLogger();
    const error = vi.spyOn(quiet, 'error');
    const harness = createHarness({
      logger: new EngineLogger(quiet),
      synthetic: new RefusingSynthetic('dusd'),
      weth: new StickyToken('weth')
    });
    harness.fund(harness.weth, ALICE, wad(1));

    captureError(() => harness.engine.depositCollateralAndMintDebt(ALICE, 'weth', wad(1), wad(100)));

    expect(error).toHaveBeenCalledWith(
      'Rollback incomplete: external collaborator state may diverge from ledger',
      expect.objectContaining({
        operation: 'depositCollateralAndMintDebt',
        failedSteps: [`pull ${wad(1)} weth from ${ALICE}`],
        cause: `Mint of ${wad(100)} to ${ALICE} failed`
      })
    );
  });

  it('should log stale quote rejections from the oracle', () => {
    const warn = vi.spyOn(logger, 'warn');
    h.setNow(NOW + 20_000);

    captureError(() => h.engine.tokenAmountFromUsd('wbtc', wad(1)));

    expect(warn).toHaveBeenCalledWith('Price quote rejected', { asset: 'wbtc', reason: 'stale_price', ageSec: 20000 });
  });

  it('should log a liquidation after it commits', async () => {
    const info = vi.spyOn(logger, 'info');
    h.fund(h.weth, ALICE, wad(1));
    h.engine.depositCollateralAndMintDebt(ALICE, 'weth', wad(1), wad(1000));
    h.fund(h.weth, BOB, wad(10));
    h.engine.depositCollateralAndMintDebt(BOB, 'weth', wad(10), wad(1000));
    h.crash('1000', '30000');
    h.allowRepay(BOB, wad(500));
    const before = (await liquidationsTotal.get()).values[0]?.value ?? 0;

    h.engine.liquidate(BOB, ALICE, wad(500));

    expect(info).toHaveBeenCalledWith('Position liquidated', {
      user: ALICE,
      liquidator: BOB,
      debtCovered: '500.0',
      valueSeizedUsd: '550.0',
      assets: ['weth'],
      startingHealthFactor: '500000000000000000',
      endingHealthFactor: '450000000000000000'
    });
    expect((await liquidationsTotal.get()).values[0]?.value).toBe(before + 1);
  });
});
