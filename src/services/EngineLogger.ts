// EngineLogger: Structured logging for engine operations
// Provides consistent log format with operation context and keeps metrics in step

import type { Logger } from 'winston';

import type { EngineError } from '../engine/errors.js';
import type { LiquidationResult } from '../engine/types.js';
import {
  engineOperationsTotal,
  engineRejectionsTotal,
  engineRollbacksTotal,
  healthFactorAfterOperation,
  liquidationSeizedUsdTotal,
  liquidationsTotal,
  oracleRejectionsTotal
} from '../metrics/index.js';
import { MAX_HEALTH_FACTOR } from '../engine/constants.js';
import { createAppLogger } from '../utils/logger.js';
import { formatWad } from '../utils/decimals.js';

export type OperationName =
  | 'depositCollateral'
  | 'depositCollateralAndMintDebt'
  | 'redeemCollateral'
  | 'redeemCollateralForDebt'
  | 'mintDebt'
  | 'burnDebt'
  | 'liquidate';

export interface OperationContext {
  operation: OperationName;
  caller: string;
  asset?: string;
  amount?: bigint;
  user?: string;
}

/**
 * EngineLogger records one line per operation outcome and updates the
 * matching counters
 */
export class EngineLogger {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createAppLogger();
  }

  committed(context: OperationContext, healthFactor?: bigint): void {
    engineOperationsTotal.inc({ operation: context.operation, outcome: 'committed' });

    if (healthFactor !== undefined && healthFactor !== MAX_HEALTH_FACTOR) {
      healthFactorAfterOperation.observe(
        { operation: context.operation },
        Number(formatWad(healthFactor))
      );
    }

    this.logger.info('Operation committed', {
      ...this.fields(context),
      healthFactor: healthFactor === undefined ? undefined : healthFactor.toString()
    });
  }

  rejected(context: OperationContext, error: EngineError): void {
    engineOperationsTotal.inc({ operation: context.operation, outcome: 'rejected' });
    engineRejectionsTotal.inc({ operation: context.operation, code: error.code });

    this.logger.warn('Operation rejected', {
      ...this.fields(context),
      category: error.category,
      code: error.code,
      reason: error.message
    });
  }

  rolledBack(context: OperationContext, steps: number): void {
    engineRollbacksTotal.inc({ operation: context.operation, status: 'complete' });
    this.logger.debug('Operation unwound', { ...this.fields(context), steps });
  }

  rollbackFailed(context: OperationContext, failedSteps: string[], cause: unknown): void {
    engineRollbacksTotal.inc({ operation: context.operation, status: 'incomplete' });
    this.logger.error('Rollback incomplete: external collaborator state may diverge from ledger', {
      ...this.fields(context),
      failedSteps,
      cause: cause instanceof Error ? cause.message : String(cause)
    });
  }

  oracleRejected(asset: string, reason: 'invalid_price' | 'stale_price', ageSec?: number): void {
    oracleRejectionsTotal.inc({ asset, reason });
    this.logger.warn('Price quote rejected', { asset, reason, ageSec });
  }

  liquidated(result: LiquidationResult): void {
    liquidationsTotal.inc();
    for (const seizure of result.seizures) {
      liquidationSeizedUsdTotal.inc({ asset: seizure.asset }, Number(formatWad(seizure.valueUsd)));
    }

    this.logger.info('Position liquidated', {
      user: result.user,
      liquidator: result.liquidator,
      debtCovered: formatWad(result.debtCovered),
      valueSeizedUsd: formatWad(result.valueSeizedUsd),
      assets: result.seizures.map(s => s.asset),
      startingHealthFactor: result.startingHealthFactor.toString(),
      endingHealthFactor: result.endingHealthFactor.toString()
    });
  }

  private fields(context: OperationContext): Record<string, string | undefined> {
    return {
      operation: context.operation,
      caller: context.caller,
      user: context.user,
      asset: context.asset,
      amount: context.amount === undefined ? undefined : context.amount.toString()
    };
  }
}
