/**
 * LiquidationEngine: resolves under-collateralized positions.
 *
 * A liquidator repays up to half of the target's debt and receives collateral
 * worth the repaid amount plus a 10% bonus. The collateral is taken from every
 * asset the target holds, weighted by each asset's share of the target's total
 * collateral value, so a target whose holdings of any single asset are too
 * small can still be liquidated when its total collateral suffices.
 *
 * Known behaviour: below a health factor of roughly 0.55 the bonus removes
 * more collateral value than the repaid debt offsets, so one liquidation can
 * leave the target's health factor lower. Repeated liquidations still converge
 * toward solvency or collateral exhaustion.
 */

import { normalizeAddress } from '../utils/Address.js';
import { minBigInt } from '../utils/bigint.js';

import type { CollateralLedger } from './CollateralLedger.js';
import type { CollateralRegistry } from './CollateralRegistry.js';
import {
  CLOSE_FACTOR,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  SEIZURE_TOLERANCE_DENOMINATOR,
  SEIZURE_TOLERANCE_NUMERATOR
} from './constants.js';
import { LiquidationError } from './errors.js';
import { isHealthy, type HealthFactorCalculator } from './HealthFactorCalculator.js';
import { requirePositive, type PositionActions } from './PositionActions.js';
import type { PriceOracleAdapter } from './PriceOracleAdapter.js';
import type { UnitOfWork } from './UnitOfWork.js';
import type { LiquidationResult, Seizure, SeizureOutcome } from './types.js';

/** Largest repayment one call may make against `debt`. */
export function maxCover(debt: bigint): bigint {
  return (debt * CLOSE_FACTOR) / LIQUIDATION_PRECISION;
}

/** Repaid debt plus the liquidation bonus, in USD. */
export function seizureTarget(debtCovered: bigint): bigint {
  return debtCovered + (debtCovered * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}

export function meetsSeizureTolerance(seized: bigint, target: bigint): boolean {
  return seized * SEIZURE_TOLERANCE_DENOMINATOR >= target * SEIZURE_TOLERANCE_NUMERATOR;
}

export class LiquidationEngine {
  constructor(
    private readonly registry: CollateralRegistry,
    private readonly ledger: CollateralLedger,
    private readonly oracle: PriceOracleAdapter,
    private readonly health: HealthFactorCalculator,
    private readonly actions: PositionActions
  ) {}

  /**
   * Cover part of `user`'s debt with the liquidator's synthetic tokens and
   * move the matching collateral to the liquidator. The liquidator's own
   * health factor is checked by the caller once this returns.
   *
   * @param now - Unix seconds used for quote staleness
   */
  liquidate(uow: UnitOfWork, liquidator: string, user: string, debtToCover: bigint, now: number): LiquidationResult {
    requirePositive(debtToCover, 'debtToCover');
    const target = normalizeAddress(user);
    const receiver = normalizeAddress(liquidator);

    const startingHealthFactor = this.health.calculate(target);
    if (isHealthy(startingHealthFactor)) {
      throw new LiquidationError('HealthFactorOk', `Health factor of ${target} is not below 1`, {
        user: target,
        healthFactor: startingHealthFactor
      });
    }

    const debtCovered = minBigInt(debtToCover, maxCover(this.ledger.debt(target)));
    // A positive debt below 2 wei rounds the cap to zero; nothing can be repaid.
    requirePositive(debtCovered, 'debtCovered');

    const outcome = this.seizeProportionally(uow, target, receiver, seizureTarget(debtCovered), now);
    this.actions.burnDebt(uow, target, receiver, debtCovered);

    return {
      user: target,
      liquidator: receiver,
      debtCovered,
      seizures: outcome.seizures,
      valueSeizedUsd: outcome.valueSeizedUsd,
      startingHealthFactor,
      endingHealthFactor: this.health.calculate(target)
    };
  }

  /**
   * Move collateral worth `totalValueToSeize` from `user` to `liquidator`,
   * split across assets by their share of the user's collateral value.
   * The last asset holding a balance takes the residual so rounding does not
   * leave the target short.
   */
  seizeProportionally(
    uow: UnitOfWork,
    user: string,
    liquidator: string,
    totalValueToSeize: bigint,
    now: number
  ): SeizureOutcome {
    const holdings = this.registry.list()
      .map(({ asset }) => {
        const balance = this.ledger.collateralBalance(user, asset);
        return { asset, balance, valueUsd: this.oracle.usdValue(asset, balance) };
      });

    const totalCollateralValue = holdings.reduce((sum, h) => sum + h.valueUsd, 0n);
    if (totalCollateralValue < totalValueToSeize) {
      throw new LiquidationError('InsufficientCollateral', `Collateral of ${user} cannot cover the seizure`, {
        user,
        collateralValueUsd: totalCollateralValue,
        required: totalValueToSeize
      });
    }

    const held = holdings.filter(h => h.balance > 0n);
    const seizures: Seizure[] = [];
    let seized = 0n;

    for (let i = 0; i < held.length && seized < totalValueToSeize; i++) {
      const { asset, balance, valueUsd } = held[i];
      const isLast = i === held.length - 1;

      const shareUsd = isLast
        ? totalValueToSeize - seized
        : (valueUsd * totalValueToSeize) / totalCollateralValue;

      // Prices may have moved since the valuation pass; never take more than the balance.
      const amount = minBigInt(this.oracle.tokenAmountFromUsd(asset, shareUsd, now), balance);
      if (amount === 0n) {
        continue;
      }

      this.actions.redeemCollateral(uow, user, liquidator, asset, amount);
      const moved = this.oracle.usdValue(asset, amount);
      seized += moved;
      seizures.push({ asset, amount, valueUsd: moved });
    }

    if (!meetsSeizureTolerance(seized, totalValueToSeize)) {
      throw new LiquidationError('InsufficientCollateral', `Seized ${seized} of ${totalValueToSeize} for ${user}`, {
        user,
        seized,
        required: totalValueToSeize
      });
    }

    return { seizures, valueSeizedUsd: seized };
  }
}
