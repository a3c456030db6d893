// HealthFactorCalculator: collateral-to-debt ratio of a position at 1e18 scale
import type { CollateralLedger } from './CollateralLedger.js';
import type { CollateralRegistry } from './CollateralRegistry.js';
import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION
} from './constants.js';
import type { PriceOracleAdapter } from './PriceOracleAdapter.js';
import type { AccountInformation } from './types.js';

/**
 * Health Factor Formula:
 * HF = (collateralValueUsd × LIQUIDATION_THRESHOLD / LIQUIDATION_PRECISION) × 1e18 / debt
 *
 * Recomputed on every call from the ledger and the current feed answers;
 * nothing is cached.
 */
export function healthFactorFor(collateralValueUsd: bigint, debt: bigint): bigint {
  if (debt === 0n) {
    return MAX_HEALTH_FACTOR;
  }
  const adjusted = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjusted * PRECISION) / debt;
}

export function isHealthy(healthFactor: bigint): boolean {
  return healthFactor >= MIN_HEALTH_FACTOR;
}

export class HealthFactorCalculator {
  constructor(
    private readonly registry: CollateralRegistry,
    private readonly ledger: CollateralLedger,
    private readonly oracle: PriceOracleAdapter
  ) {}

  /** USD value of every registered asset the user holds, zero balances included. */
  collateralValue(user: string): bigint {
    let total = 0n;
    for (const { asset } of this.registry.list()) {
      total += this.oracle.usdValue(asset, this.ledger.collateralBalance(user, asset));
    }
    return total;
  }

  accountInformation(user: string): AccountInformation {
    return {
      debt: this.ledger.debt(user),
      collateralValueUsd: this.collateralValue(user)
    };
  }

  calculate(user: string): bigint {
    const { debt, collateralValueUsd } = this.accountInformation(user);
    return healthFactorFor(collateralValueUsd, debt);
  }
}
