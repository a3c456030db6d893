import type { LiquidationResult, PositionSnapshot } from '../engine/types.js';

// bigint has no JSON form; amounts travel as decimal strings.

export function serializePosition(position: PositionSnapshot, minHealthFactor: bigint) {
  return {
    user: position.user,
    debt: position.debt.toString(),
    collateralValueUsd: position.collateralValueUsd.toString(),
    healthFactor: position.healthFactor.toString(),
    liquidatable: position.healthFactor < minHealthFactor,
    collateral: position.collateral.map(c => ({
      asset: c.asset,
      amount: c.amount.toString(),
      valueUsd: c.valueUsd.toString()
    }))
  };
}

export function serializeLiquidation(result: LiquidationResult) {
  return {
    user: result.user,
    liquidator: result.liquidator,
    debtCovered: result.debtCovered.toString(),
    valueSeizedUsd: result.valueSeizedUsd.toString(),
    startingHealthFactor: result.startingHealthFactor.toString(),
    endingHealthFactor: result.endingHealthFactor.toString(),
    seizures: result.seizures.map(s => ({
      asset: s.asset,
      amount: s.amount.toString(),
      valueUsd: s.valueUsd.toString()
    }))
  };
}
