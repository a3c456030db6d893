// Type definitions for the synthetic USD engine
import type { CollateralToken, PriceFeed, SyntheticToken } from '../collaborators/types.js';

export interface CollateralAssetConfig {
  /** Asset identifier; the collateral token's id unless given explicitly. */
  asset: string;
  token: CollateralToken;
  priceFeed: PriceFeed;
}

export interface CollateralAsset {
  asset: string;
  token: CollateralToken;
  priceFeed: PriceFeed;
  /** Position in the configured order, used to iterate deterministically. */
  index: number;
}

export interface AccountInformation {
  debt: bigint;
  collateralValueUsd: bigint;
}

export interface PositionSnapshot extends AccountInformation {
  user: string;
  healthFactor: bigint;
  collateral: Array<{ asset: string; amount: bigint; valueUsd: bigint }>;
}

export interface Seizure {
  asset: string;
  amount: bigint;
  valueUsd: bigint;
}

export interface SeizureOutcome {
  seizures: Seizure[];
  valueSeizedUsd: bigint;
}

export interface LiquidationResult extends SeizureOutcome {
  user: string;
  liquidator: string;
  debtCovered: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

// Events, emitted only after the operation that raised them commits
export interface CollateralDepositedEvent {
  user: string;
  asset: string;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  from: string;
  to: string;
  asset: string;
  amount: bigint;
}

export interface DebtMintedEvent {
  user: string;
  amount: bigint;
}

export interface DebtBurnedEvent {
  onBehalfOf: string;
  payer: string;
  amount: bigint;
}

export interface EngineEventMap {
  CollateralDeposited: CollateralDepositedEvent;
  CollateralRedeemed: CollateralRedeemedEvent;
  DebtMinted: DebtMintedEvent;
  DebtBurned: DebtBurnedEvent;
  Liquidated: LiquidationResult;
}

export type EngineEventName = keyof EngineEventMap;

export type PendingEvent = {
  [K in EngineEventName]: { name: K; payload: EngineEventMap[K] };
}[EngineEventName];

export interface EngineOptions {
  collateral: readonly CollateralAssetConfig[];
  syntheticToken: SyntheticToken;
  /** Account the engine holds custody under on every token. */
  engineAccount: string;
  /** Unix seconds. Defaults to the wall clock. */
  clock?: () => number;
  staleTimeoutSec?: number;
}
