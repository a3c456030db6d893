// Public surface of the engine package
export { SyntheticEngine, type SyntheticEngineOptions } from './SyntheticEngine.js';
export { CollateralRegistry } from './CollateralRegistry.js';
export { CollateralLedger } from './CollateralLedger.js';
export { PriceOracleAdapter, type QuoteRejectionReason } from './PriceOracleAdapter.js';
export { HealthFactorCalculator, healthFactorFor, isHealthy } from './HealthFactorCalculator.js';
export { LiquidationEngine, maxCover, seizureTarget, meetsSeizureTolerance } from './LiquidationEngine.js';
export { ReentrancyGuard } from './ReentrancyGuard.js';
export { UnitOfWork, InteractionPhase, type Interaction, type RollbackReport } from './UnitOfWork.js';
export * from './constants.js';
export * from './errors.js';
export type * from './types.js';

export type { CollateralToken, FungibleToken, PriceFeed, PriceQuote, SyntheticToken } from '../collaborators/types.js';
export { InMemoryToken } from '../collaborators/InMemoryToken.js';
export { ManualPriceFeed } from '../collaborators/ManualPriceFeed.js';
export { ChainlinkPriceFeed, type AggregatorReader } from '../collaborators/ChainlinkPriceFeed.js';
