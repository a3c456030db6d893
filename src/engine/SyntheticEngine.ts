// SyntheticEngine: public entry points for collateral, debt and liquidation
import { EventEmitter } from 'events';

import type { CollateralToken, PriceFeed, SyntheticToken } from '../collaborators/types.js';
import { EngineLogger, type OperationContext } from '../services/EngineLogger.js';
import { normalizeAddress } from '../utils/Address.js';

import { CollateralLedger } from './CollateralLedger.js';
import { CollateralRegistry } from './CollateralRegistry.js';
import {
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION
} from './constants.js';
import {
  EngineError,
  InvariantViolation,
  ReentrancyError,
  RollbackError,
  isEngineError
} from './errors.js';
import { HealthFactorCalculator, isHealthy } from './HealthFactorCalculator.js';
import { LiquidationEngine } from './LiquidationEngine.js';
import { PositionActions } from './PositionActions.js';
import { PriceOracleAdapter } from './PriceOracleAdapter.js';
import { ReentrancyGuard } from './ReentrancyGuard.js';
import { TokenGateway } from './TokenGateway.js';
import { UnitOfWork } from './UnitOfWork.js';
import type {
  AccountInformation,
  EngineEventMap,
  EngineEventName,
  EngineOptions,
  LiquidationResult,
  PendingEvent,
  PositionSnapshot
} from './types.js';

export interface SyntheticEngineOptions extends EngineOptions {
  logger?: EngineLogger;
}

interface TrackedContext extends OperationContext {
  healthFactor?: bigint;
}

/**
 * Over-collateralized synthetic USD engine.
 *
 * Every mutating method is synchronous and all-or-nothing: it runs under the
 * reentrancy guard inside a UnitOfWork, and any failure restores the ledger,
 * reverses completed token movements and rethrows. Events are emitted only
 * after the operation commits and the guard is released.
 */
export class SyntheticEngine extends EventEmitter {
  private readonly registry: CollateralRegistry;
  private readonly ledger = new CollateralLedger();
  private readonly oracle: PriceOracleAdapter;
  private readonly health: HealthFactorCalculator;
  private readonly gateway: TokenGateway;
  private readonly actions: PositionActions;
  private readonly liquidations: LiquidationEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly logger: EngineLogger;
  private readonly clock: () => number;
  private readonly synthetic: SyntheticToken;

  constructor(options: SyntheticEngineOptions) {
    super();
    this.logger = options.logger ?? new EngineLogger();
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.synthetic = options.syntheticToken;

    this.registry = new CollateralRegistry(options.collateral);
    this.oracle = new PriceOracleAdapter(this.registry, {
      staleTimeoutSec: options.staleTimeoutSec,
      onQuoteRejected: (asset, reason, ageSec) => this.logger.oracleRejected(asset, reason, ageSec)
    });
    this.health = new HealthFactorCalculator(this.registry, this.ledger, this.oracle);
    this.gateway = new TokenGateway(options.engineAccount, options.syntheticToken);
    this.actions = new PositionActions(this.registry, this.ledger, this.gateway);
    this.liquidations = new LiquidationEngine(this.registry, this.ledger, this.oracle, this.health, this.actions);
  }

  /**
   * Build from parallel token and feed lists, as a deployment passes them.
   * Mismatched lengths fail with ConfigLengthMismatch.
   */
  static fromParallelLists(
    tokens: readonly CollateralToken[],
    feeds: readonly PriceFeed[],
    options: Omit<SyntheticEngineOptions, 'collateral'>
  ): SyntheticEngine {
    return new SyntheticEngine({
      ...options,
      collateral: CollateralRegistry.fromParallelLists(tokens, feeds).list()
    });
  }

  // =====================================================================
  // Mutating entry points
  // =====================================================================

  depositCollateral(caller: string, asset: string, amount: bigint): void {
    this.execute({ operation: 'depositCollateral', caller, asset, amount }, (uow) => {
      this.actions.depositCollateral(uow, caller, asset, amount);
    });
  }

  depositCollateralAndMintDebt(caller: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    this.execute(
      { operation: 'depositCollateralAndMintDebt', caller, asset, amount: collateralAmount },
      (uow, ctx) => {
        this.actions.depositCollateral(uow, caller, asset, collateralAmount);
        this.actions.mintDebt(uow, caller, debtAmount);
        this.requireHealthy(caller, ctx);
      }
    );
  }

  redeemCollateral(caller: string, asset: string, amount: bigint): void {
    this.execute({ operation: 'redeemCollateral', caller, asset, amount }, (uow, ctx) => {
      this.actions.redeemCollateral(uow, caller, caller, asset, amount);
      this.requireHealthy(caller, ctx);
    });
  }

  /** Burn `debtAmount` of the caller's debt, then withdraw collateral. */
  redeemCollateralForDebt(caller: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    this.execute(
      { operation: 'redeemCollateralForDebt', caller, asset, amount: collateralAmount },
      (uow, ctx) => {
        this.actions.burnDebt(uow, caller, caller, debtAmount);
        this.actions.redeemCollateral(uow, caller, caller, asset, collateralAmount);
        this.requireHealthy(caller, ctx);
      }
    );
  }

  mintDebt(caller: string, amount: bigint): void {
    this.execute({ operation: 'mintDebt', caller, amount }, (uow, ctx) => {
      this.actions.mintDebt(uow, caller, amount);
      this.requireHealthy(caller, ctx);
    });
  }

  burnDebt(caller: string, amount: bigint): void {
    this.execute({ operation: 'burnDebt', caller, amount }, (uow, ctx) => {
      this.actions.burnDebt(uow, caller, caller, amount);
      // Burning can only raise the health factor; checked regardless.
      this.requireHealthy(caller, ctx);
    });
  }

  /**
   * Repay up to half of `user`'s debt from the caller's synthetic balance and
   * take collateral worth the repayment plus the bonus.
   */
  liquidate(caller: string, user: string, debtToCover: bigint): LiquidationResult {
    return this.execute({ operation: 'liquidate', caller, user, amount: debtToCover }, (uow, ctx) => {
      const result = this.liquidations.liquidate(uow, caller, user, debtToCover, this.clock());
      this.requireHealthy(caller, ctx);
      uow.raise({ name: 'Liquidated', payload: result });
      return result;
    });
  }

  // =====================================================================
  // Read operations
  // =====================================================================

  usdValue(asset: string, amount: bigint): bigint {
    return this.oracle.usdValue(asset, amount);
  }

  tokenAmountFromUsd(asset: string, usdAmount: bigint): bigint {
    return this.oracle.tokenAmountFromUsd(asset, usdAmount, this.clock());
  }

  accountInformation(user: string): AccountInformation {
    return this.health.accountInformation(user);
  }

  accountCollateralValue(user: string): bigint {
    return this.health.collateralValue(user);
  }

  healthFactor(user: string): bigint {
    return this.health.calculate(user);
  }

  collateralBalance(user: string, asset: string): bigint {
    return this.ledger.collateralBalance(user, this.registry.require(asset).asset);
  }

  debt(user: string): bigint {
    return this.ledger.debt(user);
  }

  /** Sum of all recorded balances of `asset`; equals the engine's custody balance. */
  totalCollateral(asset: string): bigint {
    return this.ledger.totalCollateral(this.registry.require(asset).asset);
  }

  totalDebt(): bigint {
    return this.ledger.totalDebt();
  }

  position(user: string): PositionSnapshot {
    const account = normalizeAddress(user);
    const collateral = this.registry.list().map(({ asset }) => {
      const amount = this.ledger.collateralBalance(account, asset);
      return { asset, amount, valueUsd: this.oracle.usdValue(asset, amount) };
    });
    const collateralValueUsd = collateral.reduce((sum, c) => sum + c.valueUsd, 0n);
    const debt = this.ledger.debt(account);
    return {
      user: account,
      debt,
      collateralValueUsd,
      collateral,
      healthFactor: this.health.calculate(account)
    };
  }

  positions(): PositionSnapshot[] {
    return this.ledger.users().map(user => this.position(user));
  }

  collateralTokens(): string[] {
    return this.registry.ids();
  }

  priceFeed(asset: string): PriceFeed {
    return this.registry.require(asset).priceFeed;
  }

  collateralToken(asset: string): CollateralToken {
    return this.registry.require(asset).token;
  }

  syntheticToken(): SyntheticToken {
    return this.synthetic;
  }

  get engineAccount(): string {
    return this.gateway.engineAccount;
  }

  get staleTimeoutSec(): number {
    return this.oracle.staleTimeoutSec;
  }

  get isLocked(): boolean {
    return this.guard.locked;
  }

  get precision(): bigint { return PRECISION; }
  get additionalFeedPrecision(): bigint { return ADDITIONAL_FEED_PRECISION; }
  get liquidationThreshold(): bigint { return LIQUIDATION_THRESHOLD; }
  get liquidationPrecision(): bigint { return LIQUIDATION_PRECISION; }
  get liquidationBonus(): bigint { return LIQUIDATION_BONUS; }
  get minHealthFactor(): bigint { return MIN_HEALTH_FACTOR; }
  get maxHealthFactor(): bigint { return MAX_HEALTH_FACTOR; }

  // =====================================================================
  // Typed event helpers
  // =====================================================================

  onEvent<K extends EngineEventName>(name: K, listener: (payload: EngineEventMap[K]) => void): this {
    return this.on(name, listener);
  }

  // =====================================================================
  // Internals
  // =====================================================================

  private requireHealthy(user: string, ctx: TrackedContext): void {
    const healthFactor = this.health.calculate(user);
    ctx.healthFactor = healthFactor;
    if (!isHealthy(healthFactor)) {
      throw new InvariantViolation(`Health factor of ${normalizeAddress(user)} would break`, {
        user: normalizeAddress(user),
        healthFactor
      });
    }
  }

  private execute<T>(context: OperationContext, body: (uow: UnitOfWork, ctx: TrackedContext) => T): T {
    const ctx: TrackedContext = { ...context, caller: normalizeAddress(context.caller) };
    let entered = false;
    let outcome: { result: T; events: PendingEvent[] };

    try {
      outcome = this.guard.run(ctx.operation, () => {
        entered = true;
        return this.runUnit(ctx, body);
      });
    } catch (error) {
      if (!entered && error instanceof ReentrancyError) {
        this.logger.rejected(ctx, error);
      }
      throw error;
    }

    this.logger.committed(ctx, ctx.healthFactor);
    for (const event of outcome.events) {
      if (event.name === 'Liquidated') {
        this.logger.liquidated(event.payload);
      }
      this.emit(event.name, event.payload);
    }
    return outcome.result;
  }

  private runUnit<T>(
    ctx: TrackedContext,
    body: (uow: UnitOfWork, ctx: TrackedContext) => T
  ): { result: T; events: PendingEvent[] } {
    const uow = new UnitOfWork(ctx.operation);
    try {
      const result = body(uow, ctx);
      uow.settle();
      return { result, events: uow.commit() };
    } catch (error) {
      const report = uow.rollback();
      if (report.failed.length > 0) {
        this.logger.rollbackFailed(ctx, report.failed.map(f => f.label), error);
        throw new RollbackError(ctx.operation, report.failed.map(f => f.label), error);
      }
      this.logger.rolledBack(ctx, report.steps);
      const failure = isEngineError(error)
        ? error
        : new EngineError('transfer', 'TransferFailed', `Collaborator failed during ${ctx.operation}`, {
          operation: ctx.operation
        }, { cause: error });
      this.logger.rejected(ctx, failure);
      throw failure;
    }
  }
}
