import { normalizeAddress } from '../utils/Address.js';

import { ValidationError } from './errors.js';
import type { UnitOfWork } from './UnitOfWork.js';

/**
 * Per-user collateral balances and debt, plus the per-asset custody total.
 *
 * Mutators take the current UnitOfWork and record their own inverse on it, so
 * a failed operation can always restore the ledger. A position that drops to
 * zero keeps its entry; only a rollback removes entries it created.
 */
export class CollateralLedger {
  private readonly collateral = new Map<string, Map<string, bigint>>();
  private readonly debts = new Map<string, bigint>();
  private readonly custody = new Map<string, bigint>();
  private debtTotal = 0n;

  collateralBalance(user: string, asset: string): bigint {
    return this.collateral.get(normalizeAddress(user))?.get(normalizeAddress(asset)) ?? 0n;
  }

  debt(user: string): bigint {
    return this.debts.get(normalizeAddress(user)) ?? 0n;
  }

  /** Sum of every user's recorded balance of `asset`. */
  totalCollateral(asset: string): bigint {
    return this.custody.get(normalizeAddress(asset)) ?? 0n;
  }

  totalDebt(): bigint {
    return this.debtTotal;
  }

  /** Every user that has ever deposited or minted, in first-seen order. */
  users(): string[] {
    const seen = new Set<string>([...this.collateral.keys(), ...this.debts.keys()]);
    return [...seen];
  }

  addCollateral(uow: UnitOfWork, user: string, asset: string, amount: bigint): void {
    this.setCollateral(uow, user, asset, this.collateralBalance(user, asset) + amount);
  }

  removeCollateral(uow: UnitOfWork, user: string, asset: string, amount: bigint): void {
    const balance = this.collateralBalance(user, asset);
    if (balance < amount) {
      throw new ValidationError(
        'InsufficientBalance',
        `Collateral balance ${balance} of ${asset} is below ${amount}`,
        { user: normalizeAddress(user), asset: normalizeAddress(asset), balance, amount }
      );
    }
    this.setCollateral(uow, user, asset, balance - amount);
  }

  addDebt(uow: UnitOfWork, user: string, amount: bigint): void {
    this.setDebt(uow, user, this.debt(user) + amount);
  }

  removeDebt(uow: UnitOfWork, user: string, amount: bigint): void {
    const current = this.debt(user);
    if (current < amount) {
      throw new ValidationError(
        'InsufficientBalance',
        `Debt ${current} is below ${amount}`,
        { user: normalizeAddress(user), debt: current, amount }
      );
    }
    this.setDebt(uow, user, current - amount);
  }

  private setCollateral(uow: UnitOfWork, user: string, asset: string, next: bigint): void {
    const userKey = normalizeAddress(user);
    const assetKey = normalizeAddress(asset);

    const existing = this.collateral.get(userKey);
    const balances = existing ?? new Map<string, bigint>();
    const hadEntry = balances.has(assetKey);
    const previous = balances.get(assetKey) ?? 0n;
    const previousCustody = this.custody.get(assetKey) ?? 0n;

    this.collateral.set(userKey, balances);
    balances.set(assetKey, next);
    this.custody.set(assetKey, previousCustody + next - previous);

    uow.record(`collateral ${userKey}/${assetKey}`, () => {
      if (hadEntry) {
        balances.set(assetKey, previous);
      } else {
        balances.delete(assetKey);
      }
      if (!existing) {
        this.collateral.delete(userKey);
      }
      this.custody.set(assetKey, previousCustody);
    });
  }

  private setDebt(uow: UnitOfWork, user: string, next: bigint): void {
    const userKey = normalizeAddress(user);
    const hadEntry = this.debts.has(userKey);
    const previous = this.debts.get(userKey) ?? 0n;
    const previousTotal = this.debtTotal;

    this.debts.set(userKey, next);
    this.debtTotal = previousTotal + next - previous;

    uow.record(`debt ${userKey}`, () => {
      if (hadEntry) {
        this.debts.set(userKey, previous);
      } else {
        this.debts.delete(userKey);
      }
      this.debtTotal = previousTotal;
    });
  }
}
