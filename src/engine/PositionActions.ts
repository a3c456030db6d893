import { normalizeAddress } from '../utils/Address.js';

import type { CollateralLedger } from './CollateralLedger.js';
import type { CollateralRegistry } from './CollateralRegistry.js';
import { ValidationError } from './errors.js';
import type { TokenGateway } from './TokenGateway.js';
import type { UnitOfWork } from './UnitOfWork.js';

export function requirePositive(amount: bigint, field = 'amount'): void {
  if (amount <= 0n) {
    throw new ValidationError('AmountMustBeMoreThanZero', `${field} must be more than zero`, { [field]: amount });
  }
}

/**
 * Ledger mutations paired with their token movements. No health checks and
 * no locking here: callers decide when the invariant is verified.
 */
export class PositionActions {
  constructor(
    private readonly registry: CollateralRegistry,
    private readonly ledger: CollateralLedger,
    private readonly gateway: TokenGateway
  ) {}

  depositCollateral(uow: UnitOfWork, user: string, asset: string, amount: bigint): void {
    requirePositive(amount);
    const entry = this.registry.require(asset);
    const account = normalizeAddress(user);

    this.ledger.addCollateral(uow, account, entry.asset, amount);
    this.gateway.pull(uow, entry.token, account, amount);
    uow.raise({ name: 'CollateralDeposited', payload: { user: account, asset: entry.asset, amount } });
  }

  /** Debit `from`'s collateral and send the tokens to `to`. */
  redeemCollateral(uow: UnitOfWork, from: string, to: string, asset: string, amount: bigint): void {
    requirePositive(amount);
    const entry = this.registry.require(asset);
    const owner = normalizeAddress(from);
    const recipient = normalizeAddress(to);

    this.ledger.removeCollateral(uow, owner, entry.asset, amount);
    this.gateway.push(uow, entry.token, recipient, amount);
    uow.raise({
      name: 'CollateralRedeemed',
      payload: { from: owner, to: recipient, asset: entry.asset, amount }
    });
  }

  mintDebt(uow: UnitOfWork, user: string, amount: bigint): void {
    requirePositive(amount);
    const account = normalizeAddress(user);

    this.ledger.addDebt(uow, account, amount);
    this.gateway.mint(uow, account, amount);
    uow.raise({ name: 'DebtMinted', payload: { user: account, amount } });
  }

  /** Reduce `onBehalfOf`'s debt with synthetic tokens pulled from `payer`. */
  burnDebt(uow: UnitOfWork, onBehalfOf: string, payer: string, amount: bigint): void {
    requirePositive(amount);
    const debtor = normalizeAddress(onBehalfOf);
    const from = normalizeAddress(payer);

    this.ledger.removeDebt(uow, debtor, amount);
    this.gateway.pull(uow, this.gateway.syntheticToken, from, amount);
    this.gateway.burn(uow, amount);
    uow.raise({ name: 'DebtBurned', payload: { onBehalfOf: debtor, payer: from, amount } });
  }
}
