import type { CollateralToken, SyntheticToken } from '../collaborators/types.js';
import { normalizeAddress } from '../utils/Address.js';

import { TransferError } from './errors.js';
import { InteractionPhase, type UnitOfWork } from './UnitOfWork.js';

/**
 * Schedules token movements on a UnitOfWork together with the call that
 * reverses each of them. The engine holds custody under `engineAccount`.
 */
export class TokenGateway {
  readonly engineAccount: string;

  constructor(engineAccount: string, private readonly synthetic: SyntheticToken) {
    this.engineAccount = normalizeAddress(engineAccount);
  }

  get syntheticToken(): SyntheticToken {
    return this.synthetic;
  }

  /** payer → engine custody */
  pull(uow: UnitOfWork, token: CollateralToken | SyntheticToken, payer: string, amount: bigint): void {
    const engine = this.engineAccount;
    uow.schedule({
      phase: InteractionPhase.Pull,
      label: `pull ${amount} ${token.id} from ${payer}`,
      execute: () => {
        if (!token.transferFrom(payer, engine, amount)) {
          throw new TransferError('TransferFailed', `Transfer of ${amount} ${token.id} from ${payer} failed`, {
            token: token.id,
            from: payer,
            amount
          });
        }
      },
      compensate: () => {
        if (!token.transfer(engine, payer, amount)) {
          throw new Error(`refund of ${amount} ${token.id} to ${payer} refused`);
        }
      }
    });
  }

  /** engine custody → recipient */
  push(uow: UnitOfWork, token: CollateralToken, recipient: string, amount: bigint): void {
    const engine = this.engineAccount;
    uow.schedule({
      phase: InteractionPhase.Push,
      label: `push ${amount} ${token.id} to ${recipient}`,
      execute: () => {
        if (!token.transfer(engine, recipient, amount)) {
          throw new TransferError('TransferFailed', `Transfer of ${amount} ${token.id} to ${recipient} failed`, {
            token: token.id,
            to: recipient,
            amount
          });
        }
      },
      compensate: () => {
        if (!token.transfer(recipient, engine, amount)) {
          throw new Error(`recovery of ${amount} ${token.id} from ${recipient} refused`);
        }
      }
    });
  }

  mint(uow: UnitOfWork, to: string, amount: bigint): void {
    const synthetic = this.synthetic;
    uow.schedule({
      phase: InteractionPhase.Mint,
      label: `mint ${amount} to ${to}`,
      execute: () => {
        if (!synthetic.mint(to, amount)) {
          throw new TransferError('MintFailed', `Mint of ${amount} to ${to} failed`, { to, amount });
        }
      },
      compensate: () => synthetic.burn(to, amount)
    });
  }

  /** Destroy synthetic tokens already pulled into custody. */
  burn(uow: UnitOfWork, amount: bigint): void {
    const synthetic = this.synthetic;
    const engine = this.engineAccount;
    uow.schedule({
      phase: InteractionPhase.Burn,
      label: `burn ${amount}`,
      execute: () => {
        try {
          synthetic.burn(engine, amount);
        } catch (cause) {
          throw new TransferError('TransferFailed', `Burn of ${amount} ${synthetic.id} failed`, {
            token: synthetic.id,
            amount
          }, cause);
        }
      },
      compensate: () => {
        if (!synthetic.mint(engine, amount)) {
          throw new Error(`re-mint of ${amount} refused`);
        }
      }
    });
  }
}
