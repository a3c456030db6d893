// InMemoryToken: ERC20-shaped ledger used for collateral assets and the synthetic token
import { normalizeAddress } from '../utils/Address.js';

import type { SyntheticToken } from './types.js';

/**
 * Minimal fungible token kept in process memory.
 *
 * Movements that the holder cannot cover return `false` instead of throwing,
 * matching tokens that signal failure through their return value. Pulls via
 * `transferFrom` are authorised by an allowance granted to the recipient,
 * which is always the pulling account in this system.
 */
export class InMemoryToken implements SyntheticToken {
  readonly id: string;
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(id: string) {
    this.id = normalizeAddress(id);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(normalizeAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Negative allowance: ${amount}`);
    }
    this.allowances.set(this.allowanceKey(owner, spender), amount);
  }

  transfer(sender: string, recipient: string, amount: bigint): boolean {
    if (amount < 0n || this.balanceOf(sender) < amount) {
      return false;
    }
    this.move(sender, recipient, amount);
    return true;
  }

  transferFrom(payer: string, recipient: string, amount: bigint): boolean {
    const allowed = this.allowance(payer, recipient);
    if (amount < 0n || allowed < amount || this.balanceOf(payer) < amount) {
      return false;
    }
    this.allowances.set(this.allowanceKey(payer, recipient), allowed - amount);
    this.move(payer, recipient, amount);
    return true;
  }

  mint(to: string, amount: bigint): boolean {
    if (amount <= 0n) {
      return false;
    }
    const key = normalizeAddress(to);
    this.balances.set(key, this.balanceOf(key) + amount);
    this.supply += amount;
    return true;
  }

  burn(holder: string, amount: bigint): void {
    const key = normalizeAddress(holder);
    const balance = this.balanceOf(key);
    if (amount <= 0n || balance < amount) {
      throw new Error(`${this.id}: cannot burn ${amount} from ${key} (balance ${balance})`);
    }
    this.balances.set(key, balance - amount);
    this.supply -= amount;
  }

  private move(from: string, to: string, amount: bigint): void {
    const fromKey = normalizeAddress(from);
    const toKey = normalizeAddress(to);
    this.balances.set(fromKey, this.balanceOf(fromKey) - amount);
    this.balances.set(toKey, this.balanceOf(toKey) + amount);
  }

  private allowanceKey(owner: string, spender: string): string {
    return `${normalizeAddress(owner)}->${normalizeAddress(spender)}`;
  }
}
