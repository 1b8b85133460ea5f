/**
 * In-process fungible token ledger with ERC20-style balances and allowances.
 *
 * The engine treats a token as an external collaborator: it only calls
 * balanceOf / transfer / transferFrom and relies on them failing loudly.
 * snapshot() and restore() stand in for the host rolling back a failed call.
 */

import { Address } from '../types';
import { StakingError, StakingErrorCodes } from '../errors';

/**
 * Called synchronously after `to` has been credited. May call back into
 * the engine.
 */
export type ReceiveHook = (from: Address, amount: bigint) => void;

export interface TokenSnapshot {
  balances: Array<[Address, bigint]>;
  allowances: Array<[string, bigint]>;
  totalSupply: bigint;
}

export interface IFungibleToken {
  readonly symbol: string;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  totalSupply(): bigint;
  approve(owner: Address, spender: Address, amount: bigint): void;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
  snapshot(): TokenSnapshot;
  restore(snapshot: TokenSnapshot): void;
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}\u0000${spender}`;
}

export class InMemoryToken implements IFungibleToken {
  private balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;
  private hooks = new Map<Address, ReceiveHook>();

  constructor(readonly symbol: string) {}

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  /**
   * Create new units out of thin air. Test and faucet use only.
   */
  mint(to: Address, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.move(from, to, amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new StakingError(
        StakingErrorCodes.INSUFFICIENT_BALANCE,
        `${this.symbol}: insufficient allowance (${allowed} < ${amount})`
      );
    }
    this.allowances.set(allowanceKey(from, spender), allowed - amount);
    this.move(from, to, amount);
  }

  setReceiveHook(account: Address, hook: ReceiveHook | null): void {
    if (hook) {
      this.hooks.set(account, hook);
    } else {
      this.hooks.delete(account);
    }
  }

  snapshot(): TokenSnapshot {
    return {
      balances: [...this.balances.entries()],
      allowances: [...this.allowances.entries()],
      totalSupply: this.supply,
    };
  }

  restore(snapshot: TokenSnapshot): void {
    this.balances = new Map(snapshot.balances);
    this.allowances = new Map(snapshot.allowances);
    this.supply = snapshot.totalSupply;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new StakingError(
        StakingErrorCodes.INSUFFICIENT_BALANCE,
        `${this.symbol}: transfer amount ${amount} exceeds balance ${fromBalance} of ${from}`
      );
    }

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    this.hooks.get(to)?.(from, amount);
  }
}
