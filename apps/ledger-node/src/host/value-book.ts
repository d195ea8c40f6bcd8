/**
 * Value book: per-asset account balances.
 *
 * Stands in for the chain's native balance and token ledgers. Engines hold
 * value in their own derived accounts and move it with transfer(). A
 * recipient may register a receive hook, which runs synchronously after
 * the credit; if the hook throws, the enclosing transaction reverts.
 */

import { NATIVE_ASSET, STAKING_ASSET, type Address } from "@tapa/economics";
import { isLedgerError, invalid, rejected } from "../errors.js";
import type { Journal } from "./host-ledger.js";
import { JournaledMap } from "./journaled-map.js";

export type Asset = typeof NATIVE_ASSET | typeof STAKING_ASSET;

export interface Payment {
  asset: Asset;
  from: Address;
  to: Address;
  amount: bigint;
}

export type ReceiveHook = (payment: Payment) => void;

function key(asset: Asset, account: Address): string {
  return `${asset}:${account}`;
}

export class ValueBook {
  private readonly balances: JournaledMap<string, bigint>;
  private readonly supply: JournaledMap<Asset, bigint>;
  private readonly hooks = new Map<Address, ReceiveHook>();

  constructor(journal: Journal) {
    this.balances = new JournaledMap(journal);
    this.supply = new JournaledMap(journal);
  }

  balanceOf(asset: Asset, account: Address): bigint {
    return this.balances.get(key(asset, account)) ?? 0n;
  }

  totalSupply(asset: Asset): bigint {
    return this.supply.get(asset) ?? 0n;
  }

  /** Create value out of nothing (genesis allocations, dev faucet). */
  mint(asset: Asset, to: Address, amount: bigint): void {
    if (amount <= 0n) throw invalid("invalid_amount", "mint amount must be > 0");
    this.credit(asset, to, amount);
    this.supply.set(asset, this.totalSupply(asset) + amount);
  }

  transfer(asset: Asset, from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;
    if (amount < 0n) throw invalid("invalid_amount", "transfer amount must be >= 0");
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw rejected(
        "insufficient_balance",
        `${from} holds ${available} ${asset}, needs ${amount}`,
      );
    }
    this.balances.set(key(asset, from), available - amount);
    this.credit(asset, to, amount);

    const hook = this.hooks.get(to);
    if (!hook) return;
    try {
      hook({ asset, from, to, amount });
    } catch (err) {
      if (isLedgerError(err)) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw rejected("value_transfer_failed", `recipient ${to} rejected payment: ${msg}`);
    }
  }

  /** Register code that runs whenever `account` receives value. */
  onReceive(account: Address, hook: ReceiveHook): void {
    this.hooks.set(account, hook);
  }

  clearReceiveHook(account: Address): void {
    this.hooks.delete(account);
  }

  private credit(asset: Asset, to: Address, amount: bigint): void {
    this.balances.set(key(asset, to), this.balanceOf(asset, to) + amount);
  }
}
