import type { Address, AssetId } from "@roscaflow/shared";
import type { AssetTransfer, Checkpointable, Restore } from "../domain/ports.js";
import { CircleError, assert } from "../utils/errors.js";

/**
 * In-process balances keyed by asset then account. Stands in for an external
 * token ledger in development and tests.
 */
export class MemoryAssetLedger implements AssetTransfer, Checkpointable {
  private balances = new Map<AssetId, Map<Address, number>>();

  balanceOf(asset: AssetId, account: Address): number {
    return this.balances.get(asset)?.get(account) ?? 0;
  }

  mint(asset: AssetId, to: Address, amount: number): void {
    assert(Number.isSafeInteger(amount) && amount > 0, 400, "INVALID_AMOUNT", "Mint amount must be a positive integer.");
    this.credit(asset, to, amount);
  }

  transfer(asset: AssetId, from: Address, to: Address, amount: number): void {
    assert(Number.isSafeInteger(amount) && amount >= 0, 400, "INVALID_AMOUNT", "Transfer amount must be a non-negative integer.");
    if (amount === 0 || from === to) {
      return;
    }
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      throw new CircleError("InsufficientAllowance", `${from} holds ${available} of ${asset}, needs ${amount}.`);
    }
    this.accounts(asset).set(from, available - amount);
    this.credit(asset, to, amount);
  }

  checkpoint(): Restore {
    const saved = new Map([...this.balances].map(([asset, accounts]) => [asset, new Map(accounts)]));
    return () => {
      this.balances = saved;
    };
  }

  reset(): void {
    this.balances = new Map();
  }

  private credit(asset: AssetId, to: Address, amount: number) {
    const accounts = this.accounts(asset);
    accounts.set(to, (accounts.get(to) ?? 0) + amount);
  }

  private accounts(asset: AssetId): Map<Address, number> {
    let accounts = this.balances.get(asset);
    if (!accounts) {
      accounts = new Map();
      this.balances.set(asset, accounts);
    }
    return accounts;
  }
}
