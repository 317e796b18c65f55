import type { AccountId, AssetId, CollateralBalances } from "./types.js";

const EMPTY: CollateralBalances = new Map();

/**
 * Deposited collateral per account and asset. Zero balances are not stored,
 * so an account that returns to zero leaves no trace.
 */
export class CollateralLedger {
  private accounts = new Map<AccountId, Map<AssetId, bigint>>();

  balanceOf(account: AccountId, asset: AssetId): bigint {
    return this.accounts.get(account)?.get(asset) ?? 0n;
  }

  balancesOf(account: AccountId): CollateralBalances {
    return this.accounts.get(account) ?? EMPTY;
  }

  /** Sum of all deposits of `asset` across accounts. */
  totalOf(asset: AssetId): bigint {
    let total = 0n;
    for (const balances of this.accounts.values()) {
      total += balances.get(asset) ?? 0n;
    }
    return total;
  }

  set(account: AccountId, asset: AssetId, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative collateral balance for ${account}/${asset}: ${amount}`);
    }
    let balances = this.accounts.get(account);
    if (amount === 0n) {
      if (!balances) return;
      balances.delete(asset);
      if (balances.size === 0) this.accounts.delete(account);
      return;
    }
    if (!balances) {
      balances = new Map();
      this.accounts.set(account, balances);
    }
    balances.set(asset, amount);
  }
}
