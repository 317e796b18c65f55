import type { AccountId } from "./types.js";

/** Outstanding minted debt per account. */
export class DebtLedger {
  private debts = new Map<AccountId, bigint>();

  debtOf(account: AccountId): bigint {
    return this.debts.get(account) ?? 0n;
  }

  get totalDebt(): bigint {
    let total = 0n;
    for (const debt of this.debts.values()) total += debt;
    return total;
  }

  set(account: AccountId, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative debt for ${account}: ${amount}`);
    }
    if (amount === 0n) this.debts.delete(account);
    else this.debts.set(account, amount);
  }
}
