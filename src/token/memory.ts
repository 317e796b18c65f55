import type { AccountId } from "../ledger/types.js";
import { TokenError } from "../utils/errors.js";
import type { DebtToken, TransferableAsset } from "./types.js";

/**
 * In-process fungible token with balances and allowances. Callers act through
 * `connect(caller)`, which binds the sender/spender identity.
 */
export class InMemoryToken {
  private balances = new Map<AccountId, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(
    public readonly symbol: string,
    public readonly decimals: number,
  ) {}

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): void {
    if (amount < 0n) throw new TokenError(this.symbol, "negative allowance");
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  /** Create tokens out of thin air. Test and scenario setup only. */
  faucet(recipient: AccountId, amount: bigint): void {
    this.credit(recipient, amount);
  }

  connect(caller: AccountId): TransferableAsset {
    return {
      transfer: async (to, amount) => this.move(caller, to, amount),
      transferFrom: async (from, to, amount) => {
        const allowed = this.allowance(from, caller);
        if (allowed < amount) return false;
        const moved = this.move(from, to, amount);
        if (moved) this.allowances.set(allowanceKey(from, caller), allowed - amount);
        return moved;
      },
    };
  }

  protected move(from: AccountId, to: AccountId, amount: bigint): boolean {
    if (amount < 0n || this.balanceOf(from) < amount) return false;
    this.debit(from, amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  protected credit(account: AccountId, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
    this.supply += amount;
  }

  protected debit(account: AccountId, amount: bigint): void {
    const next = this.balanceOf(account) - amount;
    if (next === 0n) this.balances.delete(account);
    else this.balances.set(account, next);
  }

  protected destroy(account: AccountId, amount: bigint): void {
    this.debit(account, amount);
    this.supply -= amount;
  }
}

/**
 * Synthetic dollar. Mint and burn belong to a single holder chosen once via
 * `grantAuthority`.
 */
export class InMemoryStablecoin extends InMemoryToken {
  private authority: AccountId | null = null;

  constructor(symbol = "USDX") {
    super(symbol, 18);
  }

  grantAuthority(holder: AccountId): DebtToken {
    if (this.authority !== null) {
      throw new TokenError(this.symbol, `mint authority already granted to ${this.authority}`);
    }
    this.authority = holder;
    const handle = this.connect(holder);

    return {
      ...handle,
      mint: async (recipient, amount) => {
        if (recipient === "") throw new TokenError(this.symbol, "cannot mint to an empty recipient");
        if (amount <= 0n) throw new TokenError(this.symbol, "mint amount must be more than zero");
        this.credit(recipient, amount);
        return true;
      },
      burn: async (amount) => {
        if (amount <= 0n) throw new TokenError(this.symbol, "burn amount must be more than zero");
        const held = this.balanceOf(holder);
        if (held < amount) {
          throw new TokenError(this.symbol, `burn amount ${amount} exceeds balance ${held}`);
        }
        this.destroy(holder, amount);
      },
    };
  }
}

function allowanceKey(owner: AccountId, spender: AccountId): string {
  return `${owner}\u0000${spender}`;
}
