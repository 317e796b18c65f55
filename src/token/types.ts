import type { AccountId } from "../ledger/types.js";

/**
 * Fungible token as seen by its holder. The sender of `transfer` and the
 * spender of `transferFrom` are the identity the handle was issued to.
 * A `false` result means the transfer did not happen.
 */
export interface TransferableAsset {
  transferFrom(from: AccountId, to: AccountId, amount: bigint): Promise<boolean>;
  transfer(to: AccountId, amount: bigint): Promise<boolean>;
}

/**
 * Debt token handle held by the engine. Only the engine can mint and burn;
 * `burn` destroys tokens from the engine's own balance.
 */
export interface DebtToken extends TransferableAsset {
  mint(recipient: AccountId, amount: bigint): Promise<boolean>;
  burn(amount: bigint): Promise<void>;
}
