import { EventEmitter } from "node:events";
import type { AccountId, AssetId } from "../ledger/types.js";
import type { LiquidationReceipt } from "./types.js";

export interface CollateralDepositedEvent {
  account: AccountId;
  asset: AssetId;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  from: AccountId;
  to: AccountId;
  asset: AssetId;
  amount: bigint;
}

export interface DebtMintedEvent {
  account: AccountId;
  amount: bigint;
}

export interface DebtBurnedEvent {
  onBehalfOf: AccountId;
  payer: AccountId;
  amount: bigint;
}

/**
 * Typed notifications for committed operations. Nothing is emitted for an
 * operation that rolled back.
 */
export class EngineEvents extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(64);
  }

  // ── Emission ──

  emitCollateralDeposited(event: CollateralDepositedEvent): void {
    this.emit("collateralDeposited", event);
  }

  emitCollateralRedeemed(event: CollateralRedeemedEvent): void {
    this.emit("collateralRedeemed", event);
  }

  emitDebtMinted(event: DebtMintedEvent): void {
    this.emit("debtMinted", event);
  }

  emitDebtBurned(event: DebtBurnedEvent): void {
    this.emit("debtBurned", event);
  }

  emitLiquidated(receipt: LiquidationReceipt): void {
    this.emit("liquidated", receipt);
  }

  // ── Subscriptions (return unsubscribe fn) ──

  onCollateralDeposited(cb: (event: CollateralDepositedEvent) => void): () => void {
    this.on("collateralDeposited", cb);
    return () => this.off("collateralDeposited", cb);
  }

  onCollateralRedeemed(cb: (event: CollateralRedeemedEvent) => void): () => void {
    this.on("collateralRedeemed", cb);
    return () => this.off("collateralRedeemed", cb);
  }

  onDebtMinted(cb: (event: DebtMintedEvent) => void): () => void {
    this.on("debtMinted", cb);
    return () => this.off("debtMinted", cb);
  }

  onDebtBurned(cb: (event: DebtBurnedEvent) => void): () => void {
    this.on("debtBurned", cb);
    return () => this.off("debtBurned", cb);
  }

  onLiquidated(cb: (receipt: LiquidationReceipt) => void): () => void {
    this.on("liquidated", cb);
    return () => this.off("liquidated", cb);
  }
}
