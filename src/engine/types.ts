import type { AccountId, AssetId } from "../ledger/types.js";

export interface LiquidationReceipt {
  liquidator: AccountId;
  target: AccountId;
  asset: AssetId;
  /** Debt repaid on behalf of the target, 18 decimals. */
  debtCovered: bigint;
  /** Collateral equivalent of `debtCovered` at the current price. */
  collateralSeized: bigint;
  /** Extra collateral paid to the liquidator on top of `collateralSeized`. */
  bonusCollateral: bigint;
  startHealthFactor: bigint;
  endHealthFactor: bigint;
}

export interface AssetSummary {
  asset: AssetId;
  /** Sum of all deposits, in the asset's own decimals. */
  deposited: bigint;
  usdValue: bigint;
}

export interface SystemSummary {
  assets: AssetSummary[];
  totalCollateralUsd: bigint;
  totalDebt: bigint;
  /**
   * totalCollateralUsd / totalDebt with 18 decimals; null when nothing has
   * been minted.
   */
  collateralizationRatio: bigint | null;
}
