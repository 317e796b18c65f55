/** Identifier of a supported collateral asset. */
export type AssetId = string;

/** Opaque caller identity. */
export type AccountId = string;

export type CollateralBalances = ReadonlyMap<AssetId, bigint>;

export interface AccountInformation {
  /** Outstanding debt, 18 decimals. */
  debt: bigint;
  /** Value of all deposited collateral in USD, 18 decimals. */
  collateralUsd: bigint;
}
