import type { AssetId } from "../ledger/types.js";

export interface PriceQuote {
  /** USD price of one whole unit of the asset, scaled by `decimals`. */
  price: bigint;
  decimals: number;
  /** Unix seconds of the last update. */
  updatedAt: number;
}

/**
 * External price source. Treated as untrusted: neither freshness nor
 * monotonic timestamps are assumed.
 */
export interface PriceOracle {
  latestPrice(asset: AssetId): Promise<PriceQuote>;
}
