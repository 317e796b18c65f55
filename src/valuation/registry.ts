import type { AssetId } from "../ledger/types.js";
import type { PriceOracle } from "../oracle/types.js";
import type { TransferableAsset } from "../token/types.js";
import { InvalidConfigError, UnsupportedAssetError } from "../utils/errors.js";

export interface CollateralAsset {
  id: AssetId;
  /** Decimals of the collateral token's smallest unit. */
  decimals: number;
  oracle: PriceOracle;
  /** Engine-held handle on the collateral token. */
  token: TransferableAsset;
}

const MAX_DECIMALS = 36;

/**
 * The closed set of collateral assets. Iteration follows registration order,
 * which fixes the order in which account collateral is priced.
 */
export class AssetRegistry {
  private readonly assets = new Map<AssetId, CollateralAsset>();

  constructor(assets: readonly CollateralAsset[]) {
    if (assets.length === 0) {
      throw new InvalidConfigError("At least one collateral asset is required");
    }
    for (const asset of assets) {
      if (this.assets.has(asset.id)) {
        throw new InvalidConfigError(`Collateral asset ${asset.id} registered twice`);
      }
      if (!Number.isInteger(asset.decimals) || asset.decimals < 0 || asset.decimals > MAX_DECIMALS) {
        throw new InvalidConfigError(
          `Collateral asset ${asset.id} has invalid decimals ${asset.decimals}`,
        );
      }
      this.assets.set(asset.id, asset);
    }
  }

  get(id: AssetId): CollateralAsset {
    const asset = this.assets.get(id);
    if (!asset) throw new UnsupportedAssetError(id);
    return asset;
  }

  has(id: AssetId): boolean {
    return this.assets.has(id);
  }

  ids(): AssetId[] {
    return [...this.assets.keys()];
  }
}
