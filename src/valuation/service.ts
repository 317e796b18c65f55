import type { Clock } from "../config.js";
import type { Logger } from "../logging/logger.js";
import type { AssetId, CollateralBalances } from "../ledger/types.js";
import { StalenessCheckedOracle } from "../oracle/staleness.js";
import type { PriceQuote } from "../oracle/types.js";
import { mulDiv, pow10, WAD } from "../utils/math.js";
import type { AssetRegistry } from "./registry.js";

/**
 * Converts between collateral amounts and 18-decimal USD using fresh oracle
 * quotes. Every quote goes through a staleness check.
 *
 *   usd    = amount * price * 1e18 / (10^tokenDecimals * 10^priceDecimals)
 *   amount = usd * 10^tokenDecimals * 10^priceDecimals / (price * 1e18)
 *
 * Both round down; the multiplication always happens before the division.
 */
export class ValuationService {
  private readonly oracles = new Map<AssetId, StalenessCheckedOracle>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: AssetRegistry,
    timeoutSeconds: number,
    clock: Clock,
    logger: Logger,
  ) {
    this.logger = logger.child({ module: "valuation" });
    for (const id of registry.ids()) {
      this.oracles.set(
        id,
        new StalenessCheckedOracle(registry.get(id).oracle, timeoutSeconds, clock),
      );
    }
  }

  async usdValue(asset: AssetId, amount: bigint): Promise<bigint> {
    const { decimals } = this.registry.get(asset);
    const quote = await this.quote(asset);
    return mulDiv(amount * quote.price, WAD, pow10(decimals + quote.decimals));
  }

  async assetAmountForUsd(asset: AssetId, usd: bigint): Promise<bigint> {
    const { decimals } = this.registry.get(asset);
    const quote = await this.quote(asset);
    return mulDiv(usd, pow10(decimals + quote.decimals), quote.price * WAD);
  }

  /**
   * Value of a set of balances. Assets are priced in registry order; assets
   * with a zero balance are skipped without an oracle read.
   */
  async totalCollateralUsd(balances: CollateralBalances): Promise<bigint> {
    let total = 0n;
    for (const asset of this.registry.ids()) {
      const amount = balances.get(asset) ?? 0n;
      if (amount === 0n) continue;
      total += await this.usdValue(asset, amount);
    }
    return total;
  }

  private async quote(asset: AssetId): Promise<PriceQuote> {
    const oracle = this.oracles.get(asset);
    if (!oracle) {
      // registry.get() above already rejected unknown assets
      throw new Error(`No oracle bound to ${asset}`);
    }
    const quote = await oracle.latestPrice(asset);
    this.logger.trace({ asset, price: quote.price, updatedAt: quote.updatedAt }, "Price read");
    return quote;
  }
}
