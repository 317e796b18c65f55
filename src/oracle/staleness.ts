import type { Clock } from "../config.js";
import type { AssetId } from "../ledger/types.js";
import { InvalidPriceError, StalePriceError } from "../utils/errors.js";
import type { PriceOracle, PriceQuote } from "./types.js";

/**
 * Wraps any PriceOracle and refuses quotes older than `timeoutSeconds`.
 * Quotes stamped in the future are accepted as fresh.
 */
export class StalenessCheckedOracle implements PriceOracle {
  constructor(
    private readonly source: PriceOracle,
    private readonly timeoutSeconds: number,
    private readonly clock: Clock,
  ) {}

  async latestPrice(asset: AssetId): Promise<PriceQuote> {
    const quote = await this.source.latestPrice(asset);
    const now = this.clock();
    if (now - quote.updatedAt > this.timeoutSeconds) {
      throw new StalePriceError(asset, quote.updatedAt, now);
    }
    if (quote.price <= 0n) {
      throw new InvalidPriceError(asset, quote.price);
    }
    return quote;
  }
}
