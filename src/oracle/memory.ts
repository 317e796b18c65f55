import type { AssetId } from "../ledger/types.js";
import type { PriceOracle, PriceQuote } from "./types.js";

/**
 * Single-asset feed whose answer is set by hand. Used by the CLI scenario
 * runner and in tests.
 */
export class MutablePriceFeed implements PriceOracle {
  private quote: PriceQuote;

  constructor(price: bigint, decimals: number, updatedAt: number) {
    this.quote = { price, decimals, updatedAt };
  }

  setPrice(price: bigint, updatedAt: number): void {
    this.quote = { ...this.quote, price, updatedAt };
  }

  async latestPrice(_asset: AssetId): Promise<PriceQuote> {
    return { ...this.quote };
  }
}
