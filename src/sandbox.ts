import type { StableEngineConfig } from "./config.js";
import { DEFAULT_ENGINE_ID } from "./config.js";
import { AccountingEngine } from "./engine/engine.js";
import type { Logger } from "./logging/logger.js";
import type { AccountId, AssetId } from "./ledger/types.js";
import { MutablePriceFeed } from "./oracle/memory.js";
import { InMemoryStablecoin, InMemoryToken } from "./token/memory.js";
import type { CollateralAsset } from "./valuation/registry.js";

export interface SandboxAsset {
  id: AssetId;
  decimals: number;
  price: bigint;
  priceDecimals: number;
}

export interface Sandbox {
  engine: AccountingEngine;
  stablecoin: InMemoryStablecoin;
  tokens: Map<AssetId, InMemoryToken>;
  feeds: Map<AssetId, MutablePriceFeed>;
  /** Credit `amount` of a collateral token and approve the engine to pull it. */
  fund(account: AccountId, asset: AssetId, amount: bigint): void;
  /** Let the engine pull up to `amount` of the account's debt tokens. */
  approveDebt(account: AccountId, amount: bigint): void;
  /**
   * Raise the debt-token allowance by `amount` for the duration of `body`,
   * then put it back to what it was, whether `body` succeeds or fails.
   */
  withDebtAllowance<T>(account: AccountId, amount: bigint, body: () => Promise<T>): Promise<T>;
}

/**
 * An engine wired to in-process tokens and hand-set price feeds.
 * Feeds start out stamped with the config clock's current time.
 */
export function createSandbox(
  assets: SandboxAsset[],
  config: StableEngineConfig = {},
  logger?: Logger,
): Sandbox {
  const engineId = config.engineId ?? DEFAULT_ENGINE_ID;
  const now = config.clock ? config.clock() : Math.floor(Date.now() / 1000);
  const stablecoin = new InMemoryStablecoin();
  const tokens = new Map<AssetId, InMemoryToken>();
  const feeds = new Map<AssetId, MutablePriceFeed>();
  const bindings: CollateralAsset[] = [];

  for (const asset of assets) {
    const token = new InMemoryToken(asset.id, asset.decimals);
    const feed = new MutablePriceFeed(asset.price, asset.priceDecimals, now);
    tokens.set(asset.id, token);
    feeds.set(asset.id, feed);
    bindings.push({
      id: asset.id,
      decimals: asset.decimals,
      oracle: feed,
      token: token.connect(engineId),
    });
  }

  const engine = new AccountingEngine(
    { ...config, engineId },
    { assets: bindings, debtToken: stablecoin.grantAuthority(engineId), logger },
  );

  return {
    engine,
    stablecoin,
    tokens,
    feeds,
    fund(account, asset, amount) {
      const token = tokens.get(asset);
      if (!token) throw new Error(`Unknown sandbox asset ${asset}`);
      token.faucet(account, amount);
      token.approve(account, engineId, token.allowance(account, engineId) + amount);
    },
    approveDebt(account, amount) {
      stablecoin.approve(account, engineId, stablecoin.allowance(account, engineId) + amount);
    },
    async withDebtAllowance<T>(account: AccountId, amount: bigint, body: () => Promise<T>): Promise<T> {
      const before = stablecoin.allowance(account, engineId);
      stablecoin.approve(account, engineId, before + amount);
      try {
        return await body();
      } finally {
        stablecoin.approve(account, engineId, before);
      }
    },
  };
}
