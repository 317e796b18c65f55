import { describe, it, expect, vi, beforeEach } from "vitest";
import { AccountingEngine } from "../../src/engine/engine.js";
import { MutablePriceFeed } from "../../src/oracle/memory.js";
import { HEALTH_FACTOR_MAX } from "../../src/solvency/guard.js";
import { InMemoryStablecoin, InMemoryToken } from "../../src/token/memory.js";
import type { TransferableAsset } from "../../src/token/types.js";
import {
  HealthFactorBrokenError,
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  InsufficientCollateralError,
  InvalidAmountError,
  StalePriceError,
  TransferFailedError,
} from "../../src/utils/errors.js";
import { ENGINE, makeSandbox, silentLogger, T0, THREE_HOURS, UNIT, WETH } from "../fixtures/engine.js";
import type { TestSandbox } from "../fixtures/engine.js";

/**
 * alice: 10 WETH, 10_000 debt (health factor exactly 1 at $2000)
 * bob:   20 WETH, 10_000 debt (health factor 2 at $2000)
 */
async function openPositions(sb: TestSandbox): Promise<void> {
  sb.fund("alice", "WETH", 10n * UNIT);
  sb.fund("bob", "WETH", 20n * UNIT);
  await sb.engine.depositAndMint("alice", "WETH", 10n * UNIT, 10_000n * UNIT);
  await sb.engine.depositAndMint("bob", "WETH", 20n * UNIT, 10_000n * UNIT);
}

describe("liquidate", () => {
  let sb: TestSandbox;

  beforeEach(async () => {
    sb = makeSandbox([WETH]);
    await openPositions(sb);
  });

  it("refuses to liquidate a healthy account", async () => {
    sb.approveDebt("bob", 1000n * UNIT);

    const error = await sb.engine.liquidate("bob", "alice", "WETH", 1000n * UNIT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HealthFactorOkError);
    expect(error).toMatchObject({ account: "alice", healthFactor: UNIT });
  });

  it("rejects a zero debt to cover", async () => {
    sb.setPrice("WETH", 1800n);
    await expect(sb.engine.liquidate("bob", "alice", "WETH", 0n)).rejects.toBeInstanceOf(InvalidAmountError);
  });

  it("pays out the covered debt plus a 10% bonus when covering everything", async () => {
    sb.setPrice("WETH", 1800n);
    sb.approveDebt("bob", 10_000n * UNIT);

    const receipt = await sb.engine.liquidate("bob", "alice", "WETH", 10_000n * UNIT);

    expect(receipt).toEqual({
      liquidator: "bob",
      target: "alice",
      asset: "WETH",
      debtCovered: 10_000n * UNIT,
      collateralSeized: 5_555_555_555_555_555_555n,
      bonusCollateral: 555_555_555_555_555_555n,
      startHealthFactor: 900_000_000_000_000_000n,
      endHealthFactor: HEALTH_FACTOR_MAX,
    });
    expect(await sb.engine.getDebt("alice")).toBe(0n);
    expect(await sb.engine.getCollateralBalance("alice", "WETH")).toBe(3_888_888_888_888_888_890n);
    expect(sb.token("WETH").balanceOf("bob")).toBe(6_111_111_111_111_111_110n);
    expect(sb.stablecoin.balanceOf("bob")).toBe(0n);
    expect(sb.stablecoin.totalSupply).toBe(10_000n * UNIT);
    // the liquidator's own position is untouched
    expect(await sb.engine.getCollateralBalance("bob", "WETH")).toBe(20n * UNIT);
    expect(await sb.engine.getDebt("bob")).toBe(10_000n * UNIT);
  });

  it("commits a partial liquidation that improves the health factor", async () => {
    sb.setPrice("WETH", 1800n);
    sb.approveDebt("bob", 2000n * UNIT);

    const receipt = await sb.engine.liquidate("bob", "alice", "WETH", 2000n * UNIT);

    expect(receipt.collateralSeized).toBe(1_111_111_111_111_111_111n);
    expect(receipt.bonusCollateral).toBe(111_111_111_111_111_111n);
    expect(receipt.endHealthFactor).toBe(987_500_000_000_000_000n);
    expect(await sb.engine.getAccountInformation("alice")).toEqual({
      debt: 8000n * UNIT,
      collateralUsd: 15_800_000_000_000_000_000_400n,
    });
  });

  it("fails with HealthFactorNotImproved when collateral cannot cover the bonus", async () => {
    sb.setPrice("WETH", 1000n);
    sb.approveDebt("bob", 1000n * UNIT);

    const error = await sb.engine.liquidate("bob", "alice", "WETH", 1000n * UNIT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HealthFactorNotImprovedError);
    expect(error).toMatchObject({
      startHealthFactor: 500_000_000_000_000_000n,
      endHealthFactor: 494_444_444_444_444_444n,
    });
    expect(await sb.engine.getCollateralBalance("alice", "WETH")).toBe(10n * UNIT);
    expect(await sb.engine.getDebt("alice")).toBe(10_000n * UNIT);
    expect(sb.stablecoin.balanceOf("bob")).toBe(10_000n * UNIT);
    expect(sb.token("WETH").balanceOf("bob")).toBe(0n);
  });

  it("fails when the seized amount exceeds the target's collateral", async () => {
    sb.setPrice("WETH", 1000n);
    sb.approveDebt("bob", 10_000n * UNIT);

    const error = await sb.engine.liquidate("bob", "alice", "WETH", 10_000n * UNIT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InsufficientCollateralError);
    expect(error).toMatchObject({ requested: 11n * UNIT, available: 10n * UNIT });
  });

  it("does not let an undercollateralized liquidator walk away", async () => {
    sb.fund("carol", "WETH", UNIT);
    await sb.engine.depositAndMint("carol", "WETH", UNIT, 1000n * UNIT);
    sb.setPrice("WETH", 1800n);
    sb.approveDebt("carol", 1000n * UNIT);

    const error = await sb.engine.liquidate("carol", "alice", "WETH", 1000n * UNIT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HealthFactorBrokenError);
    expect(error).toMatchObject({ account: "carol", healthFactor: 900_000_000_000_000_000n });
    expect(await sb.engine.getDebt("alice")).toBe(10_000n * UNIT);
    expect(sb.stablecoin.balanceOf("carol")).toBe(1000n * UNIT);
  });

  it("rejects liquidation on a stale price", async () => {
    sb.setPrice("WETH", 1800n);
    sb.clock.now += THREE_HOURS + 1;
    sb.approveDebt("bob", 1000n * UNIT);

    await expect(sb.engine.liquidate("bob", "alice", "WETH", 1000n * UNIT)).rejects.toBeInstanceOf(StalePriceError);
  });

  it("fails when the liquidator has not approved the debt tokens", async () => {
    sb.setPrice("WETH", 1800n);

    const error = await sb.engine.liquidate("bob", "alice", "WETH", 1000n * UNIT).catch((e: unknown) => e);

    expect(error).toMatchObject({ name: "TransferFailedError", asset: "debt", operation: "transferFrom" });
    expect(await sb.engine.getDebt("alice")).toBe(10_000n * UNIT);
  });

  it("emits the receipt together with the redeem and burn events", async () => {
    sb.setPrice("WETH", 1800n);
    sb.approveDebt("bob", 2000n * UNIT);
    const liquidated = vi.fn();
    const redeemed = vi.fn();
    const burned = vi.fn();
    sb.engine.events.onLiquidated(liquidated);
    sb.engine.events.onCollateralRedeemed(redeemed);
    sb.engine.events.onDebtBurned(burned);

    const receipt = await sb.engine.liquidate("bob", "alice", "WETH", 2000n * UNIT);

    expect(liquidated).toHaveBeenCalledWith(receipt);
    expect(redeemed).toHaveBeenCalledWith({
      from: "alice",
      to: "bob",
      asset: "WETH",
      amount: 1_222_222_222_222_222_222n,
    });
    expect(burned).toHaveBeenCalledWith({ onBehalfOf: "alice", payer: "bob", amount: 2000n * UNIT });
  });
});

describe("liquidate with a failing collateral payout", () => {
  it("re-mints the burned debt and returns it to the liquidator", async () => {
    const weth = new InMemoryToken("WETH", 18);
    const handle = weth.connect(ENGINE);
    let payoutsBlocked = false;
    const token: TransferableAsset = {
      transferFrom: handle.transferFrom,
      transfer: async (to, amount) => (payoutsBlocked ? false : handle.transfer(to, amount)),
    };
    const stablecoin = new InMemoryStablecoin();
    const feed = new MutablePriceFeed(WETH.price, 8, T0);
    const engine = new AccountingEngine(
      { clock: () => T0 },
      {
        assets: [{ id: "WETH", decimals: 18, oracle: feed, token }],
        debtToken: stablecoin.grantAuthority(ENGINE),
        logger: silentLogger,
      },
    );

    for (const [account, amount] of [["alice", 10n], ["bob", 20n]] as const) {
      weth.faucet(account, amount * UNIT);
      weth.approve(account, ENGINE, amount * UNIT);
      await engine.depositAndMint(account, "WETH", amount * UNIT, 10_000n * UNIT);
    }
    feed.setPrice(1800n * 10n ** 8n, T0);
    stablecoin.approve("bob", ENGINE, 2000n * UNIT);
    payoutsBlocked = true;

    const error = await engine.liquidate("bob", "alice", "WETH", 2000n * UNIT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferFailedError);
    expect(error).toMatchObject({ asset: "WETH", operation: "transfer" });
    expect(stablecoin.balanceOf("bob")).toBe(10_000n * UNIT);
    expect(stablecoin.balanceOf(ENGINE)).toBe(0n);
    expect(stablecoin.totalSupply).toBe(20_000n * UNIT);
    expect(await engine.getAccountInformation("alice")).toEqual({
      debt: 10_000n * UNIT,
      collateralUsd: 18_000n * UNIT,
    });
  });
});
