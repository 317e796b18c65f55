import type { ProtocolParams, StableEngineConfig } from "../config.js";
import { DEFAULT_ENGINE_ID, resolveParams, systemClock } from "../config.js";
import { createLogger } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import { CollateralLedger } from "../ledger/collateral.js";
import { DebtLedger } from "../ledger/debt.js";
import { LedgerTransaction } from "../ledger/transaction.js";
import type { AccountId, AccountInformation, AssetId } from "../ledger/types.js";
import { calculateHealthFactor, SolvencyGuard } from "../solvency/guard.js";
import type { DebtToken, TransferableAsset } from "../token/types.js";
import {
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  InvalidAmountError,
  MintFailedError,
  TransferFailedError,
} from "../utils/errors.js";
import { mulDiv, percentOf, WAD } from "../utils/math.js";
import { AssetRegistry } from "../valuation/registry.js";
import type { CollateralAsset } from "../valuation/registry.js";
import { ValuationService } from "../valuation/service.js";
import { EngineEvents } from "./events.js";
import { OperationLock } from "./lock.js";
import type { LiquidationReceipt, SystemSummary } from "./types.js";

export interface EngineDependencies {
  /** Supported collateral, in the order account collateral is valued. */
  assets: readonly CollateralAsset[];
  /** Handle carrying the engine's exclusive mint/burn authority. */
  debtToken: DebtToken;
  /** Parent logger. Built from the config when omitted. */
  logger?: Logger;
}

/** Label used for the debt token in transfer errors. */
export const DEBT_TOKEN_LABEL = "debt";

/**
 * Collateral and debt bookkeeping with health-factor enforcement.
 *
 * Every operation runs under the engine's lock inside a LedgerTransaction:
 * ledger writes and solvency checks come first, external token calls last.
 * Any failure rolls the ledgers back, compensates the token calls that had
 * already succeeded and rethrows the original error.
 */
export class AccountingEngine {
  readonly events = new EngineEvents();
  readonly engineId: AccountId;

  private readonly params: ProtocolParams;
  private readonly registry: AssetRegistry;
  private readonly collateral = new CollateralLedger();
  private readonly debt = new DebtLedger();
  private readonly valuation: ValuationService;
  private readonly guard: SolvencyGuard;
  private readonly lock = new OperationLock();
  private readonly debtToken: DebtToken;
  private readonly logger: Logger;

  constructor(config: StableEngineConfig, deps: EngineDependencies) {
    const parent = deps.logger ?? createLogger({
      level: config.logLevel ?? "info",
      pretty: config.prettyLogs ?? false,
    });
    this.logger = parent.child({ module: "engine" });
    this.engineId = config.engineId ?? DEFAULT_ENGINE_ID;
    this.params = resolveParams(config.params);
    this.registry = new AssetRegistry(deps.assets);
    this.debtToken = deps.debtToken;
    this.valuation = new ValuationService(
      this.registry,
      this.params.priceTimeoutSeconds,
      config.clock ?? systemClock,
      parent,
    );
    this.guard = new SolvencyGuard(this.collateral, this.debt, this.valuation, this.params);

    this.logger.info(
      { engineId: this.engineId, assets: this.registry.ids() },
      "Accounting engine ready",
    );
  }

  // === Operations ===

  /** Lock `amount` of `asset` as collateral, pulled from `account`. */
  depositCollateral(account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    return this.execute("depositCollateral", { account, asset, amount }, async (tx) => {
      await this.deposit(tx, account, asset, amount);
    });
  }

  /** Mint `amount` of debt to `account`; the account must stay solvent. */
  mintDebt(account: AccountId, amount: bigint): Promise<void> {
    return this.execute("mintDebt", { account, amount }, async (tx) => {
      await this.mint(tx, account, amount);
    });
  }

  depositAndMint(
    account: AccountId,
    asset: AssetId,
    collateralAmount: bigint,
    debtAmount: bigint,
  ): Promise<void> {
    return this.execute(
      "depositAndMint",
      { account, asset, collateralAmount, debtAmount },
      async (tx) => {
        await this.deposit(tx, account, asset, collateralAmount);
        await this.mint(tx, account, debtAmount);
      },
    );
  }

  /** Repay `amount` of the account's own debt with its debt tokens. */
  burnDebt(account: AccountId, amount: bigint): Promise<void> {
    return this.execute("burnDebt", { account, amount }, async (tx) => {
      await this.burn(tx, account, account, amount);
    });
  }

  /** Withdraw collateral back to `account`; the account must stay solvent. */
  redeemCollateral(account: AccountId, asset: AssetId, amount: bigint): Promise<void> {
    return this.execute("redeemCollateral", { account, asset, amount }, async (tx) => {
      await this.redeem(tx, asset, account, account, amount);
    });
  }

  redeemAndBurn(
    account: AccountId,
    asset: AssetId,
    collateralAmount: bigint,
    debtAmount: bigint,
  ): Promise<void> {
    return this.execute(
      "redeemAndBurn",
      { account, asset, collateralAmount, debtAmount },
      async (tx) => {
        await this.burn(tx, account, account, debtAmount);
        await this.redeem(tx, asset, account, account, collateralAmount);
      },
    );
  }

  /**
   * Repay `debtToCover` of an undercollateralized account's debt and receive
   * the equivalent amount of `asset` plus the liquidation bonus.
   *
   * The target's health factor must strictly improve and the liquidator must
   * be solvent afterwards. If the target's collateral is worth less than the
   * debt plus bonus, no liquidation can improve it; there is no insurance
   * fund to cover the gap.
   */
  liquidate(
    liquidator: AccountId,
    target: AccountId,
    asset: AssetId,
    debtToCover: bigint,
  ): Promise<LiquidationReceipt> {
    return this.execute("liquidate", { liquidator, target, asset, debtToCover }, async (tx) => {
      requirePositive("debtToCover", debtToCover);
      this.registry.get(asset);

      const startHealthFactor = await this.guard.healthFactor(target);
      if (startHealthFactor >= this.params.minHealthFactor) {
        throw new HealthFactorOkError(target, startHealthFactor);
      }

      const collateralSeized = await this.valuation.assetAmountForUsd(asset, debtToCover);
      const bonusCollateral = percentOf(collateralSeized, this.params.liquidationBonusPct);
      const totalSeized = collateralSeized + bonusCollateral;

      tx.removeCollateral(target, asset, totalSeized);
      tx.removeDebt(target, debtToCover);

      const endHealthFactor = await this.guard.healthFactor(target);
      if (endHealthFactor <= startHealthFactor) {
        throw new HealthFactorNotImprovedError(target, startHealthFactor, endHealthFactor);
      }
      await this.guard.assertSolvent(liquidator);

      await this.collectAndBurn(tx, target, liquidator, debtToCover);
      await this.payOut(tx, asset, target, liquidator, totalSeized);

      const receipt: LiquidationReceipt = {
        liquidator,
        target,
        asset,
        debtCovered: debtToCover,
        collateralSeized,
        bonusCollateral,
        startHealthFactor,
        endHealthFactor,
      };
      tx.afterCommit(() => {
        this.logger.info(
          { liquidator, target, asset, debtToCover, totalSeized },
          "Account liquidated",
        );
        this.events.emitLiquidated(receipt);
      });
      return receipt;
    });
  }

  // === Queries ===

  getAccountInformation(account: AccountId): Promise<AccountInformation> {
    return this.lock.run("getAccountInformation", async () => ({
      debt: this.debt.debtOf(account),
      collateralUsd: await this.valuation.totalCollateralUsd(this.collateral.balancesOf(account)),
    }));
  }

  getCollateralBalance(account: AccountId, asset: AssetId): Promise<bigint> {
    return this.lock.run("getCollateralBalance", async () => {
      this.registry.get(asset);
      return this.collateral.balanceOf(account, asset);
    });
  }

  getAccountCollateralUsd(account: AccountId): Promise<bigint> {
    return this.lock.run("getAccountCollateralUsd", () =>
      this.valuation.totalCollateralUsd(this.collateral.balancesOf(account)),
    );
  }

  getDebt(account: AccountId): Promise<bigint> {
    return this.lock.run("getDebt", async () => this.debt.debtOf(account));
  }

  getHealthFactor(account: AccountId): Promise<bigint> {
    return this.lock.run("getHealthFactor", () => this.guard.healthFactor(account));
  }

  /** Totals across every account. */
  getSystemSummary(): Promise<SystemSummary> {
    return this.lock.run("getSystemSummary", async () => {
      const assets: SystemSummary["assets"] = [];
      let totalCollateralUsd = 0n;
      for (const asset of this.registry.ids()) {
        const deposited = this.collateral.totalOf(asset);
        const usdValue = deposited === 0n ? 0n : await this.valuation.usdValue(asset, deposited);
        assets.push({ asset, deposited, usdValue });
        totalCollateralUsd += usdValue;
      }
      const totalDebt = this.debt.totalDebt;
      return {
        assets,
        totalCollateralUsd,
        totalDebt,
        collateralizationRatio:
          totalDebt === 0n ? null : mulDiv(totalCollateralUsd, WAD, totalDebt),
      };
    });
  }

  /** USD value (18 decimals) of `amount` of `asset` at the current price. */
  getUsdValue(asset: AssetId, amount: bigint): Promise<bigint> {
    return this.valuation.usdValue(asset, amount);
  }

  /** Amount of `asset` worth `usd` (18 decimals) at the current price. */
  getAssetAmountFromUsd(asset: AssetId, usd: bigint): Promise<bigint> {
    return this.valuation.assetAmountForUsd(asset, usd);
  }

  calculateHealthFactor(debt: bigint, collateralUsd: bigint): bigint {
    return calculateHealthFactor(debt, collateralUsd, this.params.liquidationThresholdPct);
  }

  getSupportedAssets(): AssetId[] {
    return this.registry.ids();
  }

  getParams(): ProtocolParams {
    return { ...this.params };
  }

  // === Steps ===

  private async deposit(
    tx: LedgerTransaction,
    account: AccountId,
    asset: AssetId,
    amount: bigint,
  ): Promise<void> {
    requirePositive("amount", amount);
    const { token } = this.registry.get(asset);

    tx.addCollateral(account, asset, amount);
    await this.pull(token, asset, account, amount);
    tx.compensate(`refund ${asset} to ${account}`, () => this.push(token, asset, account, amount));
    tx.afterCommit(() => this.events.emitCollateralDeposited({ account, asset, amount }));
  }

  /** The solvency check runs before the tokens exist, so nothing needs undoing after a mint. */
  private async mint(tx: LedgerTransaction, account: AccountId, amount: bigint): Promise<void> {
    requirePositive("amount", amount);

    tx.addDebt(account, amount);
    await this.guard.assertSolvent(account);

    let minted: boolean;
    try {
      minted = await this.debtToken.mint(account, amount);
    } catch (error) {
      throw new MintFailedError(account, amount, error);
    }
    if (!minted) throw new MintFailedError(account, amount);
    tx.afterCommit(() => this.events.emitDebtMinted({ account, amount }));
  }

  private async burn(
    tx: LedgerTransaction,
    onBehalfOf: AccountId,
    payer: AccountId,
    amount: bigint,
  ): Promise<void> {
    requirePositive("amount", amount);

    tx.removeDebt(onBehalfOf, amount);
    await this.guard.assertSolvent(onBehalfOf);
    await this.collectAndBurn(tx, onBehalfOf, payer, amount);
  }

  private async redeem(
    tx: LedgerTransaction,
    asset: AssetId,
    from: AccountId,
    to: AccountId,
    amount: bigint,
  ): Promise<void> {
    requirePositive("amount", amount);
    this.registry.get(asset);

    tx.removeCollateral(from, asset, amount);
    await this.guard.assertSolvent(from);
    await this.payOut(tx, asset, from, to, amount);
  }

  /**
   * Pull debt tokens from `payer` and destroy them. If a later step fails the
   * burned tokens are re-minted to the engine and handed back.
   */
  private async collectAndBurn(
    tx: LedgerTransaction,
    onBehalfOf: AccountId,
    payer: AccountId,
    amount: bigint,
  ): Promise<void> {
    await this.pull(this.debtToken, DEBT_TOKEN_LABEL, payer, amount);
    tx.compensate(`return debt tokens to ${payer}`, () =>
      this.push(this.debtToken, DEBT_TOKEN_LABEL, payer, amount),
    );

    try {
      await this.debtToken.burn(amount);
    } catch (error) {
      throw new TransferFailedError(DEBT_TOKEN_LABEL, "burn", error);
    }
    tx.compensate(`re-mint burned debt tokens`, async () => {
      const minted = await this.debtToken.mint(this.engineId, amount);
      if (!minted) throw new MintFailedError(this.engineId, amount);
    });

    tx.afterCommit(() => this.events.emitDebtBurned({ onBehalfOf, payer, amount }));
  }

  /**
   * Send collateral out of the engine. An outgoing transfer cannot be pulled
   * back, so callers make this their last external call.
   */
  private async payOut(
    tx: LedgerTransaction,
    asset: AssetId,
    from: AccountId,
    to: AccountId,
    amount: bigint,
  ): Promise<void> {
    const { token } = this.registry.get(asset);
    await this.push(token, asset, to, amount);
    tx.afterCommit(() => this.events.emitCollateralRedeemed({ from, to, asset, amount }));
  }

  // === Plumbing ===

  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    body: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T> {
    const { result, effects } = await this.lock.run(operation, async () => {
      const tx = new LedgerTransaction(this.collateral, this.debt);
      try {
        const value = await body(tx);
        return { result: value, effects: tx.commit() };
      } catch (error) {
        const failures = await tx.rollback(this.logger);
        this.logger.warn(
          { operation, ...context, error, compensationFailures: failures.length },
          "Operation rolled back",
        );
        throw error;
      }
    });

    this.logger.debug({ operation, ...context }, "Operation committed");
    // outside the lock, so listeners may call back into the engine
    for (const effect of effects) effect();
    return result;
  }

  private async pull(
    token: TransferableAsset,
    label: string,
    from: AccountId,
    amount: bigint,
  ): Promise<void> {
    let ok: boolean;
    try {
      ok = await token.transferFrom(from, this.engineId, amount);
    } catch (error) {
      throw new TransferFailedError(label, "transferFrom", error);
    }
    if (!ok) throw new TransferFailedError(label, "transferFrom");
  }

  private async push(
    token: TransferableAsset,
    label: string,
    to: AccountId,
    amount: bigint,
  ): Promise<void> {
    let ok: boolean;
    try {
      ok = await token.transfer(to, amount);
    } catch (error) {
      throw new TransferFailedError(label, "transfer", error);
    }
    if (!ok) throw new TransferFailedError(label, "transfer");
  }
}

function requirePositive(field: string, amount: bigint): void {
  if (amount <= 0n) throw new InvalidAmountError(field, amount);
}
