import type { ProtocolParams } from "../config.js";
import type { AccountId, AssetId } from "../ledger/types.js";
import type { Logger } from "../logging/logger.js";
import { createSandbox } from "../sandbox.js";
import type { Sandbox, SandboxAsset } from "../sandbox.js";
import { HEALTH_FACTOR_MAX } from "../solvency/guard.js";
import { StableEngineError } from "../utils/errors.js";
import { toFixed, USD_DECIMALS } from "../utils/math.js";

export class InvalidScenarioError extends StableEngineError {
  constructor(public readonly path: string, message: string) {
    super(`Invalid scenario at ${path}: ${message}`);
    this.name = "InvalidScenarioError";
  }
}

export type ScenarioStep =
  | { op: "deposit"; account: AccountId; asset: AssetId; amount: string }
  | { op: "mint"; account: AccountId; amount: string }
  | { op: "depositAndMint"; account: AccountId; asset: AssetId; collateral: string; debt: string }
  | { op: "burn"; account: AccountId; amount: string }
  | { op: "redeem"; account: AccountId; asset: AssetId; amount: string }
  | { op: "redeemAndBurn"; account: AccountId; asset: AssetId; collateral: string; debt: string }
  | { op: "liquidate"; liquidator: AccountId; target: AccountId; asset: AssetId; debt: string }
  | { op: "transferDebt"; from: AccountId; to: AccountId; amount: string }
  | { op: "setPrice"; asset: AssetId; price: string }
  | { op: "advance"; seconds: number };

export type StepExpectation = "ok" | string;

export interface ScenarioAsset {
  id: AssetId;
  decimals: number;
  priceDecimals: number;
  price: string;
}

export interface Scenario {
  startTime: number;
  params?: Partial<ProtocolParams>;
  assets: ScenarioAsset[];
  balances: { account: AccountId; asset: AssetId; amount: string }[];
  steps: (ScenarioStep & { expect?: StepExpectation })[];
}

export interface StepOutcome {
  index: number;
  op: ScenarioStep["op"];
  ok: boolean;
  /** Error class name when the step failed. */
  error?: string;
  message?: string;
  /** Set when the step carried an `expect` that did not match. */
  mismatch?: string;
}

export interface AccountReport {
  account: AccountId;
  debt: bigint;
  collateralUsd: bigint;
  healthFactor: bigint | null;
}

export interface ScenarioReport {
  outcomes: StepOutcome[];
  accounts: AccountReport[];
  mismatches: number;
}

// ── Parsing ──

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(obj: Json, key: string, path: string): unknown {
  if (!(key in obj)) throw new InvalidScenarioError(`${path}.${key}`, "missing");
  return obj[key];
}

function str(obj: Json, key: string, path: string): string {
  const value = field(obj, key, path);
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidScenarioError(`${path}.${key}`, "expected a non-empty string");
  }
  return value;
}

function decimal(obj: Json, key: string, path: string): string {
  const value = str(obj, key, path);
  if (!/^\d+(\.\d+)?$/.test(value)) {
    throw new InvalidScenarioError(`${path}.${key}`, `expected a decimal amount, got "${value}"`);
  }
  return value;
}

function int(obj: Json, key: string, path: string): number {
  const value = field(obj, key, path);
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InvalidScenarioError(`${path}.${key}`, "expected a non-negative integer");
  }
  return value;
}

function array(obj: Json, key: string, path: string): unknown[] {
  const value = obj[key] ?? [];
  if (!Array.isArray(value)) throw new InvalidScenarioError(`${path}.${key}`, "expected an array");
  return value;
}

function object(value: unknown, path: string): Json {
  if (!isObject(value)) throw new InvalidScenarioError(path, "expected an object");
  return value;
}

function parseParams(raw: unknown): Partial<ProtocolParams> | undefined {
  if (raw === undefined) return undefined;
  const obj = object(raw, "params");
  const params: Partial<ProtocolParams> = {};
  if ("liquidationThresholdPct" in obj) {
    params.liquidationThresholdPct = BigInt(int(obj, "liquidationThresholdPct", "params"));
  }
  if ("liquidationBonusPct" in obj) {
    params.liquidationBonusPct = BigInt(int(obj, "liquidationBonusPct", "params"));
  }
  if ("minHealthFactor" in obj) {
    params.minHealthFactor = toFixed(decimal(obj, "minHealthFactor", "params"), USD_DECIMALS);
  }
  if ("priceTimeoutSeconds" in obj) {
    params.priceTimeoutSeconds = int(obj, "priceTimeoutSeconds", "params");
  }
  return params;
}

function parseStep(raw: unknown, path: string): ScenarioStep & { expect?: StepExpectation } {
  const obj = object(raw, path);
  const expect = obj.expect === undefined ? undefined : str(obj, "expect", path);
  const op = str(obj, "op", path);
  const step = ((): ScenarioStep => {
    switch (op) {
      case "deposit":
      case "redeem":
        return { op, account: str(obj, "account", path), asset: str(obj, "asset", path), amount: decimal(obj, "amount", path) };
      case "mint":
      case "burn":
        return { op, account: str(obj, "account", path), amount: decimal(obj, "amount", path) };
      case "depositAndMint":
      case "redeemAndBurn":
        return {
          op,
          account: str(obj, "account", path),
          asset: str(obj, "asset", path),
          collateral: decimal(obj, "collateral", path),
          debt: decimal(obj, "debt", path),
        };
      case "liquidate":
        return {
          op,
          liquidator: str(obj, "liquidator", path),
          target: str(obj, "target", path),
          asset: str(obj, "asset", path),
          debt: decimal(obj, "debt", path),
        };
      case "transferDebt":
        return { op, from: str(obj, "from", path), to: str(obj, "to", path), amount: decimal(obj, "amount", path) };
      case "setPrice":
        return { op, asset: str(obj, "asset", path), price: decimal(obj, "price", path) };
      case "advance":
        return { op, seconds: int(obj, "seconds", path) };
      default:
        throw new InvalidScenarioError(`${path}.op`, `unknown operation "${op}"`);
    }
  })();
  return expect === undefined ? step : { ...step, expect };
}

export function parseScenario(raw: unknown): Scenario {
  const root = object(raw, "scenario");
  const assets = array(root, "assets", "scenario").map((entry, i) => {
    const path = `assets[${i}]`;
    const obj = object(entry, path);
    return {
      id: str(obj, "id", path),
      decimals: int(obj, "decimals", path),
      priceDecimals: int(obj, "priceDecimals", path),
      price: decimal(obj, "price", path),
    };
  });
  if (assets.length === 0) throw new InvalidScenarioError("scenario.assets", "at least one asset is required");

  const balances = array(root, "balances", "scenario").map((entry, i) => {
    const path = `balances[${i}]`;
    const obj = object(entry, path);
    return { account: str(obj, "account", path), asset: str(obj, "asset", path), amount: decimal(obj, "amount", path) };
  });

  return {
    startTime: int(root, "startTime", "scenario"),
    params: parseParams(root.params),
    assets,
    balances,
    steps: array(root, "steps", "scenario").map((step, i) => parseStep(step, `steps[${i}]`)),
  };
}

// ── Running ──

/**
 * Replay a scenario against a fresh sandbox. Failing steps are recorded and
 * the run continues; a step whose `expect` does not match counts as a mismatch.
 */
export async function runScenario(scenario: Scenario, logger?: Logger): Promise<ScenarioReport> {
  let now = scenario.startTime;
  const assetsById = new Map(scenario.assets.map((a) => [a.id, a]));
  const assets: SandboxAsset[] = scenario.assets.map((a) => ({
    id: a.id,
    decimals: a.decimals,
    priceDecimals: a.priceDecimals,
    price: toFixed(a.price, a.priceDecimals),
  }));
  const sandbox = createSandbox(assets, { params: scenario.params, clock: () => now }, logger);

  const units = (asset: AssetId, amount: string): bigint => {
    const definition = assetsById.get(asset);
    // unknown assets still reach the engine so it can reject them
    return toFixed(amount, definition?.decimals ?? USD_DECIMALS);
  };
  const usd = (amount: string): bigint => toFixed(amount, USD_DECIMALS);

  for (const balance of scenario.balances) {
    if (!assetsById.has(balance.asset)) {
      throw new InvalidScenarioError("balances", `unknown asset ${balance.asset}`);
    }
    sandbox.fund(balance.account, balance.asset, units(balance.asset, balance.amount));
  }

  const accounts = new Set<AccountId>();
  const outcomes: StepOutcome[] = [];

  for (const [index, step] of scenario.steps.entries()) {
    let outcome: StepOutcome;
    try {
      await applyStep(sandbox, step, {
        assets: assetsById,
        units,
        usd,
        accounts,
        advance: (seconds) => {
          now += seconds;
        },
        now: () => now,
      });
      outcome = { index, op: step.op, ok: true };
    } catch (error) {
      if (!(error instanceof StableEngineError)) throw error;
      outcome = { index, op: step.op, ok: false, error: error.name, message: error.message };
    }

    if (step.expect !== undefined) {
      const actual = outcome.ok ? "ok" : outcome.error;
      if (actual !== step.expect) {
        outcome.mismatch = `expected ${step.expect}, got ${actual}`;
      }
    }
    outcomes.push(outcome);
  }

  const reports: AccountReport[] = [];
  for (const account of accounts) {
    const info = await sandbox.engine.getAccountInformation(account);
    const healthFactor = await sandbox.engine.getHealthFactor(account);
    reports.push({
      account,
      debt: info.debt,
      collateralUsd: info.collateralUsd,
      healthFactor: healthFactor === HEALTH_FACTOR_MAX ? null : healthFactor,
    });
  }

  return {
    outcomes,
    accounts: reports,
    mismatches: outcomes.filter((o) => o.mismatch !== undefined).length,
  };
}

interface StepContext {
  assets: ReadonlyMap<AssetId, ScenarioAsset>;
  units: (asset: AssetId, amount: string) => bigint;
  usd: (amount: string) => bigint;
  accounts: Set<AccountId>;
  advance: (seconds: number) => void;
  now: () => number;
}

async function applyStep(sandbox: Sandbox, step: ScenarioStep, ctx: StepContext): Promise<void> {
  const { engine } = sandbox;
  switch (step.op) {
    case "deposit":
      ctx.accounts.add(step.account);
      return engine.depositCollateral(step.account, step.asset, ctx.units(step.asset, step.amount));
    case "mint":
      ctx.accounts.add(step.account);
      return engine.mintDebt(step.account, ctx.usd(step.amount));
    case "depositAndMint":
      ctx.accounts.add(step.account);
      return engine.depositAndMint(
        step.account,
        step.asset,
        ctx.units(step.asset, step.collateral),
        ctx.usd(step.debt),
      );
    case "burn":
      ctx.accounts.add(step.account);
      return sandbox.withDebtAllowance(step.account, ctx.usd(step.amount), () =>
        engine.burnDebt(step.account, ctx.usd(step.amount)),
      );
    case "redeem":
      ctx.accounts.add(step.account);
      return engine.redeemCollateral(step.account, step.asset, ctx.units(step.asset, step.amount));
    case "redeemAndBurn":
      ctx.accounts.add(step.account);
      return sandbox.withDebtAllowance(step.account, ctx.usd(step.debt), () =>
        engine.redeemAndBurn(
          step.account,
          step.asset,
          ctx.units(step.asset, step.collateral),
          ctx.usd(step.debt),
        ),
      );
    case "liquidate":
      ctx.accounts.add(step.target);
      ctx.accounts.add(step.liquidator);
      await sandbox.withDebtAllowance(step.liquidator, ctx.usd(step.debt), () =>
        engine.liquidate(step.liquidator, step.target, step.asset, ctx.usd(step.debt)),
      );
      return;
    case "transferDebt": {
      const moved = await sandbox.stablecoin.connect(step.from).transfer(step.to, ctx.usd(step.amount));
      if (!moved) {
        throw new InvalidScenarioError("transferDebt", `${step.from} cannot send ${step.amount}`);
      }
      return;
    }
    case "setPrice": {
      const feed = sandbox.feeds.get(step.asset);
      const definition = ctx.assets.get(step.asset);
      if (!feed || !definition) throw new InvalidScenarioError("setPrice", `unknown asset ${step.asset}`);
      feed.setPrice(toFixed(step.price, definition.priceDecimals), ctx.now());
      return;
    }
    case "advance":
      ctx.advance(step.seconds);
      return;
  }
}
