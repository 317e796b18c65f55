import { WAD } from "./utils/math.js";
import { InvalidConfigError } from "./utils/errors.js";

/** Protocol constants. Fixed for the lifetime of an engine. */
export interface ProtocolParams {
  /**
   * Share of collateral value (in percent) that counts towards backing debt.
   * 50 means positions must stay 200% overcollateralized.
   */
  liquidationThresholdPct: bigint;
  /** Extra collateral (in percent of the seized amount) paid to liquidators. */
  liquidationBonusPct: bigint;
  /** Health factor below which an account can be liquidated. 18 decimals. */
  minHealthFactor: bigint;
  /** Oracle quotes older than this are rejected. */
  priceTimeoutSeconds: number;
}

export const DEFAULT_PARAMS: ProtocolParams = {
  liquidationThresholdPct: 50n,
  liquidationBonusPct: 10n,
  minHealthFactor: WAD,
  priceTimeoutSeconds: 3 * 60 * 60,
};

/** Current unix time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface StableEngineConfig {
  /** Identity the engine uses when pulling and holding tokens. Default: "stable-engine". */
  engineId?: string;

  /** Overrides for the protocol constants. */
  params?: Partial<ProtocolParams>;

  /** Time source for staleness checks. Default: wall clock. */
  clock?: Clock;

  /** Log level. Default: "info". */
  logLevel?: "debug" | "info" | "warn" | "error" | "silent";

  /** Pretty-print logs. Default: false. */
  prettyLogs?: boolean;
}

export const DEFAULT_ENGINE_ID = "stable-engine";

/**
 * Merge overrides onto the defaults and reject values the health-factor
 * arithmetic cannot work with.
 */
export function resolveParams(overrides: Partial<ProtocolParams> = {}): ProtocolParams {
  const params: ProtocolParams = { ...DEFAULT_PARAMS, ...overrides };

  if (params.liquidationThresholdPct <= 0n || params.liquidationThresholdPct > 100n) {
    throw new InvalidConfigError(
      `liquidationThresholdPct ${params.liquidationThresholdPct} out of range (1-100)`,
    );
  }
  if (params.liquidationBonusPct < 0n || params.liquidationBonusPct > 100n) {
    throw new InvalidConfigError(
      `liquidationBonusPct ${params.liquidationBonusPct} out of range (0-100)`,
    );
  }
  if (params.minHealthFactor <= 0n) {
    throw new InvalidConfigError("minHealthFactor must be positive");
  }
  if (!Number.isInteger(params.priceTimeoutSeconds) || params.priceTimeoutSeconds <= 0) {
    throw new InvalidConfigError(
      `priceTimeoutSeconds ${params.priceTimeoutSeconds} must be a positive integer`,
    );
  }

  return params;
}
