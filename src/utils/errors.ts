export class StableEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StableEngineError";
  }
}

export class InvalidAmountError extends StableEngineError {
  constructor(
    public readonly field: string,
    public readonly amount: bigint,
  ) {
    super(`${field} must be more than zero (got ${amount})`);
    this.name = "InvalidAmountError";
  }
}

export class UnsupportedAssetError extends StableEngineError {
  constructor(public readonly asset: string) {
    super(`Asset ${asset} is not allowed as collateral`);
    this.name = "UnsupportedAssetError";
  }
}

export type TransferOperation = "transfer" | "transferFrom" | "burn";

export class TransferFailedError extends StableEngineError {
  constructor(
    public readonly asset: string,
    public readonly operation: TransferOperation,
    public readonly raw?: unknown,
  ) {
    super(`${operation} of ${asset} failed${describeRaw(raw)}`);
    this.name = "TransferFailedError";
  }
}

export class MintFailedError extends StableEngineError {
  constructor(
    public readonly recipient: string,
    public readonly amount: bigint,
    public readonly raw?: unknown,
  ) {
    super(`Minting ${amount} to ${recipient} failed${describeRaw(raw)}`);
    this.name = "MintFailedError";
  }
}

export class HealthFactorBrokenError extends StableEngineError {
  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(`Health factor of ${account} is broken: ${healthFactor}`);
    this.name = "HealthFactorBrokenError";
  }
}

export class HealthFactorOkError extends StableEngineError {
  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(`Account ${account} is not liquidatable (health factor ${healthFactor})`);
    this.name = "HealthFactorOkError";
  }
}

export class HealthFactorNotImprovedError extends StableEngineError {
  constructor(
    public readonly account: string,
    public readonly startHealthFactor: bigint,
    public readonly endHealthFactor: bigint,
  ) {
    super(
      `Liquidation of ${account} did not improve its health factor (${startHealthFactor} -> ${endHealthFactor})`,
    );
    this.name = "HealthFactorNotImprovedError";
  }
}

export class StalePriceError extends StableEngineError {
  constructor(
    public readonly asset: string,
    public readonly updatedAt: number,
    public readonly now: number,
  ) {
    super(`Price for ${asset} is stale (updated at ${updatedAt}, now ${now})`);
    this.name = "StalePriceError";
  }
}

export class InvalidPriceError extends StableEngineError {
  constructor(
    public readonly asset: string,
    public readonly price: bigint,
  ) {
    super(`Oracle returned a non-positive price for ${asset}: ${price}`);
    this.name = "InvalidPriceError";
  }
}

export class InsufficientCollateralError extends StableEngineError {
  constructor(
    public readonly account: string,
    public readonly asset: string,
    public readonly requested: bigint,
    public readonly available: bigint,
  ) {
    super(
      `Account ${account} holds ${available} ${asset}, cannot remove ${requested}`,
    );
    this.name = "InsufficientCollateralError";
  }
}

export class InsufficientDebtError extends StableEngineError {
  constructor(
    public readonly account: string,
    public readonly requested: bigint,
    public readonly outstanding: bigint,
  ) {
    super(
      `Account ${account} owes ${outstanding}, cannot repay ${requested}`,
    );
    this.name = "InsufficientDebtError";
  }
}

export class ReentrantCallError extends StableEngineError {
  constructor(public readonly operation: string) {
    super(`Re-entrant call to ${operation} while another engine operation is running`);
    this.name = "ReentrantCallError";
  }
}

export class InvalidConfigError extends StableEngineError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

export class TokenError extends StableEngineError {
  constructor(
    public readonly symbol: string,
    message: string,
  ) {
    super(`${symbol}: ${message}`);
    this.name = "TokenError";
  }
}

function describeRaw(raw: unknown): string {
  if (raw === undefined) return "";
  return `: ${raw instanceof Error ? raw.message : String(raw)}`;
}
