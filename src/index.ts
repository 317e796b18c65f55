export { AccountingEngine, DEBT_TOKEN_LABEL } from "./engine/engine.js";
export type { EngineDependencies } from "./engine/engine.js";
export { EngineEvents } from "./engine/events.js";
export type {
  CollateralDepositedEvent,
  CollateralRedeemedEvent,
  DebtMintedEvent,
  DebtBurnedEvent,
} from "./engine/events.js";
export { OperationLock } from "./engine/lock.js";
export type { LiquidationReceipt, SystemSummary, AssetSummary } from "./engine/types.js";
export { SolvencyGuard, calculateHealthFactor, HEALTH_FACTOR_MAX } from "./solvency/guard.js";
export { ValuationService } from "./valuation/service.js";
export { AssetRegistry } from "./valuation/registry.js";
export type { CollateralAsset } from "./valuation/registry.js";
export { CollateralLedger } from "./ledger/collateral.js";
export { DebtLedger } from "./ledger/debt.js";
export { LedgerTransaction } from "./ledger/transaction.js";
export type { RollbackFailure } from "./ledger/transaction.js";
export type { AccountId, AssetId, AccountInformation, CollateralBalances } from "./ledger/types.js";
export { StalenessCheckedOracle } from "./oracle/staleness.js";
export { MutablePriceFeed } from "./oracle/memory.js";
export type { PriceOracle, PriceQuote } from "./oracle/types.js";
export { InMemoryToken, InMemoryStablecoin } from "./token/memory.js";
export type { TransferableAsset, DebtToken } from "./token/types.js";
export { createSandbox } from "./sandbox.js";
export type { Sandbox, SandboxAsset } from "./sandbox.js";
export { DEFAULT_PARAMS, DEFAULT_ENGINE_ID, resolveParams, systemClock } from "./config.js";
export type { ProtocolParams, StableEngineConfig, Clock } from "./config.js";
export { createLogger } from "./logging/logger.js";
export type { Logger, LoggerOptions } from "./logging/logger.js";
export { WAD, USD_DECIMALS, mulDiv, percentOf, pow10, toFixed, fromFixed } from "./utils/math.js";
export {
  StableEngineError,
  InvalidAmountError,
  UnsupportedAssetError,
  TransferFailedError,
  MintFailedError,
  HealthFactorBrokenError,
  HealthFactorOkError,
  HealthFactorNotImprovedError,
  StalePriceError,
  InvalidPriceError,
  InsufficientCollateralError,
  InsufficientDebtError,
  ReentrantCallError,
  InvalidConfigError,
  TokenError,
} from "./utils/errors.js";
export type { TransferOperation } from "./utils/errors.js";
