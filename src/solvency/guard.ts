import type { ProtocolParams } from "../config.js";
import type { CollateralLedger } from "../ledger/collateral.js";
import type { DebtLedger } from "../ledger/debt.js";
import type { AccountId } from "../ledger/types.js";
import { HealthFactorBrokenError } from "../utils/errors.js";
import { percentOf, WAD } from "../utils/math.js";
import type { ValuationService } from "../valuation/service.js";

/** Health factor of an account without debt. */
export const HEALTH_FACTOR_MAX = 2n ** 256n - 1n;

export function calculateHealthFactor(
  debt: bigint,
  collateralUsd: bigint,
  liquidationThresholdPct: bigint,
): bigint {
  if (debt === 0n) return HEALTH_FACTOR_MAX;
  const adjusted = percentOf(collateralUsd, liquidationThresholdPct);
  return (adjusted * WAD) / debt;
}

export class SolvencyGuard {
  constructor(
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly valuation: ValuationService,
    private readonly params: ProtocolParams,
  ) {}

  /**
   * Reads the ledgers as they are right now, including uncommitted writes of
   * the running operation. Accounts without debt short-circuit to
   * HEALTH_FACTOR_MAX and need no prices.
   */
  async healthFactor(account: AccountId): Promise<bigint> {
    const debt = this.debt.debtOf(account);
    if (debt === 0n) return HEALTH_FACTOR_MAX;
    const collateralUsd = await this.valuation.totalCollateralUsd(
      this.collateral.balancesOf(account),
    );
    return calculateHealthFactor(debt, collateralUsd, this.params.liquidationThresholdPct);
  }

  async assertSolvent(account: AccountId): Promise<void> {
    const healthFactor = await this.healthFactor(account);
    if (healthFactor < this.params.minHealthFactor) {
      throw new HealthFactorBrokenError(account, healthFactor);
    }
  }
}
