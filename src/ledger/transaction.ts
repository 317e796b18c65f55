import type { Logger } from "../logging/logger.js";
import { InsufficientCollateralError, InsufficientDebtError } from "../utils/errors.js";
import type { CollateralLedger } from "./collateral.js";
import type { DebtLedger } from "./debt.js";
import type { AccountId, AssetId } from "./types.js";

interface UndoStep {
  label: string;
  undo: () => void | Promise<void>;
}

export interface RollbackFailure {
  label: string;
  error: unknown;
}

/**
 * Unit of work over both ledgers. Every write records how to restore the
 * previous value; completed external calls register a compensation. On
 * rollback the journal is replayed newest first.
 */
export class LedgerTransaction {
  private journal: UndoStep[] = [];
  private committed: (() => void)[] = [];
  private closed = false;

  constructor(
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
  ) {}

  addCollateral(account: AccountId, asset: AssetId, amount: bigint): void {
    this.ensureOpen();
    const before = this.collateral.balanceOf(account, asset);
    this.collateral.set(account, asset, before + amount);
    this.record(`collateral ${account}/${asset}`, () => this.collateral.set(account, asset, before));
  }

  removeCollateral(account: AccountId, asset: AssetId, amount: bigint): void {
    this.ensureOpen();
    const before = this.collateral.balanceOf(account, asset);
    if (before < amount) {
      throw new InsufficientCollateralError(account, asset, amount, before);
    }
    this.collateral.set(account, asset, before - amount);
    this.record(`collateral ${account}/${asset}`, () => this.collateral.set(account, asset, before));
  }

  addDebt(account: AccountId, amount: bigint): void {
    this.ensureOpen();
    const before = this.debt.debtOf(account);
    this.debt.set(account, before + amount);
    this.record(`debt ${account}`, () => this.debt.set(account, before));
  }

  removeDebt(account: AccountId, amount: bigint): void {
    this.ensureOpen();
    const before = this.debt.debtOf(account);
    if (before < amount) {
      throw new InsufficientDebtError(account, amount, before);
    }
    this.debt.set(account, before - amount);
    this.record(`debt ${account}`, () => this.debt.set(account, before));
  }

  /** Register the inverse of an external call that has already succeeded. */
  compensate(label: string, undo: () => Promise<void>): void {
    this.ensureOpen();
    this.record(label, undo);
  }

  /** Defer `effect` until the transaction has committed. */
  afterCommit(effect: () => void): void {
    this.ensureOpen();
    this.committed.push(effect);
  }

  /** Close the transaction and hand back the deferred effects. */
  commit(): (() => void)[] {
    this.close();
    this.journal = [];
    const effects = this.committed;
    this.committed = [];
    return effects;
  }

  /**
   * Undo everything, newest first. Ledger restores cannot fail; a failing
   * compensation does not stop the remaining steps and is reported back.
   */
  async rollback(logger: Logger): Promise<RollbackFailure[]> {
    this.close();
    const failures: RollbackFailure[] = [];
    const steps = this.journal.reverse();
    this.journal = [];
    this.committed = [];

    for (const step of steps) {
      try {
        await step.undo();
      } catch (error) {
        logger.error({ step: step.label, error }, "Compensation failed during rollback");
        failures.push({ label: step.label, error });
      }
    }
    return failures;
  }

  private record(label: string, undo: () => void | Promise<void>): void {
    this.journal.push({ label, undo });
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error("Transaction already closed");
  }

  private close(): void {
    this.ensureOpen();
    this.closed = true;
  }
}
