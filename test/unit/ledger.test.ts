import { describe, it, expect, vi, beforeEach } from "vitest";
import { CollateralLedger } from "../../src/ledger/collateral.js";
import { DebtLedger } from "../../src/ledger/debt.js";
import { LedgerTransaction } from "../../src/ledger/transaction.js";
import { createLogger } from "../../src/logging/logger.js";
import { InsufficientCollateralError, InsufficientDebtError } from "../../src/utils/errors.js";
import { silentLogger, UNIT } from "../fixtures/engine.js";

describe("CollateralLedger", () => {
  it("drops an account once its last balance returns to zero", () => {
    const ledger = new CollateralLedger();
    ledger.set("alice", "WETH", UNIT);
    ledger.set("alice", "WBTC", 5n);

    ledger.set("alice", "WETH", 0n);
    expect([...ledger.balancesOf("alice")]).toEqual([["WBTC", 5n]]);

    ledger.set("alice", "WBTC", 0n);
    expect(ledger.balancesOf("alice").size).toBe(0);
  });

  it("sums an asset across accounts", () => {
    const ledger = new CollateralLedger();
    ledger.set("alice", "WETH", UNIT);
    ledger.set("bob", "WETH", 2n * UNIT);
    ledger.set("bob", "WBTC", 7n);

    expect(ledger.totalOf("WETH")).toBe(3n * UNIT);
    expect(ledger.totalOf("WBTC")).toBe(7n);
    expect(ledger.totalOf("DOGE")).toBe(0n);
  });

  it("refuses a negative balance", () => {
    expect(() => new CollateralLedger().set("alice", "WETH", -1n)).toThrow(RangeError);
  });
});

describe("DebtLedger", () => {
  it("tracks total debt", () => {
    const ledger = new DebtLedger();
    ledger.set("alice", 100n);
    ledger.set("bob", 50n);
    ledger.set("alice", 0n);

    expect(ledger.totalDebt).toBe(50n);
    expect(ledger.debtOf("alice")).toBe(0n);
    expect(ledger.debtOf("bob")).toBe(50n);
  });

  it("refuses negative debt", () => {
    expect(() => new DebtLedger().set("alice", -1n)).toThrow("Negative debt for alice: -1");
  });
});

describe("LedgerTransaction", () => {
  let collateral: CollateralLedger;
  let debt: DebtLedger;
  let tx: LedgerTransaction;

  beforeEach(() => {
    collateral = new CollateralLedger();
    debt = new DebtLedger();
    collateral.set("alice", "WETH", 10n);
    debt.set("alice", 100n);
    tx = new LedgerTransaction(collateral, debt);
  });

  it("applies writes immediately and keeps them on commit", () => {
    tx.addCollateral("alice", "WETH", 5n);
    tx.removeDebt("alice", 40n);
    expect(collateral.balanceOf("alice", "WETH")).toBe(15n);

    tx.commit();

    expect(collateral.balanceOf("alice", "WETH")).toBe(15n);
    expect(debt.debtOf("alice")).toBe(60n);
  });

  it("restores every write on rollback", async () => {
    tx.addCollateral("bob", "WETH", 3n);
    tx.removeCollateral("alice", "WETH", 10n);
    tx.addDebt("alice", 25n);
    tx.removeDebt("alice", 125n);

    expect(await tx.rollback(silentLogger)).toEqual([]);

    expect(collateral.balanceOf("alice", "WETH")).toBe(10n);
    expect(collateral.balanceOf("bob", "WETH")).toBe(0n);
    expect(collateral.balancesOf("bob").size).toBe(0);
    expect(debt.debtOf("alice")).toBe(100n);
  });

  it("rejects removing more than is held without touching the ledgers", () => {
    expect(() => tx.removeCollateral("alice", "WETH", 11n)).toThrow(InsufficientCollateralError);
    expect(() => tx.removeDebt("alice", 101n)).toThrow(InsufficientDebtError);
    expect(collateral.balanceOf("alice", "WETH")).toBe(10n);
    expect(debt.debtOf("alice")).toBe(100n);
  });

  it("runs compensations newest first, interleaved with ledger restores", async () => {
    const order: string[] = [];
    tx.addDebt("alice", 1n);
    tx.compensate("first", async () => {
      order.push(`first (debt ${debt.debtOf("alice")})`);
    });
    tx.addDebt("alice", 1n);
    tx.compensate("second", async () => {
      order.push(`second (debt ${debt.debtOf("alice")})`);
    });

    await tx.rollback(silentLogger);

    expect(order).toEqual(["second (debt 102)", "first (debt 101)"]);
    expect(debt.debtOf("alice")).toBe(100n);
  });

  it("keeps going past a failing compensation and reports it", async () => {
    const logger = createLogger({ level: "silent" });
    const logged = vi.spyOn(logger, "error");
    const failure = new Error("refund bounced");
    const undone = vi.fn(async () => {});
    tx.compensate("refund", undone);
    tx.compensate("re-mint", async () => {
      throw failure;
    });
    tx.addCollateral("alice", "WETH", 1n);

    const failures = await tx.rollback(logger);

    expect(failures).toEqual([{ label: "re-mint", error: failure }]);
    expect(undone).toHaveBeenCalledTimes(1);
    expect(collateral.balanceOf("alice", "WETH")).toBe(10n);
    expect(logged).toHaveBeenCalledWith(
      { step: "re-mint", error: failure },
      "Compensation failed during rollback",
    );
  });

  it("hands deferred effects back on commit without running them", () => {
    const effect = vi.fn();
    tx.afterCommit(effect);

    const effects = tx.commit();

    expect(effect).not.toHaveBeenCalled();
    expect(effects).toEqual([effect]);
  });

  it("drops deferred effects on rollback", async () => {
    const effect = vi.fn();
    tx.afterCommit(effect);

    await tx.rollback(silentLogger);

    expect(effect).not.toHaveBeenCalled();
  });

  it("refuses writes once closed", async () => {
    tx.commit();

    expect(() => tx.addDebt("alice", 1n)).toThrow("Transaction already closed");
    expect(() => tx.commit()).toThrow("Transaction already closed");
    await expect(tx.rollback(silentLogger)).rejects.toThrow("Transaction already closed");
    expect(debt.debtOf("alice")).toBe(100n);
  });
});
