import { describe, expect, it, vi } from "vitest";
import { DomainError, LogLevel } from "@constant-synthesis/shared";
import { UNATTRIBUTED, UncertaintyLedger } from "../src/sink/ledger";
import { drain } from "../src/sink/uncertaintySink";

describe("UncertaintyLedger", () => {
  it("accumulates budgets across calls", () => {
    const ledger = new UncertaintyLedger();
    ledger.drain(10, 0.5, "heat");
    ledger.drain(6, 0.5, "mass");

    expect(ledger.size).toBe(2);
    expect(ledger.totals()).toEqual({ injected: 16, drainFraction: 0.5, drained: 8, residual: 8 });
  });

  it("groups totals by source", () => {
    const ledger = new UncertaintyLedger();
    ledger.drain(4, 0.25, "heat");
    ledger.drain(4, 0.75, "heat");
    ledger.drain(2, 1);

    const bySource = ledger.bySource();
    expect(Object.keys(bySource)).toEqual(["heat", UNATTRIBUTED]);
    expect(bySource.heat).toEqual({ injected: 8, drainFraction: 0.5, drained: 4, residual: 4 });
    expect(bySource[UNATTRIBUTED].residual).toBe(0);
  });

  it("keeps separate ledgers independent", () => {
    const first = new UncertaintyLedger();
    const second = new UncertaintyLedger();
    first.drain(1, 0.5);

    expect(first.size).toBe(1);
    expect(second.size).toBe(0);
    expect(second.totals()).toEqual({ injected: 0, drainFraction: 0, drained: 0, residual: 0 });
  });

  it("absorbs budgets produced elsewhere", () => {
    const ledger = new UncertaintyLedger();
    const budget = drain(3, 1 / 3);
    expect(ledger.absorb(budget, "light-speed")).toBe(budget);
    expect(ledger.entries()).toEqual([{ sequence: 1, source: "light-speed", budget }]);
  });

  it("refuses budgets that do not conserve", () => {
    const ledger = new UncertaintyLedger();
    expect(() => ledger.absorb({ injected: 1, drainFraction: 0.5, drained: 0.5, residual: 0.7 })).toThrowError(
      DomainError
    );
    expect(ledger.size).toBe(0);
  });

  it("refuses budgets outside the drain domain", () => {
    const ledger = new UncertaintyLedger();
    expect(() => ledger.absorb({ injected: 1, drainFraction: 2, drained: 2, residual: -1 })).toThrowError(DomainError);
    expect(() => ledger.absorb({ injected: -1, drainFraction: 0.5, drained: -0.5, residual: -0.5 })).toThrowError(
      DomainError
    );
    expect(() => ledger.absorb({ injected: 1, drainFraction: 0.5, drained: 1.2, residual: -0.2 })).toThrowError(
      DomainError
    );
    expect(ledger.size).toBe(0);
    expect(ledger.totals().residual).toBe(0);
  });

  it("does not record failed drains", () => {
    const ledger = new UncertaintyLedger();
    expect(() => ledger.drain(1, 2)).toThrowError(DomainError);
    expect(ledger.size).toBe(0);
  });

  it("hands out copies of its entries and can be reset", () => {
    const ledger = new UncertaintyLedger();
    ledger.drain(1, 0.5);
    const snapshot = ledger.entries();
    snapshot.pop();
    expect(ledger.size).toBe(1);

    ledger.reset();
    expect(ledger.size).toBe(0);
  });

  it("logs each absorbed budget", () => {
    const logger = { log: vi.fn() };
    const ledger = new UncertaintyLedger(logger);
    ledger.drain(2, 0.5, "energy");

    expect(logger.log).toHaveBeenCalledWith(LogLevel.DEBUG, "sink.absorbed", {
      source: "energy",
      sequence: 1,
      injected: 2,
      residual: 1
    });
  });
});
