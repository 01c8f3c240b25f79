import { DomainError, LogLevel, deepFreeze, type ComponentLogger, type ErrorBudget } from "@constant-synthesis/shared";
import { CONSERVATION_TOLERANCE, drain } from "./uncertaintySink";

export interface LedgerEntry {
  readonly sequence: number;
  readonly source: string;
  readonly budget: ErrorBudget;
}

export const UNATTRIBUTED = "unattributed";

function summarize(budgets: readonly ErrorBudget[]): ErrorBudget {
  let injected = 0;
  let drained = 0;
  for (const budget of budgets) {
    injected += budget.injected;
    drained += budget.drained;
  }
  return deepFreeze({
    injected,
    drainFraction: injected > 0 ? drained / injected : 0,
    drained,
    residual: injected - drained
  });
}

/**
 * Caller-owned accumulator for error drained across many synthesis calls.
 * Nothing is shared between ledger instances.
 */
export class UncertaintyLedger {
  private readonly records: LedgerEntry[] = [];

  constructor(private readonly logger?: ComponentLogger) {}

  get size(): number {
    return this.records.length;
  }

  drain(injected: number, drainFraction: number, source: string = UNATTRIBUTED): ErrorBudget {
    return this.absorb(drain(injected, drainFraction), source);
  }

  /**
   * Records a budget produced elsewhere, e.g. the one attached to a
   * DerivedConstant.
   */
  absorb(budget: ErrorBudget, source: string = UNATTRIBUTED): ErrorBudget {
    const expected = drain(budget.injected, budget.drainFraction);
    const tolerance = CONSERVATION_TOLERANCE * budget.injected;
    if (
      !(Math.abs(budget.drained - expected.drained) <= tolerance) ||
      !(Math.abs(budget.residual - expected.residual) <= tolerance)
    ) {
      throw new DomainError("budget", JSON.stringify(budget), "expected drained = injected × drainFraction and the rest as residual");
    }
    const entry: LedgerEntry = deepFreeze({ sequence: this.records.length + 1, source, budget });
    this.records.push(entry);
    this.logger?.log(LogLevel.DEBUG, "sink.absorbed", {
      source,
      sequence: entry.sequence,
      injected: budget.injected,
      residual: budget.residual
    });
    return budget;
  }

  totals(): ErrorBudget {
    return summarize(this.records.map(entry => entry.budget));
  }

  bySource(): Record<string, ErrorBudget> {
    const grouped = new Map<string, ErrorBudget[]>();
    for (const entry of this.records) {
      const bucket = grouped.get(entry.source) ?? [];
      bucket.push(entry.budget);
      grouped.set(entry.source, bucket);
    }
    return Object.fromEntries(Array.from(grouped, ([source, budgets]) => [source, summarize(budgets)]));
  }

  entries(): LedgerEntry[] {
    return [...this.records];
  }

  reset(): void {
    this.records.length = 0;
  }
}
