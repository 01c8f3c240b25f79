import { DomainError, assertInRange, deepFreeze, type ErrorBudget } from "@constant-synthesis/shared";

export const CONSERVATION_TOLERANCE = 1e-12;

/**
 * Drains `drainFraction` of an injected error. Each call stands alone: the
 * sink keeps no running total (see UncertaintyLedger for that).
 */
export function drain(injected: number, drainFraction: number): ErrorBudget {
  if (!Number.isFinite(injected) || injected < 0) {
    throw new DomainError("injected", injected, "expected a finite value >= 0");
  }
  assertInRange("drainFraction", drainFraction, 0, 1);
  const drained = injected * drainFraction;
  const residual = injected - drained;
  return deepFreeze({ injected, drainFraction, drained, residual });
}

export const ZERO_BUDGET: ErrorBudget = drain(0, 0);

export function isConserved(budget: ErrorBudget, tolerance = CONSERVATION_TOLERANCE): boolean {
  const gap = Math.abs(budget.drained + budget.residual - budget.injected);
  return gap <= tolerance * Math.abs(budget.injected);
}
