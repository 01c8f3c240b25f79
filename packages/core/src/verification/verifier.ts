import {
  relativeDifference,
  type DerivedConstant,
  type ErrorBudget,
  type VerificationCheck,
  type VerificationReport
} from "@constant-synthesis/shared";
import { CONSERVATION_TOLERANCE, isConserved } from "../sink/uncertaintySink";
import type { UncertaintyLedger } from "../sink/ledger";
import { productOf } from "../synthesis/factors";

function report(checks: VerificationCheck[]): VerificationReport {
  return { passed: checks.every(check => check.passed), checks };
}

export function checkBudget(budget: ErrorBudget, label = "budget-conserved"): VerificationCheck {
  const passed = isConserved(budget);
  return {
    name: label,
    passed,
    detail: `drained ${budget.drained} + residual ${budget.residual} vs injected ${budget.injected}`,
    tags: ["depth"]
  };
}

/**
 * Re-checks a derived constant: finite factors, a conserved error budget and,
 * for light speed, that the value is the product of its factors.
 */
export function verifyDerivation(derived: DerivedConstant): VerificationReport {
  const nonFinite = derived.factors.filter(factor => !Number.isFinite(factor.value)).map(factor => factor.name);
  const checks: VerificationCheck[] = [
    {
      name: "factors-finite",
      passed: nonFinite.length === 0 && Number.isFinite(derived.value),
      detail: nonFinite.length ? `non-finite: ${nonFinite.join(", ")}` : `${derived.factors.length} factor(s) finite`,
      tags: ["void"]
    },
    checkBudget(derived.errorBudget)
  ];

  if (derived.name === "light-speed") {
    const product = productOf(derived.factors);
    checks.push({
      name: "factor-product",
      passed: relativeDifference(derived.value, product) <= CONSERVATION_TOLERANCE,
      detail: `value ${derived.value} vs product ${product}`,
      tags: ["something"]
    });
  }

  return report(checks);
}

export function verifyLedger(ledger: UncertaintyLedger): VerificationReport {
  const checks = ledger.entries().map(entry => checkBudget(entry.budget, `entry-${entry.sequence}:${entry.source}`));
  checks.push(checkBudget(ledger.totals(), "ledger-totals"));
  return report(checks);
}
