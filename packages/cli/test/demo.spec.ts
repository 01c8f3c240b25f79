import { describe, expect, it } from "vitest";
import { loadConfig, type SynthesisConfig } from "@constant-synthesis/shared";
import { runDemonstration } from "../src/demo";
import { formatNumber, formatReport } from "../src/report";

function defaultConfig(): SynthesisConfig {
  return loadConfig();
}

describe("runDemonstration", () => {
  const run = runDemonstration(defaultConfig());

  it("derives the network from the observer footprint", () => {
    expect(run.network.footprint).toBeCloseTo(207542 / 300000000, 15);
    expect(run.network.count).toBe(1445);
    expect(run.network.threshold).toBeCloseTo(0.999308193333, 11);
  });

  it("reproduces the measured speed of light", () => {
    expect(Math.abs(run.lightSpeed.derived.value - 299792458)).toBeLessThan(1e-6);
    expect(Math.abs(run.lightSpeed.deviation.ppb)).toBeLessThan(1);
    expect(run.lightSpeed.derived.factors.map(factor => factor.name)).toEqual(["ring", "threshold", "boundary"]);
  });

  it("returns the calibration alpha at equilibrium", () => {
    expect(run.alpha.derived.value).toBe(0.0072973525693);
    expect(run.alpha.policy).toBe("cosine");
    expect(run.alpha.epochs).toHaveLength(6);
    expect(run.alpha.epochs[2]).toMatchObject({ name: "Now", thetaDegrees: 45, alpha: 0.0072973525693 });
  });

  it("charges each bent spoke to its category", () => {
    expect(run.deformation.policy).toBe("sine");
    expect(run.deformation.totals.heat).toBe(0);
    expect(run.deformation.totals.mass).toBeCloseTo(0.5, 12);
    expect(run.deformation.totals.energy).toBe(1);
  });

  it("drains the footprint and deformation costs into the ledger", () => {
    expect(Object.keys(run.sink.bySource)).toEqual(["observer-footprint", "heat", "mass", "energy"]);
    expect(run.sink.budget.injected).toBe(run.network.footprint);
    expect(run.sink.budget.drainFraction).toBe(0.9999994652);
    expect(run.sink.totals.residual).toBeGreaterThan(0);
  });

  it("passes every verification check", () => {
    expect(run.verification.passed).toBe(true);
    expect(run.verification.checks.map(check => check.name)).toEqual([
      "factors-finite",
      "budget-conserved",
      "factor-product",
      "factors-finite",
      "budget-conserved",
      "entry-1:observer-footprint",
      "entry-2:heat",
      "entry-3:mass",
      "entry-4:energy",
      "ledger-totals"
    ]);
  });

  it("builds the four-level hierarchy", () => {
    expect(run.hierarchy.map(level => level.name)).toEqual(["Polygon sides", "Spokes", "Intersections", "Foundation"]);
    expect(run.hierarchy[2].role).toBe("1445 verification joints per unit length");
  });

  it("uses a configured threshold instead of the network", () => {
    const config = defaultConfig();
    const withThreshold = runDemonstration({ ...config, lightSpeed: { ...config.lightSpeed, threshold: 0.5 } });
    expect(withThreshold.lightSpeed.derived.value).toBe(150000000);
    expect(withThreshold.lightSpeed.derived.factors[1].provenance).toBe("supplied by caller");
  });

  it("propagates domain errors", () => {
    const config = defaultConfig();
    expect(() => runDemonstration({ ...config, alpha: { ...config.alpha, referenceDegrees: 90 } })).toThrow(
      "Parameter 'referenceDegrees' = 90"
    );
  });
});

describe("formatReport", () => {
  const lines = formatReport(runDemonstration(defaultConfig())).split("\n");

  it("renders every section", () => {
    expect(lines.slice(0, 3)).toEqual(["=".repeat(64), "CONSTANT SYNTHESIS", "=".repeat(64)]);
    for (const title of [
      "[1] Three orthogonal observers",
      "[2] Verification pass",
      "[3] Uncertainty sink",
      "[4] Speed of light",
      "[5] Fine-structure constant",
      "[6] Structural hierarchy"
    ]) {
      expect(lines).toContain(title);
    }
  });

  it("renders the key figures", () => {
    expect(lines).toContain("  Observer footprint: 0.0006918066667");
    expect(lines).toContain("  Intersections per unit length: 1445");
    expect(lines).toContain("  Result: all checks passed");
    expect(lines).toContain("  PASS  factor-product [something]");
    expect(lines).toContain("  alpha = 0.0072973525693 (1/alpha = 137.035999)");
    expect(lines).toContain("  3. Intersections: 1445 verification joints per unit length");
  });

  it("formats numbers to significant digits", () => {
    expect(formatNumber(1 / 3)).toBe("0.3333333333");
    expect(formatNumber(2.5)).toBe("2.5");
    expect(formatNumber(Number.POSITIVE_INFINITY)).toBe("Infinity");
  });
});
