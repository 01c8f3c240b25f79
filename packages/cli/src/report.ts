import type { DemonstrationRun } from "./demo";

const RULE = "=".repeat(64);

export function formatNumber(value: number, digits = 10): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(digits)));
}

function section(title: string, body: string[]): string[] {
  return [title, ...body, ""];
}

/**
 * Plain-text rendering of a demonstration run, one section per stage.
 */
export function formatReport(run: DemonstrationRun): string {
  const { network, sink, lightSpeed, alpha, deformation } = run;

  const observers = run.observers.map(
    observer => `  ${observer.title.padEnd(24)} ${observer.plane}  verifies ${observer.verifies}`
  );

  const verification = run.verification.checks.map(
    check => `  ${check.passed ? "PASS" : "FAIL"}  ${check.name} [${check.tags.join(", ")}]`
  );
  verification.push(`  Result: ${run.verification.passed ? "all checks passed" : "verification failed"}`);

  const sinkLines = [
    `  Observer footprint: ${formatNumber(network.footprint)}`,
    `  Intersections per unit length: ${network.count}`,
    `  Injected: ${formatNumber(sink.budget.injected)}`,
    `  Drain fraction: ${formatNumber(sink.budget.drainFraction)}`,
    `  Drained: ${formatNumber(sink.budget.drained)}`,
    `  Residual: ${formatNumber(sink.budget.residual)}`,
    `  Deformation (${deformation.policy} policy):`,
    ...deformation.costs.map(
      cost => `    ${cost.axis} bent ${cost.bendDegrees}° -> ${cost.category} ${formatNumber(cost.magnitude)}`
    ),
    `  Ledger residual by source:`,
    ...Object.entries(sink.bySource).map(([source, budget]) => `    ${source}: ${formatNumber(budget.residual)}`),
    `  Ledger total residual: ${formatNumber(sink.totals.residual)}`
  ];

  const lightLines = [
    ...lightSpeed.derived.factors.map(
      factor => `  ${factor.name.padEnd(10)} ${formatNumber(factor.value)}  (${factor.attribution}: ${factor.provenance})`
    ),
    `  c = ${formatNumber(lightSpeed.derived.value, 12)}`,
    `  reference = ${formatNumber(lightSpeed.reference, 12)}, deviation ${formatNumber(lightSpeed.deviation.ppb, 4)} ppb`
  ];

  const [ratio] = alpha.derived.factors;
  const alphaLines = [
    `  Policy: ${alpha.policy}`,
    `  theta-ratio = ${formatNumber(ratio.value)}  (${ratio.provenance})`,
    `  alpha = ${formatNumber(alpha.derived.value, 12)} (1/alpha = ${formatNumber(1 / alpha.derived.value, 9)})`,
    `  Across epochs:`,
    ...alpha.epochs.map(
      epoch =>
        `    ${epoch.name.padEnd(22)} ${formatNumber(epoch.thetaDegrees, 4).padStart(6)}°  ` +
        `alpha ${formatNumber(epoch.alpha, 8)}  1/alpha ${formatNumber(epoch.inverseAlpha, 6)}`
    )
  ];

  const hierarchy = run.hierarchy.map(level => `  ${level.level}. ${level.name}: ${level.role}`);

  return [
    RULE,
    "CONSTANT SYNTHESIS",
    RULE,
    "",
    ...section("[1] Three orthogonal observers", observers),
    ...section("[2] Verification pass", verification),
    ...section("[3] Uncertainty sink", sinkLines),
    ...section("[4] Speed of light", lightLines),
    ...section("[5] Fine-structure constant", alphaLines),
    ...section("[6] Structural hierarchy", hierarchy)
  ].join("\n");
}
