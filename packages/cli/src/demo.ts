import type {
  AlphaEpochResult,
  CategoryTotals,
  DeformationCost,
  DerivedConstant,
  Deviation,
  ErrorBudget,
  SynthesisConfig,
  VerificationReport
} from "@constant-synthesis/shared";
import { LogLevel } from "@constant-synthesis/shared";
import type { ChildLogger } from "@constant-synthesis/logger";
import {
  ConstantSynthesizer,
  OBSERVERS,
  SpokeBridgeModel,
  UncertaintyLedger,
  createPolicyRegistries,
  densityFromFootprint,
  describeNetwork,
  measureDeviation,
  observerFootprint,
  verifyDerivation,
  verifyLedger,
  type NetworkSummary,
  type ObserverLabel,
  type PolicyRegistries
} from "@constant-synthesis/core";

export interface HierarchyLevel {
  level: number;
  name: string;
  role: string;
}

export interface DemonstrationRun {
  observers: readonly ObserverLabel[];
  network: NetworkSummary & { footprint: number };
  deformation: { policy: string; costs: DeformationCost[]; totals: CategoryTotals };
  sink: { budget: ErrorBudget; totals: ErrorBudget; bySource: Record<string, ErrorBudget> };
  lightSpeed: { derived: DerivedConstant; reference: number; deviation: Deviation };
  alpha: { derived: DerivedConstant; policy: string; epochs: AlphaEpochResult[] };
  verification: VerificationReport;
  hierarchy: HierarchyLevel[];
}

export interface DemonstrationOptions {
  logger?: ChildLogger;
  policies?: PolicyRegistries;
}

const FOOTPRINT_SOURCE = "observer-footprint";

function buildHierarchy(network: NetworkSummary, residual: number): HierarchyLevel[] {
  return [
    { level: 1, name: "Polygon sides", role: "surfaces carried by the spokes" },
    { level: 2, name: "Spokes", role: "supports; bending costs heat (X), mass (Y), energy (Z)" },
    { level: 3, name: "Intersections", role: `${network.count} verification joints per unit length` },
    { level: 4, name: "Foundation", role: `uncertainty sink; ${residual.toPrecision(3)} left undrained` }
  ];
}

/**
 * Runs the fixed demonstration sequence against a validated config. Every
 * DomainError propagates to the caller; nothing is partially returned.
 */
export function runDemonstration(config: SynthesisConfig, options: DemonstrationOptions = {}): DemonstrationRun {
  const policies = options.policies ?? createPolicyRegistries();
  const logger = options.logger;

  const footprint = observerFootprint(config.network.measuredSpeed, config.network.nominalSpeed);
  const density = config.network.density ?? densityFromFootprint(footprint);
  const network = { ...describeNetwork(density), footprint };
  logger?.log(LogLevel.INFO, "network.described", { ...network });

  const bridges = new SpokeBridgeModel({
    policy: config.bridges.costPolicy,
    policies: policies.deformation,
    logger: logger?.child("bridges")
  });
  const costs = bridges.costs(config.bridges.bends);
  const totals = bridges.totalCost(config.bridges.bends);

  const synthesizer = new ConstantSynthesizer({
    policies,
    alphaPolicy: config.alpha.policy,
    logger: logger?.child("synthesizer")
  });
  const injection = {
    injected: config.sink.injected ?? footprint,
    drainFraction: config.sink.drainFraction
  };

  const { ring, threshold, boundary, reference } = config.lightSpeed;
  const lightSpeed =
    threshold === undefined
      ? synthesizer.deriveLightSpeedFromNetwork(ring, density, boundary, injection)
      : synthesizer.deriveLightSpeed(ring, threshold, boundary, injection);
  const alpha = synthesizer.deriveAlphaAt(config.alpha.thetaDegrees, config.alpha.referenceDegrees, config.alpha.alpha0);
  const epochs = synthesizer.alphaAcrossEpochs(config.alpha.epochs, config.alpha.alpha0, config.alpha.referenceDegrees);

  const ledger = new UncertaintyLedger(logger?.child("sink"));
  const budget = ledger.absorb(lightSpeed.errorBudget, FOOTPRINT_SOURCE);
  for (const cost of costs) {
    ledger.drain(cost.magnitude, config.sink.drainFraction, cost.category);
  }

  const reports = [verifyDerivation(lightSpeed), verifyDerivation(alpha), verifyLedger(ledger)];
  const verification: VerificationReport = {
    passed: reports.every(entry => entry.passed),
    checks: reports.flatMap(entry => entry.checks)
  };
  if (!verification.passed) {
    logger?.log(LogLevel.WARN, "verification.failed", {
      failed: verification.checks.filter(check => !check.passed).map(check => check.name)
    });
  }

  const ledgerTotals = ledger.totals();
  return {
    observers: OBSERVERS,
    network,
    deformation: { policy: bridges.policyId, costs, totals },
    sink: { budget, totals: ledgerTotals, bySource: ledger.bySource() },
    lightSpeed: { derived: lightSpeed, reference, deviation: measureDeviation(lightSpeed, reference) },
    alpha: { derived: alpha, policy: synthesizer.alphaPolicyId, epochs },
    verification,
    hierarchy: buildHierarchy(network, ledgerTotals.residual)
  };
}
