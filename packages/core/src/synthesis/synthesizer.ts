import {
  DomainError,
  LogLevel,
  assertFinite,
  cosDegrees,
  deepFreeze,
  type AlphaEpoch,
  type AlphaEpochResult,
  type ComponentLogger,
  type DerivedConstant,
  type DerivedConstantName,
  type ErrorBudget,
  type ErrorInjection,
  type Factor
} from "@constant-synthesis/shared";
import { thresholdFromDensity } from "../network/intersectionNetwork";
import { COSINE_WEIGHT, type AlphaWeightPolicyDefinition } from "../policies/alpha";
import { createPolicyRegistries, type PolicyRegistries } from "../policies";
import { ZERO_BUDGET, drain } from "../sink/uncertaintySink";
import { makeFactor } from "./factors";

/** Angle at which alpha equals its calibration value alpha0. */
export const EQUILIBRIUM_THETA_DEGREES = 45;

function budgetFor(injection?: ErrorInjection): ErrorBudget {
  return injection ? drain(injection.injected, injection.drainFraction) : ZERO_BUDGET;
}

function assemble(
  name: DerivedConstantName,
  value: number,
  factors: Factor[],
  errorBudget: ErrorBudget
): DerivedConstant {
  assertFinite(name, value);
  return deepFreeze({ name, value, factors, errorBudget });
}

function lightSpeedFactors(ring: number, threshold: Factor, boundary: number): Factor[] {
  return [
    makeFactor({
      name: "ring",
      attribution: "ring-count",
      value: ring,
      provenance: "rings of the intersection network",
      tags: ["structure"]
    }),
    threshold,
    makeFactor({
      name: "boundary",
      attribution: "boundary-structure",
      value: boundary,
      provenance: "decimal scale of the boundary structure",
      tags: ["God's wall"]
    })
  ];
}

function thresholdFactor(value: number, provenance: string): Factor {
  return makeFactor({
    name: "threshold",
    attribution: "threshold",
    value,
    provenance,
    tags: ["0.999... filter"]
  });
}

/**
 * `ring × threshold × boundary`. Factors are kept in that order. No error is
 * drained unless an injection is passed.
 */
export function deriveLightSpeed(
  ring: number,
  threshold: number,
  boundary: number,
  injection?: ErrorInjection
): DerivedConstant {
  const factors = lightSpeedFactors(ring, thresholdFactor(threshold, "supplied by caller"), boundary);
  const value = ring * threshold * boundary;
  return assemble("light-speed", value, factors, budgetFor(injection));
}

/**
 * Light speed with its threshold taken from the network density
 * (`1 - 1/density`).
 */
export function deriveLightSpeedFromNetwork(
  ring: number,
  density: number,
  boundary: number,
  injection?: ErrorInjection
): DerivedConstant {
  const threshold = thresholdFromDensity(density);
  const factors = lightSpeedFactors(
    ring,
    thresholdFactor(threshold, `1 - 1/density (density=${density})`),
    boundary
  );
  const value = ring * threshold * boundary;
  return assemble("light-speed", value, factors, budgetFor(injection));
}

/**
 * `alpha0 × w(theta) / w(reference)`. Fails when cos(reference) is zero,
 * whatever the weight policy.
 */
export function deriveAlphaAt(
  thetaDegrees: number,
  referenceDegrees: number,
  alpha0: number,
  injection?: ErrorInjection,
  policy: AlphaWeightPolicyDefinition = COSINE_WEIGHT
): DerivedConstant {
  assertFinite("thetaDegrees", thetaDegrees);
  assertFinite("referenceDegrees", referenceDegrees);
  assertFinite("alpha0", alpha0);
  if (cosDegrees(referenceDegrees) === 0) {
    throw new DomainError("referenceDegrees", referenceDegrees, "cos(reference) is zero (reference = 90° mod 180°)");
  }
  const referenceWeight = policy.evaluate(referenceDegrees);
  if (!Number.isFinite(referenceWeight) || referenceWeight === 0) {
    throw new DomainError("referenceDegrees", referenceDegrees, `${policy.id} weight at the reference must be finite and non-zero`);
  }
  const ratio = policy.evaluate(thetaDegrees) / referenceWeight;
  const factor = makeFactor({
    name: "theta-ratio",
    attribution: "theta-ratio",
    value: ratio,
    provenance: `${policy.id}(${thetaDegrees}°) / ${policy.id}(${referenceDegrees}°)`,
    tags: ["snake position"]
  });
  return assemble("alpha", alpha0 * ratio, [factor], budgetFor(injection));
}

export function deriveAlpha(thetaDegrees: number, alpha0: number, injection?: ErrorInjection): DerivedConstant {
  return deriveAlphaAt(thetaDegrees, EQUILIBRIUM_THETA_DEGREES, alpha0, injection);
}

export interface ConstantSynthesizerOptions {
  policies?: PolicyRegistries;
  alphaPolicy?: string;
  logger?: ComponentLogger;
}

/**
 * Binds the pure derivations to a selected alpha policy and a logger. Holds
 * no state that changes between calls.
 */
export class ConstantSynthesizer {
  private readonly alphaPolicy: AlphaWeightPolicyDefinition;
  private readonly logger?: ComponentLogger;

  constructor(options: ConstantSynthesizerOptions = {}) {
    const policies = options.policies ?? createPolicyRegistries();
    this.alphaPolicy = policies.alpha.get(options.alphaPolicy ?? COSINE_WEIGHT.id);
    this.logger = options.logger;
  }

  get alphaPolicyId(): string {
    return this.alphaPolicy.id;
  }

  deriveLightSpeed(ring: number, threshold: number, boundary: number, injection?: ErrorInjection): DerivedConstant {
    return this.record(deriveLightSpeed(ring, threshold, boundary, injection));
  }

  deriveLightSpeedFromNetwork(
    ring: number,
    density: number,
    boundary: number,
    injection?: ErrorInjection
  ): DerivedConstant {
    return this.record(deriveLightSpeedFromNetwork(ring, density, boundary, injection));
  }

  deriveAlpha(thetaDegrees: number, alpha0: number, injection?: ErrorInjection): DerivedConstant {
    return this.deriveAlphaAt(thetaDegrees, EQUILIBRIUM_THETA_DEGREES, alpha0, injection);
  }

  deriveAlphaAt(
    thetaDegrees: number,
    referenceDegrees: number,
    alpha0: number,
    injection?: ErrorInjection
  ): DerivedConstant {
    return this.record(deriveAlphaAt(thetaDegrees, referenceDegrees, alpha0, injection, this.alphaPolicy));
  }

  alphaAcrossEpochs(
    epochs: readonly AlphaEpoch[],
    alpha0: number,
    referenceDegrees: number = EQUILIBRIUM_THETA_DEGREES
  ): AlphaEpochResult[] {
    return epochs.map(epoch => {
      const alpha = deriveAlphaAt(epoch.thetaDegrees, referenceDegrees, alpha0, undefined, this.alphaPolicy).value;
      return {
        name: epoch.name,
        thetaDegrees: epoch.thetaDegrees,
        alpha,
        inverseAlpha: alpha === 0 ? Number.POSITIVE_INFINITY : 1 / alpha
      };
    });
  }

  private record(derived: DerivedConstant): DerivedConstant {
    this.logger?.log(LogLevel.DEBUG, "constant.derived", {
      name: derived.name,
      value: derived.value,
      factors: derived.factors.map(factor => factor.name),
      residual: derived.errorBudget.residual
    });
    return derived;
  }
}
