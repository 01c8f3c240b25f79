export type Axis = "X" | "Y" | "Z";
export type CostCategory = "heat" | "mass" | "energy";

export const AXES: readonly Axis[] = ["X", "Y", "Z"];

export type FactorAttribution =
  | "ring-count"
  | "threshold"
  | "boundary-structure"
  | "theta-ratio";

/**
 * One labeled contributor to a synthesized constant. Tags carry descriptive
 * labels only ("God's wall", "observer") and never drive computation.
 */
export interface Factor {
  readonly name: string;
  readonly attribution: FactorAttribution;
  readonly value: number;
  readonly provenance: string;
  readonly tags: readonly string[];
}

export interface ErrorBudget {
  readonly injected: number;
  readonly drainFraction: number;
  readonly drained: number;
  readonly residual: number;
}

export interface ErrorInjection {
  injected: number;
  drainFraction: number;
}

export type DerivedConstantName = "light-speed" | "alpha";

export interface DerivedConstant {
  readonly name: DerivedConstantName;
  readonly value: number;
  readonly factors: readonly Factor[];
  readonly errorBudget: ErrorBudget;
}

export interface DeformationCost {
  readonly axis: Axis;
  readonly category: CostCategory;
  readonly bendDegrees: number;
  readonly magnitude: number;
  readonly policy: string;
}

export interface CategoryTotals {
  heat: number;
  mass: number;
  energy: number;
}

export interface Deviation {
  absolute: number;
  relative: number;
  ppb: number;
}

export interface AlphaEpoch {
  name: string;
  thetaDegrees: number;
}

export interface AlphaEpochResult extends AlphaEpoch {
  alpha: number;
  inverseAlpha: number;
}

export interface VerificationCheck {
  name: string;
  passed: boolean;
  detail: string;
  tags: string[];
}

export interface VerificationReport {
  passed: boolean;
  checks: VerificationCheck[];
}

/**
 * Freezes a record and every nested object or array it holds.
 */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
