import { cosDegrees } from "@constant-synthesis/shared";
import { PolicyRegistry, type PolicyDefinition } from "./registry";

/**
 * Weight of an angle in degrees. The alpha ratio is weight(theta) divided by
 * weight(reference).
 */
export type AlphaWeightPolicy = (thetaDegrees: number) => number;
export type AlphaWeightPolicyDefinition = PolicyDefinition<AlphaWeightPolicy>;

export const COSINE_WEIGHT: AlphaWeightPolicyDefinition = {
  id: "cosine",
  description: "cos(theta)",
  evaluate: thetaDegrees => cosDegrees(thetaDegrees)
};

export const CLAMPED_COSINE_FLOOR = 0.01;

export const CLAMPED_COSINE_WEIGHT: AlphaWeightPolicyDefinition = {
  id: "clamped-cosine",
  description: `cos(theta) floored at ${CLAMPED_COSINE_FLOOR} near the void side`,
  evaluate: thetaDegrees => Math.max(cosDegrees(thetaDegrees), CLAMPED_COSINE_FLOOR)
};

export function createAlphaPolicies(): PolicyRegistry<AlphaWeightPolicy> {
  return new PolicyRegistry<AlphaWeightPolicy>("alpha", [COSINE_WEIGHT, CLAMPED_COSINE_WEIGHT]);
}
