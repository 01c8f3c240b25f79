import { sinDegrees } from "@constant-synthesis/shared";
import { PolicyRegistry, type PolicyDefinition } from "./registry";

/** Maps a bend in degrees, already checked to lie in [0, 180], to a cost magnitude. */
export type DeformationPolicy = (bendDegrees: number) => number;
export type DeformationPolicyDefinition = PolicyDefinition<DeformationPolicy>;

export const SINE_DEFORMATION: DeformationPolicyDefinition = {
  id: "sine",
  description: "sin(bend): zero when straight, one at a right-angle bend",
  evaluate: bendDegrees => sinDegrees(bendDegrees)
};

export const LINEAR_DEFORMATION: DeformationPolicyDefinition = {
  id: "linear",
  description: "Triangular ramp peaking at 90 degrees",
  evaluate: bendDegrees => 1 - Math.abs(bendDegrees - 90) / 90
};

export function createDeformationPolicies(): PolicyRegistry<DeformationPolicy> {
  return new PolicyRegistry<DeformationPolicy>("deformation", [SINE_DEFORMATION, LINEAR_DEFORMATION]);
}
