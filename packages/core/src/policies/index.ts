import { createAlphaPolicies, type AlphaWeightPolicy } from "./alpha";
import { createDeformationPolicies, type DeformationPolicy } from "./deformation";
import type { PolicyRegistry } from "./registry";

export * from "./registry";
export * from "./alpha";
export * from "./deformation";

export interface PolicyRegistries {
  deformation: PolicyRegistry<DeformationPolicy>;
  alpha: PolicyRegistry<AlphaWeightPolicy>;
}

/**
 * Fresh registries seeded with the built-in policies.
 */
export function createPolicyRegistries(): PolicyRegistries {
  return {
    deformation: createDeformationPolicies(),
    alpha: createAlphaPolicies()
  };
}
