import {
  AXES,
  DomainError,
  LogLevel,
  deepFreeze,
  type Axis,
  type CategoryTotals,
  type BendConfig,
  type ComponentLogger,
  type CostCategory,
  type DeformationCost
} from "@constant-synthesis/shared";
import {
  SINE_DEFORMATION,
  createDeformationPolicies,
  type DeformationPolicy,
  type DeformationPolicyDefinition
} from "../policies/deformation";
import type { PolicyRegistry } from "../policies/registry";

export const AXIS_COST_CATEGORY: Readonly<Record<Axis, CostCategory>> = Object.freeze({
  X: "heat",
  Y: "mass",
  Z: "energy"
});

export function isAxis(value: string): value is Axis {
  return AXES.some(axis => axis === value);
}

export function costCategory(axis: string): CostCategory {
  if (!isAxis(axis)) {
    throw new DomainError("axis", axis, "expected one of X, Y, Z");
  }
  return AXIS_COST_CATEGORY[axis];
}

/**
 * Cost of bending a spoke by `bendDegrees` along `axis`. The category is fixed
 * per axis; the magnitude comes from the deformation policy.
 */
export function deformationCost(
  axis: Axis,
  bendDegrees: number,
  policy: DeformationPolicyDefinition = SINE_DEFORMATION
): DeformationCost {
  const category = costCategory(axis);
  if (!Number.isFinite(bendDegrees) || bendDegrees < 0 || bendDegrees > 180) {
    throw new DomainError("bendDegrees", bendDegrees, "expected a value in [0, 180]");
  }
  const magnitude = policy.evaluate(bendDegrees);
  if (!Number.isFinite(magnitude) || magnitude < 0) {
    throw new DomainError(`${policy.id} deformation cost`, magnitude, "expected a finite value >= 0");
  }
  return deepFreeze({ axis, category, bendDegrees, magnitude, policy: policy.id });
}

export interface SpokeBridgeModelOptions {
  policy?: string;
  policies?: PolicyRegistry<DeformationPolicy>;
  logger?: ComponentLogger;
}

export class SpokeBridgeModel {
  private readonly policy: DeformationPolicyDefinition;
  private readonly logger?: ComponentLogger;

  constructor(options: SpokeBridgeModelOptions = {}) {
    const policies = options.policies ?? createDeformationPolicies();
    this.policy = policies.get(options.policy ?? SINE_DEFORMATION.id);
    this.logger = options.logger;
  }

  get policyId(): string {
    return this.policy.id;
  }

  cost(axis: Axis, bendDegrees: number): DeformationCost {
    const cost = deformationCost(axis, bendDegrees, this.policy);
    this.logger?.log(LogLevel.DEBUG, "spoke.deformed", { ...cost });
    return cost;
  }

  costs(bends: readonly BendConfig[]): DeformationCost[] {
    return bends.map(bend => this.cost(bend.axis, bend.bendDegrees));
  }

  totalCost(bends: readonly BendConfig[]): CategoryTotals {
    const totals: CategoryTotals = { heat: 0, mass: 0, energy: 0 };
    for (const cost of this.costs(bends)) {
      totals[cost.category] += cost.magnitude;
    }
    return totals;
  }
}
