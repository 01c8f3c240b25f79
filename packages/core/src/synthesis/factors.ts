import { DomainError, deepFreeze, type Factor, type FactorAttribution } from "@constant-synthesis/shared";

export interface FactorInput {
  name: string;
  attribution: FactorAttribution;
  value: number;
  provenance: string;
  tags?: string[];
}

export function makeFactor(input: FactorInput): Factor {
  if (!Number.isFinite(input.value)) {
    throw new DomainError(input.name, input.value, "expected a finite factor");
  }
  return deepFreeze({
    name: input.name,
    attribution: input.attribution,
    value: input.value,
    provenance: input.provenance,
    tags: [...(input.tags ?? [])]
  });
}

export function productOf(factors: readonly Factor[]): number {
  return factors.reduce((product, factor) => product * factor.value, 1);
}
