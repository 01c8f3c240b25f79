import { DomainError, type DerivedConstant, type Deviation } from "@constant-synthesis/shared";

/**
 * Distance between a derived value and a measured reference, in absolute
 * terms, relative terms and parts per billion.
 */
export function measureDeviation(derived: DerivedConstant | number, reference: number): Deviation {
  if (!Number.isFinite(reference) || reference === 0) {
    throw new DomainError("reference", reference, "expected a finite, non-zero value");
  }
  const value = typeof derived === "number" ? derived : derived.value;
  const absolute = value - reference;
  const relative = absolute / reference;
  return { absolute, relative, ppb: relative * 1e9 };
}
