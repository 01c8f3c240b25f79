import { DomainError, assertFinite } from "@constant-synthesis/shared";

export interface NetworkSummary {
  density: number;
  count: number;
  /** Mean distance between neighbouring intersections, in unit lengths. */
  spacing: number;
  /** The "almost one" threshold, or null when the density is below one. */
  threshold: number | null;
}

function assertDensity(density: number): void {
  if (!Number.isFinite(density) || density <= 0) {
    throw new DomainError("density", density, "expected a finite value > 0");
  }
}

/**
 * Intersections in one unit length for a density given per unit length.
 * Halves round up.
 */
export function countIntersections(density: number): number {
  assertDensity(density);
  return Math.round(density);
}

/**
 * Fraction of the nominal speed left unaccounted for by the measured one:
 * `1 - measured / nominal`.
 */
export function observerFootprint(measuredSpeed: number, nominalSpeed: number): number {
  assertFinite("measuredSpeed", measuredSpeed);
  if (!Number.isFinite(nominalSpeed) || nominalSpeed <= 0) {
    throw new DomainError("nominalSpeed", nominalSpeed, "expected a finite value > 0");
  }
  const footprint = 1 - measuredSpeed / nominalSpeed;
  if (footprint <= 0 || footprint >= 1) {
    throw new DomainError("footprint", footprint, "expected measuredSpeed strictly between 0 and nominalSpeed");
  }
  return footprint;
}

/** One intersection per footprint-sized grain. */
export function densityFromFootprint(footprint: number): number {
  if (!Number.isFinite(footprint) || footprint <= 0 || footprint >= 1) {
    throw new DomainError("footprint", footprint, "expected a value in (0, 1)");
  }
  return 1 / footprint;
}

export function thresholdFromDensity(density: number): number {
  if (!Number.isFinite(density) || density < 1) {
    throw new DomainError("density", density, "expected a finite value >= 1");
  }
  return 1 - 1 / density;
}

export function describeNetwork(density: number): NetworkSummary {
  const count = countIntersections(density);
  return {
    density,
    count,
    spacing: 1 / density,
    threshold: density >= 1 ? thresholdFromDensity(density) : null
  };
}
