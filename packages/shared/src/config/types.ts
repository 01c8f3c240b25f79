import type { AlphaEpoch, Axis } from "../types";
import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type DeformationPolicyName = "sine" | "linear" | (string & {});
export type AlphaPolicyName = "cosine" | "clamped-cosine" | (string & {});

export interface BendConfig {
  axis: Axis;
  bendDegrees: number;
}

export interface SynthesisConfig {
  network: {
    /** Intersections per unit length. Derived from the footprint when omitted. */
    density?: number;
    measuredSpeed: number;
    nominalSpeed: number;
  };
  bridges: {
    costPolicy: DeformationPolicyName;
    bends: BendConfig[];
  };
  sink: {
    /** Defaults to the observer footprint. */
    injected?: number;
    drainFraction: number;
  };
  lightSpeed: {
    ring: number;
    /** Derived from the network density when omitted. */
    threshold?: number;
    boundary: number;
    reference: number;
  };
  alpha: {
    thetaDegrees: number;
    referenceDegrees: number;
    alpha0: number;
    policy: AlphaPolicyName;
    epochs: AlphaEpoch[];
  };
  logging: {
    level: LogLevel;
    outputDir?: string;
    maxFileSizeMb?: number;
    maxFiles?: number;
  };
}
