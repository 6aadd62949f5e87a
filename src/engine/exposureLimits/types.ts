/**
 * Exposure limit engine — types.
 * Radiant exposures and limits are J/m² over the fixed 0.03 mm spot.
 */

import type { ExposureRequest, HazardKind } from "@/domain/exposure/exposure.schema";

/** Raw spectral weighting at a wavelength. */
export type WeightingFactors = {
  r: number;
  b: number;
};

/** Weighting after the time-dependent substitution (only R is ever replaced). */
export type EffectiveWeighting = {
  rEff: number;
  bEff: number;
};

export type HazardLimits = {
  thermalExposure: number;
  thermalLimit: number;
  photochemicalExposure: number;
  photochemicalLimit: number;
};

/** limit / exposure; +Infinity when the exposure is 0. */
export type HazardMargins = {
  thermal: number;
  photochemical: number;
};

/** Result of checkSinglePulse. */
export type SinglePulseCheck = {
  pulseEnergyJ: number;
  /** R(λ) after substitution against the pulse duration. */
  rPulse: number;
  weightedEnergyJ: number;
  limitJ: number;
  margin: number;
};

/** Result of evaluateExposure. */
export type EvaluationResult = {
  request: ExposureRequest;
  weighting: WeightingFactors;
  effectiveWeighting: EffectiveWeighting;
  limits: HazardLimits;
  margins: HazardMargins;
  governingHazard: HazardKind;
  /** min(margins.thermal, margins.photochemical) */
  margin: number;
  /** Longest duration at this power that stays within the governing limit. */
  safeDurationS: number;
  singlePulse?: SinglePulseCheck;
};
