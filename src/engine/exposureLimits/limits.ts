/**
 * Radiant exposure and Group 1 limits over the fixed spot (pure, deterministic).
 */

import { exposureLimits, spotAreaM2 } from "@/config/exposureLimits";
import type { ExposureRequest } from "@/domain/exposure/exposure.schema";
import type { EffectiveWeighting, HazardLimits } from "./types";
import { assertFinite } from "./validate";

/** H = P·t / A (J/m²). */
export function radiantExposure(powerW: number, durationS: number): number {
  return (powerW * durationS) / spotAreaM2();
}

/**
 * Thermal limit H_T = K·t^0.75 / (R_eff·A): the weighted-energy limit
 * K·t^0.75 expressed as unweighted radiant exposure over the spot.
 */
export function thermalLimit(rEff: number, durationS: number): number {
  const energyJ = exposureLimits.thermalCoefficientJ * durationS ** exposureLimits.thermalTimeExponent;
  return energyJ / (rEff * spotAreaM2());
}

/** Blue-light limit H_B = D / B_eff. Flat in duration. */
export function photochemicalLimit(bEff: number): number {
  return exposureLimits.photochemicalDoseJPerM2 / bEff;
}

export function computeHazardLimits(request: ExposureRequest, weighting: EffectiveWeighting): HazardLimits {
  const exposure = radiantExposure(request.powerW, request.durationS);
  const limits: HazardLimits = {
    thermalExposure: exposure,
    thermalLimit: thermalLimit(weighting.rEff, request.durationS),
    photochemicalExposure: exposure,
    photochemicalLimit: photochemicalLimit(weighting.bEff),
  };
  assertFinite(limits.thermalExposure, "thermal exposure");
  assertFinite(limits.thermalLimit, "thermal limit");
  assertFinite(limits.photochemicalExposure, "photochemical exposure");
  assertFinite(limits.photochemicalLimit, "photochemical limit");
  return limits;
}
