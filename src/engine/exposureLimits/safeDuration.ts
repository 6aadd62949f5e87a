/**
 * Safe exposure duration: the time at which the delivered radiant exposure
 * reaches the hazard's limit at fixed power (pure, deterministic).
 */

import { exposureLimits, spotAreaM2 } from "@/config/exposureLimits";
import { substituteThermalWeighting } from "./substitution";

/** Substitution regimes for R(λ), ascending; lower bound inclusive only for the middle one. */
type Regime = { lo: number; hi: number; sampleS: number };

const REGIMES: readonly Regime[] = [
  { lo: 0, hi: exposureLimits.ultrashortThresholdS, sampleS: exposureLimits.ultrashortThresholdS / 2 },
  { lo: exposureLimits.ultrashortThresholdS, hi: exposureLimits.longExposureThresholdS, sampleS: 1 },
  { lo: exposureLimits.longExposureThresholdS, hi: Infinity, sampleS: exposureLimits.longExposureThresholdS * 2 },
];

/**
 * Solves P·t/A = K·t^0.75 / (R_eff(t)·A) for t. Within a regime R_eff is
 * constant, giving t = (K / (R_eff·P))^(1/(1-0.75)). Regimes are walked in
 * ascending order; the first whose solution does not pass its upper bound wins.
 * If the limit is already exceeded on entry to a regime, its lower bound is returned.
 */
export function thermalSafeDuration(r: number, powerW: number): number {
  if (powerW === 0) return Infinity;
  const exponent = 1 / (1 - exposureLimits.thermalTimeExponent);
  for (const regime of REGIMES) {
    const rEff = substituteThermalWeighting(r, regime.sampleS);
    const t = (exposureLimits.thermalCoefficientJ / (rEff * powerW)) ** exponent;
    if (t <= regime.hi) return Math.max(t, regime.lo);
  }
  return Infinity;
}

/** Solves P·t/A = D / B_eff for t. */
export function photochemicalSafeDuration(bEff: number, powerW: number): number {
  if (powerW === 0) return Infinity;
  return (exposureLimits.photochemicalDoseJPerM2 * spotAreaM2()) / (bEff * powerW);
}
