/**
 * Time-dependent R(λ) substitution (pure). B(λ) is never substituted.
 */

import { exposureLimits } from "@/config/exposureLimits";
import type { EffectiveWeighting, WeightingFactors } from "./types";

/**
 * - durationS < 1e-11 and r < 1 → 1
 * - durationS > 10 and r > 1 → 1
 * - otherwise r unchanged (both thresholds are strict).
 */
export function substituteThermalWeighting(r: number, durationS: number): number {
  if (durationS < exposureLimits.ultrashortThresholdS && r < 1) return 1;
  if (durationS > exposureLimits.longExposureThresholdS && r > 1) return 1;
  return r;
}

export function applySubstitution(weighting: WeightingFactors, durationS: number): EffectiveWeighting {
  return {
    rEff: substituteThermalWeighting(weighting.r, durationS),
    bEff: weighting.b,
  };
}
