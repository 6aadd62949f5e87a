/**
 * Exposure evaluation: weighting → substitution → limits → governing hazard.
 * Pure and synchronous; every call builds its result from scratch.
 */

import type { ExposureRequest, HazardKind } from "@/domain/exposure/exposure.schema";
import { assertExposureRequest } from "./validate";
import { getWeightingFactors } from "./weighting";
import { applySubstitution } from "./substitution";
import { computeHazardLimits } from "./limits";
import { photochemicalSafeDuration, thermalSafeDuration } from "./safeDuration";
import { checkSinglePulse } from "./singlePulse";
import type { EvaluationResult, HazardLimits, HazardMargins } from "./types";

function ratio(limit: number, exposure: number): number {
  return exposure === 0 ? Infinity : limit / exposure;
}

export function computeMargins(limits: HazardLimits): HazardMargins {
  return {
    thermal: ratio(limits.thermalLimit, limits.thermalExposure),
    photochemical: ratio(limits.photochemicalLimit, limits.photochemicalExposure),
  };
}

/** Smaller margin governs; a tie goes to thermal. */
export function selectGoverningHazard(margins: HazardMargins): HazardKind {
  return margins.thermal <= margins.photochemical ? "thermal" : "photochemical";
}

/**
 * Evaluates one request. Throws ExposureDomainError for out-of-domain input
 * or a non-finite exposure/limit.
 */
export function evaluateExposure(request: ExposureRequest): EvaluationResult {
  assertExposureRequest(request);

  const weighting = getWeightingFactors(request.wavelengthNm);
  const effectiveWeighting = applySubstitution(weighting, request.durationS);
  const limits = computeHazardLimits(request, effectiveWeighting);
  const margins = computeMargins(limits);
  const governingHazard = selectGoverningHazard(margins);

  const safeDurationS =
    governingHazard === "thermal"
      ? thermalSafeDuration(weighting.r, request.powerW)
      : photochemicalSafeDuration(effectiveWeighting.bEff, request.powerW);

  const result: EvaluationResult = {
    request: request.pulse ? { ...request, pulse: { ...request.pulse } } : { ...request },
    weighting,
    effectiveWeighting,
    limits,
    margins,
    governingHazard,
    margin: Math.min(margins.thermal, margins.photochemical),
    safeDurationS,
  };

  if (request.pulse) {
    result.singlePulse = checkSinglePulse(weighting.r, request.powerW, request.pulse);
  }

  return result;
}
