/**
 * Exposure limit engine — pure deterministic functions.
 * Small-spot (0.03 mm) thermal and blue-light limits, 400–500 nm.
 */

export type {
  WeightingFactors,
  EffectiveWeighting,
  HazardLimits,
  HazardMargins,
  SinglePulseCheck,
  EvaluationResult,
} from "./types";

export { evaluateExposure, computeMargins, selectGoverningHazard } from "./evaluateExposure";
export { getWeightingFactors, loadWeightingTable, WEIGHTING_TABLE } from "./weighting";
export { substituteThermalWeighting, applySubstitution } from "./substitution";
export { radiantExposure, thermalLimit, photochemicalLimit, computeHazardLimits } from "./limits";
export { thermalSafeDuration, photochemicalSafeDuration } from "./safeDuration";
export { checkSinglePulse } from "./singlePulse";
export { assertExposureRequest } from "./validate";
