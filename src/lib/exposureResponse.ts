/**
 * JSON-safe view of an EvaluationResult: JSON has no Infinity, so every
 * non-finite number is sent as null (null margin = no exposure).
 */

import type { EvaluationResult } from "@/engine/exposureLimits";

export type JsonSafe<T> = T extends number
  ? number | null
  : T extends string | boolean | null | undefined
    ? T
    : { [K in keyof T]: JsonSafe<T[K]> };

export function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export function toExposureResponse(result: EvaluationResult): JsonSafe<EvaluationResult> {
  const response: JsonSafe<EvaluationResult> = {
    request: result.request,
    weighting: result.weighting,
    effectiveWeighting: result.effectiveWeighting,
    limits: result.limits,
    margins: {
      thermal: finiteOrNull(result.margins.thermal),
      photochemical: finiteOrNull(result.margins.photochemical),
    },
    governingHazard: result.governingHazard,
    margin: finiteOrNull(result.margin),
    safeDurationS: finiteOrNull(result.safeDurationS),
  };
  if (result.singlePulse) {
    response.singlePulse = { ...result.singlePulse, margin: finiteOrNull(result.singlePulse.margin) };
  }
  return response;
}
