/**
 * String-input adapter: parses user-entered values and runs the engine.
 * Domain errors become { ok: false } so callers can re-prompt.
 */

import { evaluateExposure } from "@/engine/exposureLimits";
import type { EvaluationResult } from "@/engine/exposureLimits";
import type { ExposureErrorKind } from "@/domain/exposure/exposure.errors";
import { isExposureDomainError } from "@/domain/exposure/exposure.errors";
import type { ExposureRequest } from "@/domain/exposure/exposure.schema";
import { parseMetricValue } from "./metricPrefix";

export type ExposureInput = {
  /** Plain number of nm, e.g. "450". */
  wavelength: string;
  /** Watts with optional prefix, e.g. "5u". */
  power: string;
  /** Seconds with optional prefix, e.g. "100m". */
  duration: string;
  /** Optional pulse train; both blank means continuous wave. */
  repetitionRate?: string;
  pulseDuration?: string;
};

export type ExposureInputResult =
  | { ok: true; result: EvaluationResult }
  | { ok: false; error: string; kind?: ExposureErrorKind };

function parseField(label: string, text: string): { ok: true; value: number } | { ok: false; error: string } {
  const parsed = parseMetricValue(text);
  return parsed.ok ? parsed : { ok: false, error: `${label}: ${parsed.error}` };
}

export function parseExposureInput(input: ExposureInput): { ok: true; request: ExposureRequest } | { ok: false; error: string } {
  const wavelengthText = input.wavelength.trim();
  const wavelengthNm = wavelengthText === "" ? NaN : Number(wavelengthText);
  if (!Number.isFinite(wavelengthNm)) {
    return { ok: false, error: `Wavelength: not a number: "${wavelengthText}"` };
  }

  const power = parseField("Power", input.power);
  if (!power.ok) return power;
  const duration = parseField("Duration", input.duration);
  if (!duration.ok) return duration;

  const rateText = input.repetitionRate?.trim() ?? "";
  const pulseText = input.pulseDuration?.trim() ?? "";
  if (rateText === "" && pulseText === "") {
    return { ok: true, request: { wavelengthNm, powerW: power.value, durationS: duration.value } };
  }

  const rate = parseField("Repetition rate", rateText);
  if (!rate.ok) return rate;
  const pulse = parseField("Pulse duration", pulseText);
  if (!pulse.ok) return pulse;

  return {
    ok: true,
    request: {
      wavelengthNm,
      powerW: power.value,
      durationS: duration.value,
      pulse: { repetitionRateHz: rate.value, pulseDurationS: pulse.value },
    },
  };
}

export function evaluateFromInput(input: ExposureInput): ExposureInputResult {
  const parsed = parseExposureInput(input);
  if (!parsed.ok) return parsed;
  try {
    return { ok: true, result: evaluateExposure(parsed.request) };
  } catch (e) {
    if (isExposureDomainError(e)) return { ok: false, error: e.message, kind: e.kind };
    throw e;
  }
}
