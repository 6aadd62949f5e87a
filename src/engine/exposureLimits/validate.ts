/**
 * Domain checks for exposure requests. Everything here throws
 * ExposureDomainError before any partial computation.
 */

import { exposureLimits } from "@/config/exposureLimits";
import type { ExposureRequest } from "@/domain/exposure/exposure.schema";
import { ExposureDomainError } from "@/domain/exposure/exposure.errors";

export function assertExposureRequest(request: ExposureRequest): void {
  const { wavelengthNm, durationS, powerW, pulse } = request;

  if (
    !Number.isFinite(wavelengthNm) ||
    wavelengthNm < exposureLimits.wavelengthMinNm ||
    wavelengthNm > exposureLimits.wavelengthMaxNm
  ) {
    throw new ExposureDomainError(
      "InvalidWavelength",
      `Wavelength ${wavelengthNm} nm is outside ${exposureLimits.wavelengthMinNm}–${exposureLimits.wavelengthMaxNm} nm`
    );
  }
  if (!Number.isFinite(durationS) || durationS <= 0) {
    throw new ExposureDomainError("InvalidDuration", `Exposure duration must be a positive number of seconds, got ${durationS}`);
  }
  if (!Number.isFinite(powerW) || powerW < 0) {
    throw new ExposureDomainError("InvalidPower", `Power must be a non-negative number of watts, got ${powerW}`);
  }
  if (pulse != null) {
    if (!Number.isFinite(pulse.repetitionRateHz) || pulse.repetitionRateHz <= 0) {
      throw new ExposureDomainError("InvalidPulseTrain", `Repetition rate must be positive, got ${pulse.repetitionRateHz}`);
    }
    if (!Number.isFinite(pulse.pulseDurationS) || pulse.pulseDurationS <= 0) {
      throw new ExposureDomainError("InvalidPulseTrain", `Pulse duration must be positive, got ${pulse.pulseDurationS}`);
    }
  }
}

/** Throws NumericOverflow when a computed exposure or limit is not finite. */
export function assertFinite(value: number, label: string): void {
  if (!Number.isFinite(value)) {
    throw new ExposureDomainError("NumericOverflow", `${label} is not finite (${value})`);
  }
}
