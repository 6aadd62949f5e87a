/**
 * Plain-text evaluation report shared by the console session and the API route.
 */

import type { EvaluationResult } from "@/engine/exposureLimits";
import type { HazardKind } from "@/domain/exposure/exposure.schema";
import { exposureLimits } from "@/config/exposureLimits";

const LABEL_WIDTH = 29;

export const HAZARD_LABELS: Record<HazardKind, string> = {
  thermal: "Thermal",
  photochemical: "Photochemical",
};

/** 3 significant digits in exponent form; ∞ for +Infinity. */
export function formatSci(value: number): string {
  if (value === Infinity) return "∞";
  return value.toExponential(2);
}

export function formatMargin(margin: number): string {
  if (margin === Infinity) return "∞ (no exposure)";
  return `${margin.toFixed(1)} × below limit`;
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatExposureReport(result: EvaluationResult): string[] {
  const { request, weighting, effectiveWeighting, limits, margins } = result;
  const lines: string[] = [
    "=== ISO 15004-2:2025 Small-Spot Exposure Evaluation ===",
    row("Wavelength (nm)", String(request.wavelengthNm)),
    row("Exposure duration (s)", formatSci(request.durationS)),
    row("Power at pupil (W)", formatSci(request.powerW)),
    row("Spot diameter (mm)", `${(exposureLimits.spotDiameterM * 1e3).toFixed(2)} (fixed small-spot)`),
    "",
    "--- Spectral weighting ---",
    row("R(λ)", `${weighting.r.toPrecision(4)} (effective ${effectiveWeighting.rEff.toPrecision(4)})`),
    row("B(λ)", weighting.b.toPrecision(4)),
    "",
    "--- Thermal hazard ---",
    row("Radiant exposure (J/m²)", formatSci(limits.thermalExposure)),
    row("Limit (J/m²)", formatSci(limits.thermalLimit)),
    row("Margin", formatMargin(margins.thermal)),
    "",
    "--- Photochemical hazard ---",
    row("Radiant exposure (J/m²)", formatSci(limits.photochemicalExposure)),
    row("Limit (J/m²)", formatSci(limits.photochemicalLimit)),
    row("Margin", formatMargin(margins.photochemical)),
  ];

  if (result.singlePulse && request.pulse) {
    const p = result.singlePulse;
    lines.push(
      "",
      "--- Single-pulse check ---",
      row("Repetition rate (Hz)", formatSci(request.pulse.repetitionRateHz)),
      row("Pulse duration (s)", formatSci(request.pulse.pulseDurationS)),
      row("Pulse energy (J)", formatSci(p.pulseEnergyJ)),
      row("Weighted pulse (J)", formatSci(p.weightedEnergyJ)),
      row("Limit (J)", formatSci(p.limitJ)),
      row("Margin", formatMargin(p.margin))
    );
  }

  lines.push(
    "",
    row("Governing hazard", HAZARD_LABELS[result.governingHazard]),
    row("Margin", formatMargin(result.margin)),
    row("Safe exposure duration (s)", formatSci(result.safeDurationS))
  );
  return lines;
}
