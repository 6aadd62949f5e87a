import { describe, it } from "node:test";
import assert from "node:assert";
import { formatExposureReport, formatMargin, formatSci } from "./exposureReport";
import { evaluateExposure } from "@/engine/exposureLimits";

describe("formatSci", () => {
  it("prints three significant digits", () => {
    assert.strictEqual(formatSci(707.355302630646), "7.07e+2");
    assert.strictEqual(formatSci(5e-6), "5.00e-6");
    assert.strictEqual(formatSci(Infinity), "∞");
  });
});

describe("formatMargin", () => {
  it("prints one decimal or the no-exposure marker", () => {
    assert.strictEqual(formatMargin(33.086986458020164), "33.1 × below limit");
    assert.strictEqual(formatMargin(Infinity), "∞ (no exposure)");
  });
});

describe("formatExposureReport", () => {
  it("lays out the 450 nm / 0.1 s / 5 µW evaluation", () => {
    const lines = formatExposureReport(evaluateExposure({ wavelengthNm: 450, durationS: 0.1, powerW: 5e-6 }));
    assert.deepStrictEqual(lines, [
      "=== ISO 15004-2:2025 Small-Spot Exposure Evaluation ===",
      "Wavelength (nm):             450",
      "Exposure duration (s):       1.00e-1",
      "Power at pupil (W):          5.00e-6",
      "Spot diameter (mm):          0.03 (fixed small-spot)",
      "",
      "--- Spectral weighting ---",
      "R(λ):                        9.400 (effective 9.400)",
      "B(λ):                        0.9400",
      "",
      "--- Thermal hazard ---",
      "Radiant exposure (J/m²):     7.07e+2",
      "Limit (J/m²):                4.55e+4",
      "Margin:                      64.3 × below limit",
      "",
      "--- Photochemical hazard ---",
      "Radiant exposure (J/m²):     7.07e+2",
      "Limit (J/m²):                2.34e+4",
      "Margin:                      33.1 × below limit",
      "",
      "Governing hazard:            Photochemical",
      "Margin:                      33.1 × below limit",
      "Safe exposure duration (s):  3.31e+0",
    ]);
  });

  it("prints ∞ for a zero-power evaluation", () => {
    const lines = formatExposureReport(evaluateExposure({ wavelengthNm: 450, durationS: 0.1, powerW: 0 }));
    assert.deepStrictEqual(lines.slice(-3), [
      "Governing hazard:            Thermal",
      "Margin:                      ∞ (no exposure)",
      "Safe exposure duration (s):  ∞",
    ]);
  });

  it("adds the single-pulse section for pulse trains", () => {
    const lines = formatExposureReport(
      evaluateExposure({
        wavelengthNm: 450,
        durationS: 0.1,
        powerW: 5e-6,
        pulse: { repetitionRateHz: 59e6, pulseDurationS: 6e-12 },
      })
    );
    const start = lines.indexOf("--- Single-pulse check ---");
    assert(start > 0);
    assert.deepStrictEqual(lines.slice(start, start + 7), [
      "--- Single-pulse check ---",
      "Repetition rate (Hz):        5.90e+7",
      "Pulse duration (s):          6.00e-12",
      "Pulse energy (J):            8.47e-14",
      "Weighted pulse (J):          7.97e-13",
      "Limit (J):                   4.00e-8",
      "Margin:                      50212.8 × below limit",
    ]);
  });
});
