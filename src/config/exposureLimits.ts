/**
 * Central constants for the small-spot exposure limits (ISO 15004-2:2025, Group 1).
 * Lengths in metres, energies in joules, durations in seconds.
 */

export const exposureLimits = {
  /** Valid wavelength band (nm), inclusive. */
  wavelengthMinNm: 400,
  wavelengthMaxNm: 500,

  /** Immobilized-eye retinal spot diameter: 0.03 mm. */
  spotDiameterM: 0.03e-3,

  /** R(λ) substitution: below this pulse duration R < 1 is raised to 1 (strict). */
  ultrashortThresholdS: 1e-11,
  /** R(λ) substitution: above this duration R > 1 is lowered to 1 (strict). */
  longExposureThresholdS: 10,

  /** Thermal weighted-energy limit K·t^0.75 with K = 1.7 mJ. */
  thermalCoefficientJ: 1.7e-3,
  thermalTimeExponent: 0.75,

  /** Blue-light dose limit: 2.2 J/cm² = 2.2e4 J/m². Flat in duration. */
  photochemicalDoseJPerM2: 2.2e4,

  /** Single-pulse weighted energy limit: 40 nJ. */
  singlePulseLimitJ: 40e-9,
} as const;

/** Retinal spot area (m²) for the fixed spot diameter. */
export function spotAreaM2(): number {
  const radius = exposureLimits.spotDiameterM / 2;
  return Math.PI * radius * radius;
}
