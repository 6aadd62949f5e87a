/**
 * Spectral weighting R(λ) / B(λ) from the tabulated knots (pure, deterministic).
 */

import weightingTableJson from "@/data/weightingTable.json";
import { exposureLimits } from "@/config/exposureLimits";
import { WeightingTableSchema } from "@/domain/exposure/exposure.schema";
import type { WeightingKnot } from "@/domain/exposure/exposure.schema";
import { ExposureDomainError } from "@/domain/exposure/exposure.errors";
import type { WeightingFactors } from "./types";

/**
 * Parses and checks a weighting table: knots strictly ascending and spanning
 * exactly the valid wavelength band. Throws on any violation.
 */
export function loadWeightingTable(raw: unknown): readonly WeightingKnot[] {
  const { knots } = WeightingTableSchema.parse(raw);
  for (let i = 1; i < knots.length; i++) {
    if (knots[i]!.wavelengthNm <= knots[i - 1]!.wavelengthNm) {
      throw new Error(`Weighting table not strictly ascending at ${knots[i]!.wavelengthNm} nm`);
    }
  }
  const first = knots[0]!.wavelengthNm;
  const last = knots[knots.length - 1]!.wavelengthNm;
  if (first !== exposureLimits.wavelengthMinNm || last !== exposureLimits.wavelengthMaxNm) {
    throw new Error(
      `Weighting table must span ${exposureLimits.wavelengthMinNm}–${exposureLimits.wavelengthMaxNm} nm, got ${first}–${last} nm`
    );
  }
  return Object.freeze(knots.map((k) => Object.freeze({ ...k })));
}

export const WEIGHTING_TABLE: readonly WeightingKnot[] = loadWeightingTable(weightingTableJson);

/** Log-linear between two positive values; linear when either is 0. */
function interpolate(v0: number, v1: number, f: number): number {
  if (v0 <= 0 || v1 <= 0) return v0 + f * (v1 - v0);
  return Math.exp(Math.log(v0) + f * (Math.log(v1) - Math.log(v0)));
}

/**
 * Returns raw { r, b } at a wavelength: exact table values at knots,
 * log-linear interpolation between them.
 */
export function getWeightingFactors(
  wavelengthNm: number,
  table: readonly WeightingKnot[] = WEIGHTING_TABLE
): WeightingFactors {
  const first = table[0];
  const last = table[table.length - 1];
  if (
    first == null ||
    last == null ||
    !Number.isFinite(wavelengthNm) ||
    wavelengthNm < first.wavelengthNm ||
    wavelengthNm > last.wavelengthNm
  ) {
    throw new ExposureDomainError(
      "InvalidWavelength",
      `Wavelength ${wavelengthNm} nm is outside ${exposureLimits.wavelengthMinNm}–${exposureLimits.wavelengthMaxNm} nm`
    );
  }

  for (let i = 0; i < table.length; i++) {
    const k0 = table[i]!;
    if (k0.wavelengthNm === wavelengthNm) return { r: k0.r, b: k0.b };
    const k1 = table[i + 1];
    if (k1 != null && wavelengthNm < k1.wavelengthNm) {
      const f = (wavelengthNm - k0.wavelengthNm) / (k1.wavelengthNm - k0.wavelengthNm);
      return { r: interpolate(k0.r, k1.r, f), b: interpolate(k0.b, k1.b, f) };
    }
  }

  // Unreachable once the range check passed.
  return { r: last.r, b: last.b };
}
