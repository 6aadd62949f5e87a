import { describe, it } from "node:test";
import assert from "node:assert";
import { getWeightingFactors, loadWeightingTable, WEIGHTING_TABLE } from "./weighting";
import { ExposureDomainError } from "@/domain/exposure/exposure.errors";
import { assertApprox } from "@/test/assertApprox";

function isInvalidWavelength(e: unknown): boolean {
  return e instanceof ExposureDomainError && e.kind === "InvalidWavelength";
}

describe("WEIGHTING_TABLE", () => {
  it("has 21 knots at 5 nm steps from 400 to 500 nm", () => {
    assert.strictEqual(WEIGHTING_TABLE.length, 21);
    WEIGHTING_TABLE.forEach((k, i) => assert.strictEqual(k.wavelengthNm, 400 + 5 * i));
  });

  it("B(λ) peaks at 1 over 435–440 nm", () => {
    const peak = Math.max(...WEIGHTING_TABLE.map((k) => k.b));
    assert.strictEqual(peak, 1);
    const atPeak = WEIGHTING_TABLE.filter((k) => k.b === 1).map((k) => k.wavelengthNm);
    assert.deepStrictEqual(atPeak, [435, 440]);
  });
});

describe("getWeightingFactors", () => {
  it("returns tabulated values exactly at knots", () => {
    assert.deepStrictEqual(getWeightingFactors(450), { r: 9.4, b: 0.94 });
    assert.deepStrictEqual(getWeightingFactors(400), { r: 1.0, b: 0.1 });
    assert.deepStrictEqual(getWeightingFactors(500), { r: 1.0, b: 0.1 });
    for (const knot of WEIGHTING_TABLE) {
      assert.deepStrictEqual(getWeightingFactors(knot.wavelengthNm), { r: knot.r, b: knot.b });
    }
  });

  it("interpolates log-linearly between knots", () => {
    const mid = getWeightingFactors(452.5);
    assertApprox(mid.r, Math.sqrt(9.4 * 9.0), 1e-12, "r(452.5)");
    assertApprox(mid.b, Math.sqrt(0.94 * 0.9), 1e-12, "b(452.5)");

    const quarter = getWeightingFactors(401.25);
    assertApprox(quarter.r, 2 ** 0.25, 1e-12, "r(401.25)");
  });

  it("is continuous at knot wavelengths", () => {
    const below = getWeightingFactors(454.999999);
    const above = getWeightingFactors(455.000001);
    assertApprox(below.r, 9.0, 1e-6, "r just below 455");
    assertApprox(above.r, 9.0, 1e-6, "r just above 455");
    assertApprox(below.b, 0.9, 1e-6, "b just below 455");
    assertApprox(above.b, 0.9, 1e-6, "b just above 455");
  });

  it("is non-negative across the band", () => {
    for (let i = 0; i <= 1000; i++) {
      const wavelengthNm = Math.min(500, 400 + i * 0.1);
      const { r, b } = getWeightingFactors(wavelengthNm);
      assert(r >= 0 && b >= 0, `negative weighting at ${wavelengthNm} nm`);
    }
  });

  it("rejects wavelengths outside 400–500 nm", () => {
    assert.throws(() => getWeightingFactors(399.999), isInvalidWavelength);
    assert.throws(() => getWeightingFactors(500.001), isInvalidWavelength);
    assert.throws(() => getWeightingFactors(Number.NaN), isInvalidWavelength);
  });
});

describe("loadWeightingTable", () => {
  const knot = (wavelengthNm: number, r = 1, b = 0.1) => ({ wavelengthNm, r, b });

  it("accepts an ascending table spanning the band", () => {
    const table = loadWeightingTable({ knots: [knot(400), knot(450, 9.4, 0.94), knot(500)] });
    assert.strictEqual(table.length, 3);
    assert(Object.isFrozen(table));
  });

  it("rejects unsorted knots", () => {
    assert.throws(
      () => loadWeightingTable({ knots: [knot(400), knot(460), knot(450), knot(500)] }),
      /not strictly ascending at 450 nm/
    );
  });

  it("rejects a table that does not span 400–500 nm", () => {
    assert.throws(() => loadWeightingTable({ knots: [knot(400), knot(490)] }), /got 400–490 nm/);
  });

  it("rejects negative weighting values", () => {
    assert.throws(() => loadWeightingTable({ knots: [knot(400, -1), knot(500)] }));
  });
});
