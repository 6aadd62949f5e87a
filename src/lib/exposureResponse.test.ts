import { describe, it } from "node:test";
import assert from "node:assert";
import { finiteOrNull, toExposureResponse } from "./exposureResponse";
import { evaluateExposure } from "@/engine/exposureLimits";

describe("finiteOrNull", () => {
  it("keeps finite numbers and nulls the rest", () => {
    assert.strictEqual(finiteOrNull(1.5), 1.5);
    assert.strictEqual(finiteOrNull(0), 0);
    assert.strictEqual(finiteOrNull(Infinity), null);
    assert.strictEqual(finiteOrNull(Number.NaN), null);
  });
});

describe("toExposureResponse", () => {
  it("sends infinite margins and durations as null", () => {
    const response = toExposureResponse(evaluateExposure({ wavelengthNm: 450, durationS: 0.1, powerW: 0 }));
    assert.deepStrictEqual(response.margins, { thermal: null, photochemical: null });
    assert.strictEqual(response.margin, null);
    assert.strictEqual(response.safeDurationS, null);
    assert.strictEqual(response.governingHazard, "thermal");
  });

  it("survives a JSON round trip unchanged", () => {
    const result = evaluateExposure({
      wavelengthNm: 450,
      durationS: 0.1,
      powerW: 5e-6,
      pulse: { repetitionRateHz: 59e6, pulseDurationS: 6e-12 },
    });
    const response = toExposureResponse(result);
    assert.deepStrictEqual(JSON.parse(JSON.stringify(response)), response);
    assert.strictEqual(response.margin, result.margin);
    assert.strictEqual(response.singlePulse?.margin, result.singlePulse?.margin);
  });
});
