/**
 * Single-pulse weighted energy check for pulse trains.
 */

import { exposureLimits } from "@/config/exposureLimits";
import type { PulseTrain } from "@/domain/exposure/exposure.schema";
import { substituteThermalWeighting } from "./substitution";
import type { SinglePulseCheck } from "./types";

/**
 * Pulse energy E = P / f, weighted by R(λ) substituted against the pulse
 * duration (so ultrashort pulses lift R < 1 to 1), compared with 40 nJ.
 */
export function checkSinglePulse(r: number, powerW: number, pulse: PulseTrain): SinglePulseCheck {
  const pulseEnergyJ = powerW / pulse.repetitionRateHz;
  const rPulse = substituteThermalWeighting(r, pulse.pulseDurationS);
  const weightedEnergyJ = rPulse * pulseEnergyJ;
  const limitJ = exposureLimits.singlePulseLimitJ;
  return {
    pulseEnergyJ,
    rPulse,
    weightedEnergyJ,
    limitJ,
    margin: weightedEnergyJ > 0 ? limitJ / weightedEnergyJ : Infinity,
  };
}
