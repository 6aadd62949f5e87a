/**
 * Interactive evaluation loop, independent of the terminal so it can be driven by tests.
 */

import { evaluateFromInput } from "@/lib/exposureInput";
import { formatExposureReport } from "@/lib/exposureReport";
import { dlog, dwarn } from "@/lib/debug";

export type SessionIO = {
  /** Resolves null at end of input. */
  ask: (prompt: string) => Promise<string | null>;
  write: (line: string) => void;
};

const QUIT = "q";

/** Returns the number of successful evaluations. */
export async function runExposureSession(io: SessionIO): Promise<number> {
  let evaluated = 0;

  for (;;) {
    const wavelength = await io.ask("Enter wavelength (nm, 400–500, q to quit): ");
    if (wavelength === null || wavelength.trim() === QUIT) break;
    const power = await io.ask("Enter power at pupil (e.g. 5u for 5 µW): ");
    if (power === null) break;
    const duration = await io.ask("Enter exposure duration (e.g. 100m for 100 ms): ");
    if (duration === null) break;
    const repetitionRate = await io.ask("Pulse repetition rate (e.g. 59M, blank for CW): ");
    if (repetitionRate === null) break;
    const pulseDuration =
      repetitionRate.trim() === "" ? "" : await io.ask("Pulse duration (e.g. 6p for 6 ps): ");
    if (pulseDuration === null) break;

    const outcome = evaluateFromInput({ wavelength, power, duration, repetitionRate, pulseDuration });
    if (!outcome.ok) {
      dwarn("[cli] rejected input", { kind: outcome.kind ?? "ParseError" });
      io.write(`Error: ${outcome.error}`);
      io.write("");
      continue;
    }

    evaluated++;
    dlog("[cli] evaluated", { governing: outcome.result.governingHazard, margin: outcome.result.margin });
    io.write("");
    for (const line of formatExposureReport(outcome.result)) io.write(line);
    io.write("");
  }

  return evaluated;
}
