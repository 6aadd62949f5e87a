import { z } from "zod";

/**
 * Hazard mechanisms (thermal is listed first and wins ties)
 */
export const HazardKindSchema = z.enum(["thermal", "photochemical"]);
export type HazardKind = z.infer<typeof HazardKindSchema>;

/**
 * Optional pulse train: repetition rate and single-pulse duration.
 */
export const PulseTrainSchema = z.object({
  repetitionRateHz: z.number(),
  pulseDurationS: z.number(),
});
export type PulseTrain = z.infer<typeof PulseTrainSchema>;

/**
 * Request shape only; domain ranges are checked by the engine so that
 * out-of-range values surface as ExposureDomainError kinds.
 */
export const ExposureRequestSchema = z.object({
  wavelengthNm: z.number(),
  durationS: z.number(),
  powerW: z.number(),
  pulse: PulseTrainSchema.optional(),
});
export type ExposureRequest = z.infer<typeof ExposureRequestSchema>;

/**
 * Weighting table rows (R = thermal, B = blue-light)
 */
export const WeightingKnotSchema = z.object({
  wavelengthNm: z.number().finite(),
  r: z.number().finite().min(0),
  b: z.number().finite().min(0),
});
export type WeightingKnot = z.infer<typeof WeightingKnotSchema>;

export const WeightingTableSchema = z.object({
  description: z.string().optional(),
  knots: z.array(WeightingKnotSchema).min(2),
});
export type WeightingTable = z.infer<typeof WeightingTableSchema>;
