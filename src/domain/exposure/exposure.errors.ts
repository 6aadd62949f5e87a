export type ExposureErrorKind =
  | "InvalidWavelength"
  | "InvalidDuration"
  | "InvalidPower"
  | "InvalidPulseTrain"
  | "NumericOverflow";

/** Raised by the engine for any input or result outside the modeled domain. */
export class ExposureDomainError extends Error {
  readonly kind: ExposureErrorKind;

  constructor(kind: ExposureErrorKind, message: string) {
    super(message);
    this.name = "ExposureDomainError";
    this.kind = kind;
  }
}

export function isExposureDomainError(e: unknown): e is ExposureDomainError {
  return e instanceof ExposureDomainError;
}
