/**
 * Fatal conversion errors.
 *
 * Anything thrown from here aborts a conversion and no partial bundle is
 * produced. Structural problems that do not stop conversion are reported as
 * validation issues instead (see src/validation).
 */

export type ConversionErrorCode =
  | "no-patient"
  | "missing-patient-identifier"
  | "non-numeric-value";

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ConversionErrorCode,
  ) {
    super(message);
    this.name = "ConversionError";
  }
}

export class NoPatientError extends ConversionError {
  constructor() {
    super("No PID segment found in HL7 message", "no-patient");
    this.name = "NoPatientError";
  }
}

export class MissingPatientIdentifierError extends ConversionError {
  constructor() {
    super("PID-3 (patient identifier) is missing; cannot derive Patient.id", "missing-patient-identifier");
    this.name = "MissingPatientIdentifierError";
  }
}

export class NonNumericObservationError extends ConversionError {
  constructor(
    public readonly observationCode: string | undefined,
    public readonly rawValue: string,
  ) {
    super(
      `OBX-5 value "${rawValue}" is not a number but OBX-2 declares NM` +
        (observationCode ? ` (observation ${observationCode})` : ""),
      "non-numeric-value",
    );
    this.name = "NonNumericObservationError";
  }
}
