/**
 * HL7v2 to FHIR conversion pipeline
 *
 * tokenize → decode (IR) → map → assemble, with structural validation run
 * alongside. Each stage is also exported on its own; `processMessage` wires
 * them for callers that want a strict or lenient pipeline in one call.
 */

import type { Bundle } from "fhir/r4";
import { ConversionError } from "../errors";
import { parseMessage } from "../hl7v2/parser";
import { splitSegments } from "../hl7v2/tokenizer";
import type { ParsedMessage } from "../hl7v2/types";
import { hasBlockingIssues, validateHL7Lines, type ValidationIssue } from "../validation/validator";
import { createConverterContext, type ConverterContext } from "./converter-context";
import { assembleBundle } from "./fhir-bundle";
import { convertAL1ToAllergyIntolerance } from "./segments/al1-allergyintolerance";
import { convertNK1ToRelatedPerson } from "./segments/nk1-relatedperson";
import { convertOBXToObservation } from "./segments/obx-observation";
import { convertPIDToPatient } from "./segments/pid-patient";
import { convertPV1ToEncounter } from "./segments/pv1-encounter";

// ============================================================================
// Mapping
// ============================================================================

/**
 * Map an already decoded message to a FHIR collection bundle.
 *
 * Patient.id is derived from the MRN; every other id comes from
 * `context.newSessionId` and differs between calls.
 *
 * @throws MissingPatientIdentifierError when PID-3 is empty
 * @throws NonNumericObservationError when an NM observation value is not a number
 */
export function convertParsedMessage(
  parsed: ParsedMessage,
  context: ConverterContext = createConverterContext(),
): Bundle {
  const { config, newSessionId } = context;

  const patient = convertPIDToPatient(parsed.patient, config.patient);

  const encounterId = parsed.encounter ? newSessionId("encounter") : undefined;
  const encounter =
    parsed.encounter && encounterId
      ? convertPV1ToEncounter(parsed.encounter, parsed.event, encounterId, patient.id)
      : undefined;

  const observations = parsed.observations.map((obx) =>
    convertOBXToObservation(
      obx,
      newSessionId("observation"),
      { patientId: patient.id, encounterId },
      config.observation.codeSystem,
    ),
  );

  const relatedPersons = parsed.relatedPersons.map((nk1) =>
    convertNK1ToRelatedPerson(nk1, newSessionId("related-person"), patient.id),
  );

  const allergies = parsed.allergies.map((al1) =>
    convertAL1ToAllergyIntolerance(al1, newSessionId("allergy"), patient.id),
  );

  return assembleBundle(
    {
      patient: patient.resource,
      encounter,
      observations,
      relatedPersons,
      allergies,
    },
    parsed.header,
  );
}

/**
 * Convert raw HL7v2 text to a FHIR Bundle without validation gating.
 *
 * @throws ConversionError (NoPatientError, MissingPatientIdentifierError,
 *   NonNumericObservationError) on fatal input
 */
export function convertToFHIR(
  message: string,
  context: ConverterContext = createConverterContext(),
): Bundle {
  const parsed = parseMessage(message, {
    admitDischarge: context.config.pv1.admitDischarge,
  });
  return convertParsedMessage(parsed, context);
}

// ============================================================================
// Pipeline
// ============================================================================

export type PipelineMode = "strict" | "lenient";

export type ConversionResult =
  | {
      status: "converted";
      parsed: ParsedMessage;
      bundle: Bundle;
      issues: ValidationIssue[];
    }
  | {
      /** Strict mode only: validation found errors, nothing was converted */
      status: "invalid";
      issues: ValidationIssue[];
    }
  | {
      status: "failed";
      error: ConversionError;
      issues: ValidationIssue[];
    };

export interface ProcessOptions {
  /** "strict" gates conversion on validation errors; "lenient" reports them alongside */
  mode?: PipelineMode;
  context?: ConverterContext;
}

/**
 * Validate and convert one message.
 *
 * Fatal conversion errors are returned as `status: "failed"`; anything that
 * is not a ConversionError (a bug, a config failure) is rethrown.
 */
export function processMessage(message: string, options: ProcessOptions = {}): ConversionResult {
  const mode = options.mode ?? "lenient";
  const context = options.context ?? createConverterContext();

  const lines = splitSegments(message);
  const issues = validateHL7Lines(lines);

  if (mode === "strict" && hasBlockingIssues(issues)) {
    return { status: "invalid", issues };
  }

  try {
    const parsed = parseMessage(lines, {
      admitDischarge: context.config.pv1.admitDischarge,
    });
    const bundle = convertParsedMessage(parsed, context);
    return { status: "converted", parsed, bundle, issues };
  } catch (error) {
    if (error instanceof ConversionError) {
      return { status: "failed", error, issues };
    }
    throw error;
  }
}

export default convertToFHIR;
