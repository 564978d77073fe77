/**
 * HL7v2 to FHIR R4 bridge: public API.
 */

export { normalizeLineEndings, splitSegments } from "./hl7v2/tokenizer";
export { parseSegment, getField, getComponent, findSegment, findAllSegments } from "./hl7v2/segment";
export { parseMessage, type ParseOptions } from "./hl7v2/parser";
export type {
  HL7v2Segment,
  HL7v2Message,
  MessageHeaderRecord,
  PatientRecord,
  EncounterRecord,
  EventRecord,
  OrderRecord,
  ObservationRecord,
  RelatedPersonRecord,
  AllergyRecord,
  ParsedMessage,
} from "./hl7v2/types";
export type { AdmitDischargeStrategy } from "./hl7v2/fields";

export {
  validateHL7Lines,
  validateMessage,
  hasBlockingIssues,
  formatIssue,
  type ValidationIssue,
} from "./validation/validator";

export {
  convertParsedMessage,
  convertToFHIR,
  processMessage,
  type ConversionResult,
  type PipelineMode,
  type ProcessOptions,
} from "./v2-to-fhir/converter";
export { createConverterContext, type ConverterContext } from "./v2-to-fhir/converter-context";
export {
  hl7v2ToFhirConfig,
  clearConfigCache,
  parseConfig,
  DEFAULT_CONFIG,
  type Hl7v2ToFhirConfig,
} from "./v2-to-fhir/config";
export {
  derivePatientId,
  randomSessionId,
  sequentialSessionIds,
  type DerivedId,
  type SessionId,
  type ResourceId,
  type SessionIdFactory,
} from "./v2-to-fhir/id-generation";
export { assembleBundle } from "./v2-to-fhir/fhir-bundle";

export {
  ConversionError,
  NoPatientError,
  MissingPatientIdentifierError,
  NonNumericObservationError,
  type ConversionErrorCode,
} from "./errors";

export { summarizeBundle } from "./summary/deterministic";
export { runCli, type CliIO } from "./cli";
