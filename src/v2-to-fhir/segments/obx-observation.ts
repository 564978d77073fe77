/**
 * HL7v2 OBX Segment to FHIR Observation Mapping
 */

import type { CodeableConcept, Observation, ObservationReferenceRange } from "fhir/r4";
import type { ObservationRecord } from "../../hl7v2/types";
import { NonNumericObservationError } from "../../errors";
import type { DerivedId, SessionId } from "../id-generation";
import { referenceTo } from "../id-generation";

const INTERPRETATION_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation";

// Plain decimal with optional sign and exponent; no hex, no "Infinity", no blanks.
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// Numbers
// ============================================================================

/**
 * Parse a decimal string, returning undefined for anything that is not
 * entirely a number or does not fit in a finite double ("1e400").
 * Surrounding whitespace is allowed.
 */
export function parseDecimal(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!DECIMAL_RE.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// ============================================================================
// Reference Range Parsing
// ============================================================================

export interface ParsedReferenceRange {
  low: number;
  high: number;
}

/**
 * Parse OBX-7 "low-high".
 *
 * Splits on the first hyphen after the first character, so a leading minus
 * belongs to the lower bound: "3.5-5.5" → 3.5..5.5, "-5-10" → -5..10,
 * "-10--2" → -10..-2. Returns undefined when there is no hyphen or either
 * side is not a number.
 */
export function parseReferenceRange(range: string | undefined): ParsedReferenceRange | undefined {
  if (!range) return undefined;

  const separator = range.indexOf("-", 1);
  if (separator === -1) return undefined;

  const low = parseDecimal(range.slice(0, separator));
  const high = parseDecimal(range.slice(separator + 1));
  if (low === undefined || high === undefined) return undefined;

  return { low, high };
}

// ============================================================================
// Interpretation
// ============================================================================

/**
 * Display text for OBX-8 abnormal flags (HL7 Table 0078)
 */
function getInterpretationDisplay(code: string): string | undefined {
  const displays: Record<string, string> = {
    H: "High",
    L: "Low",
    A: "Abnormal",
    AA: "Critical abnormal",
    HH: "Critical high",
    LL: "Critical low",
    N: "Normal",
    "<": "Below absolute low-off instrument scale",
    ">": "Above absolute high-off instrument scale",
    I: "Intermediate",
    R: "Resistant",
    S: "Susceptible",
    POS: "Positive",
    NEG: "Negative",
  };

  return displays[code.toUpperCase()];
}

function buildInterpretation(flag: string): CodeableConcept {
  const display = getInterpretationDisplay(flag);
  return {
    coding: [
      {
        system: INTERPRETATION_SYSTEM,
        code: flag,
        ...(display ? { display } : {}),
      },
    ],
  };
}

function buildCode(observation: ObservationRecord, codeSystem: string): CodeableConcept {
  if (!observation.code) {
    return observation.text ? { text: observation.text } : {};
  }

  return {
    coding: [
      {
        system: codeSystem,
        code: observation.code,
        ...(observation.text ? { display: observation.text } : {}),
      },
    ],
  };
}

// ============================================================================
// Main Converter Function
// ============================================================================

export interface ObservationLinks {
  patientId: DerivedId;
  encounterId?: SessionId;
}

/**
 * Convert OBX to Observation.
 *
 * - OBX-2 "NM" -> valueQuantity (value, unit from OBX-6); other types -> valueString
 * - OBX-3      -> code
 * - OBX-7      -> referenceRange (dropped when unparseable)
 * - OBX-8      -> interpretation
 *
 * @throws NonNumericObservationError when OBX-2 is NM and OBX-5 is not a number
 */
export function convertOBXToObservation(
  observation: ObservationRecord,
  id: SessionId,
  links: ObservationLinks,
  codeSystem: string,
): Observation {
  const resource: Observation = {
    resourceType: "Observation",
    id: id.value,
    status: "final",
    code: buildCode(observation, codeSystem),
    subject: referenceTo("Patient", links.patientId),
  };

  if (links.encounterId) {
    resource.encounter = referenceTo("Encounter", links.encounterId);
  }

  const value = observation.value;
  if (value !== undefined) {
    if (observation.valueType === "NM") {
      const numeric = parseDecimal(value);
      if (numeric === undefined) {
        throw new NonNumericObservationError(observation.code, value);
      }
      resource.valueQuantity = {
        value: numeric,
        ...(observation.unit ? { unit: observation.unit } : {}),
      };
    } else {
      resource.valueString = value;
    }
  }

  const range = parseReferenceRange(observation.referenceRange);
  if (range) {
    const referenceRange: ObservationReferenceRange = {
      low: { value: range.low },
      high: { value: range.high },
    };
    resource.referenceRange = [referenceRange];
  }

  if (observation.abnormalFlag) {
    resource.interpretation = [buildInterpretation(observation.abnormalFlag)];
  }

  return resource;
}
