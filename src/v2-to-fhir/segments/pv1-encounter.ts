/**
 * HL7v2 PV1 (+ EVN) Segment to FHIR Encounter Mapping
 */

import type { Coding, Encounter, Reference } from "fhir/r4";
import type { EncounterRecord, EventRecord } from "../../hl7v2/types";
import { convertDTMToLocalDateTime } from "../datatypes/dtm-datetime";
import type { DerivedId, SessionId } from "../id-generation";
import { referenceTo } from "../id-generation";

// ============================================================================
// Code Systems
// ============================================================================

const ENCOUNTER_CLASS_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ActCode";
const EVENT_TYPE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v2-0003";
const IDENTIFIER_TYPE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v2-0203";

// ============================================================================
// Patient Class Mapping (HL7 Table 0004 -> FHIR Encounter Class)
// ============================================================================

const PATIENT_CLASS_MAP: Record<string, { code: string; display: string }> = {
  I: { code: "IMP", display: "inpatient encounter" },
  O: { code: "AMB", display: "ambulatory" },
  E: { code: "EMER", display: "emergency" },
};

const DEFAULT_CLASS = { code: "AMB", display: "ambulatory" };

/**
 * Map PV1-2 to Encounter.class. Unknown or missing classes are ambulatory.
 */
export function mapPatientClassToFHIR(patientClass: string | undefined): Coding {
  const mapped = (patientClass && PATIENT_CLASS_MAP[patientClass]) || DEFAULT_CLASS;
  return {
    system: ENCOUNTER_CLASS_SYSTEM,
    code: mapped.code,
    display: mapped.display,
  };
}

export function mapEncounterStatus(encounter: EncounterRecord): Encounter["status"] {
  return encounter.dischargeTime ? "finished" : "in-progress";
}

// ============================================================================
// Main Converter Function
// ============================================================================

/**
 * Convert PV1 (and EVN, when present) to an Encounter.
 *
 * Field Mappings:
 * - PV1-2  -> class
 * - PV1-3  -> location[0].location.display
 * - PV1-7  -> participant[0].individual.display
 * - PV1-10 -> serviceType.text
 * - PV1-18 -> identifier[0] (type VN)
 * - admit/discharge -> period.start / period.end, status
 * - EVN-1  -> type[0]
 *
 * Location and attending are display-only; no terminology or directory
 * lookup is done.
 */
export function convertPV1ToEncounter(
  encounter: EncounterRecord,
  event: EventRecord | undefined,
  id: SessionId,
  patientId: DerivedId,
): Encounter {
  const resource: Encounter = {
    resourceType: "Encounter",
    id: id.value,
    status: mapEncounterStatus(encounter),
    class: mapPatientClassToFHIR(encounter.patientClass),
    subject: referenceTo("Patient", patientId),
  };

  if (encounter.visitNumber) {
    resource.identifier = [
      {
        type: {
          coding: [{ system: IDENTIFIER_TYPE_SYSTEM, code: "VN" }],
        },
        value: encounter.visitNumber,
      },
    ];
  }

  if (event?.eventType) {
    resource.type = [
      {
        coding: [{ system: EVENT_TYPE_SYSTEM, code: event.eventType }],
      },
    ];
  }

  if (encounter.hospitalService) {
    resource.serviceType = { text: encounter.hospitalService };
  }

  const start = convertDTMToLocalDateTime(encounter.admitTime);
  const end = convertDTMToLocalDateTime(encounter.dischargeTime);
  if (start || end) {
    resource.period = {};
    if (start) resource.period.start = start;
    if (end) resource.period.end = end;
  }

  if (encounter.attending) {
    const individual: Reference = { display: encounter.attending };
    resource.participant = [{ individual }];
  }

  if (encounter.location) {
    resource.location = [{ location: { display: encounter.location } }];
  }

  return resource;
}
