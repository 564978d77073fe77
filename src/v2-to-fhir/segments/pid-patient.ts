/**
 * PID → FHIR Patient
 *
 * Field Mappings:
 * - PID-3.1 -> identifier[0].value, and the content-derived Patient.id
 * - PID-5   -> name[0] (family ^ given)
 * - PID-7   -> birthDate
 * - PID-8   -> gender
 */

import type { HumanName, Patient } from "fhir/r4";
import type { PatientRecord } from "../../hl7v2/types";
import { MissingPatientIdentifierError } from "../../errors";
import type { Hl7v2ToFhirConfig } from "../config";
import { convertDTToDate } from "../datatypes/dtm-datetime";
import { derivePatientId, type DerivedId } from "../id-generation";

/**
 * HL7 Table 0001 collapsed to two values: "F" is female, every other code
 * (M, U, O, blank) is male. No "unknown"/"other" gender is emitted.
 */
export function mapSexToGender(sex: string | undefined): "female" | "male" {
  return sex === "F" ? "female" : "male";
}

function buildName(patient: PatientRecord): HumanName | undefined {
  if (!patient.family && !patient.given) return undefined;

  const name: HumanName = {};
  if (patient.family) name.family = patient.family;
  if (patient.given) name.given = [patient.given];
  return name;
}

export interface ConvertedPatient {
  id: DerivedId;
  resource: Patient;
}

/**
 * @throws MissingPatientIdentifierError when PID-3 carries no MRN
 */
export function convertPIDToPatient(
  patient: PatientRecord,
  config: Hl7v2ToFhirConfig["patient"],
): ConvertedPatient {
  if (!patient.mrn) {
    throw new MissingPatientIdentifierError();
  }

  const id = derivePatientId(patient.mrn, config.idNamespace);

  const resource: Patient = {
    resourceType: "Patient",
    id: id.value,
    identifier: [
      {
        system: config.identifierSystem,
        value: patient.mrn,
      },
    ],
    gender: mapSexToGender(patient.sex),
  };

  const name = buildName(patient);
  if (name) resource.name = [name];

  const birthDate = convertDTToDate(patient.dob);
  if (birthDate) resource.birthDate = birthDate;

  return { id, resource };
}
