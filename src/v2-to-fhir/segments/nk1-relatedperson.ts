/**
 * HL7v2 NK1 Segment to FHIR RelatedPerson Mapping
 *
 * Field Mappings:
 * - NK1-2 -> name[0] (family ^ given, or the raw text when neither is sent)
 * - NK1-3 -> relationship[0] (HL7 Table 0063)
 * - NK1-5 -> telecom[0] (phone)
 */

import type { CodeableConcept, HumanName, RelatedPerson } from "fhir/r4";
import type { RelatedPersonRecord } from "../../hl7v2/types";
import type { DerivedId, SessionId } from "../id-generation";
import { referenceTo } from "../id-generation";

const RELATIONSHIP_SYSTEM = "http://terminology.hl7.org/CodeSystem/v2-0063";

function buildName(person: RelatedPersonRecord): HumanName | undefined {
  if (person.family || person.given) {
    const name: HumanName = {};
    if (person.family) name.family = person.family;
    if (person.given) name.given = [person.given];
    return name;
  }
  return person.name ? { text: person.name } : undefined;
}

function buildRelationship(person: RelatedPersonRecord): CodeableConcept | undefined {
  if (person.relationshipCode) {
    return {
      coding: [
        {
          system: RELATIONSHIP_SYSTEM,
          code: person.relationshipCode,
          ...(person.relationshipText ? { display: person.relationshipText } : {}),
        },
      ],
      ...(person.relationshipText ? { text: person.relationshipText } : {}),
    };
  }
  return person.relationshipText ? { text: person.relationshipText } : undefined;
}

export function convertNK1ToRelatedPerson(
  person: RelatedPersonRecord,
  id: SessionId,
  patientId: DerivedId,
): RelatedPerson {
  const resource: RelatedPerson = {
    resourceType: "RelatedPerson",
    id: id.value,
    patient: referenceTo("Patient", patientId),
  };

  const relationship = buildRelationship(person);
  if (relationship) resource.relationship = [relationship];

  const name = buildName(person);
  if (name) resource.name = [name];

  if (person.phone) {
    resource.telecom = [{ system: "phone", value: person.phone }];
  }

  return resource;
}
