/**
 * FHIR collection bundle assembly.
 */

import type {
  AllergyIntolerance,
  Bundle,
  BundleEntry,
  Coding,
  Encounter,
  FhirResource,
  Observation,
  Patient,
  RelatedPerson,
} from "fhir/r4";
import type { MessageHeaderRecord } from "../hl7v2/types";

export interface ConvertedResources {
  patient: Patient;
  encounter?: Encounter;
  observations: Observation[];
  relatedPersons: RelatedPerson[];
  allergies: AllergyIntolerance[];
}

export function createBundleEntry(resource: FhirResource): BundleEntry {
  return { resource };
}

/**
 * Meta tags carried over from MSH: message control id and message type.
 */
export function extractMetaTags(header: MessageHeaderRecord | undefined): Coding[] {
  const tags: Coding[] = [];
  if (!header) return tags;

  if (header.controlId) {
    tags.push({
      system: "urn:hl7v2:message-id",
      code: header.controlId,
    });
  }

  if (header.messageType) {
    // "ADT^A01^ADT_A01" -> "ADT_A01"
    const [code, event] = header.messageType.split("^");
    tags.push({
      system: "urn:hl7v2:message-type",
      code: code && event ? `${code}_${event}` : header.messageType,
    });
  }

  return tags;
}

/**
 * Build a collection bundle.
 *
 * Entry order: Patient, Encounter, Observations (message order),
 * RelatedPersons, AllergyIntolerances. No deduplication and no reference
 * rewriting; ids are used as assigned by the segment converters.
 */
export function assembleBundle(
  resources: ConvertedResources,
  header?: MessageHeaderRecord,
): Bundle {
  const entries: BundleEntry[] = [];

  // Add Patient (always first)
  entries.push(createBundleEntry(resources.patient));

  if (resources.encounter) {
    entries.push(createBundleEntry(resources.encounter));
  }

  for (const observation of resources.observations) {
    entries.push(createBundleEntry(observation));
  }

  for (const person of resources.relatedPersons) {
    entries.push(createBundleEntry(person));
  }

  for (const allergy of resources.allergies) {
    entries.push(createBundleEntry(allergy));
  }

  const bundle: Bundle = {
    resourceType: "Bundle",
    type: "collection",
    entry: entries,
  };

  const tags = extractMetaTags(header);
  if (tags.length > 0) {
    bundle.meta = { tag: tags };
  }

  return bundle;
}
