import { describe, test, expect } from "vitest";
import type { Observation, Patient } from "fhir/r4";
import { assembleBundle, createBundleEntry, extractMetaTags } from "../../../src/v2-to-fhir/fhir-bundle";

const patient: Patient = { resourceType: "Patient", id: "patient-1" };

function observation(id: string): Observation {
  return { resourceType: "Observation", id, status: "final", code: { text: id } };
}

describe("extractMetaTags", () => {
  test("message id and type", () => {
    expect(extractMetaTags({ controlId: "MSG001", messageType: "ORU^R01^ORU_R01" })).toEqual([
      { system: "urn:hl7v2:message-id", code: "MSG001" },
      { system: "urn:hl7v2:message-type", code: "ORU_R01" },
    ]);
  });

  test("message type without event is kept as sent", () => {
    expect(extractMetaTags({ messageType: "ACK" })).toEqual([{ system: "urn:hl7v2:message-type", code: "ACK" }]);
  });

  test("no header, no tags", () => {
    expect(extractMetaTags(undefined)).toEqual([]);
    expect(extractMetaTags({})).toEqual([]);
  });
});

describe("createBundleEntry", () => {
  test("wraps the resource", () => {
    expect(createBundleEntry(patient)).toEqual({ resource: patient });
  });
});

describe("assembleBundle", () => {
  test("collection bundle with Patient first and observations in order", () => {
    const bundle = assembleBundle({
      patient,
      encounter: {
        resourceType: "Encounter",
        id: "encounter-1",
        status: "in-progress",
        class: { code: "AMB" },
      },
      observations: [observation("observation-2"), observation("observation-3")],
      relatedPersons: [
        { resourceType: "RelatedPerson", id: "related-person-4", patient: { reference: "Patient/patient-1" } },
      ],
      allergies: [
        { resourceType: "AllergyIntolerance", id: "allergy-5", patient: { reference: "Patient/patient-1" } },
      ],
    });

    expect(bundle.resourceType).toBe("Bundle");
    expect(bundle.type).toBe("collection");
    expect(bundle.entry?.map((e) => e.resource?.id)).toEqual([
      "patient-1",
      "encounter-1",
      "observation-2",
      "observation-3",
      "related-person-4",
      "allergy-5",
    ]);
    expect(bundle.meta).toBeUndefined();
  });

  test("Patient alone", () => {
    const bundle = assembleBundle({ patient, observations: [], relatedPersons: [], allergies: [] });

    expect(bundle).toEqual({
      resourceType: "Bundle",
      type: "collection",
      entry: [{ resource: patient }],
    });
  });

  test("header becomes meta tags", () => {
    const bundle = assembleBundle(
      { patient, observations: [], relatedPersons: [], allergies: [] },
      { controlId: "1", messageType: "ADT^A01" },
    );

    expect(bundle.meta).toEqual({
      tag: [
        { system: "urn:hl7v2:message-id", code: "1" },
        { system: "urn:hl7v2:message-type", code: "ADT_A01" },
      ],
    });
  });
});
