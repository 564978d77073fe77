import { describe, test, expect } from "vitest";
import { convertParsedMessage, convertToFHIR, processMessage } from "../../../src/v2-to-fhir/converter";
import { parseMessage } from "../../../src/hl7v2/parser";
import { DEFAULT_CONFIG } from "../../../src/v2-to-fhir/config";
import { randomSessionId } from "../../../src/v2-to-fhir/id-generation";
import {
  MissingPatientIdentifierError,
  NoPatientError,
  NonNumericObservationError,
} from "../../../src/errors";
import { ADT_A01, ADT_A01_PATIENT_ID, ORU_R01, ORU_R01_PATIENT_ID, makeTestContext } from "./helpers";

describe("convertToFHIR", () => {
  test("ADT^A01 yields exactly a Patient and an Encounter", () => {
    const bundle = convertToFHIR(ADT_A01, makeTestContext());

    expect(bundle).toEqual({
      resourceType: "Bundle",
      type: "collection",
      meta: {
        tag: [
          { system: "urn:hl7v2:message-id", code: "1" },
          { system: "urn:hl7v2:message-type", code: "ADT_A01" },
        ],
      },
      entry: [
        {
          resource: {
            resourceType: "Patient",
            id: ADT_A01_PATIENT_ID,
            identifier: [{ system: "http://hospital.example.org/mrn", value: "MRN123" }],
            gender: "female",
            name: [{ family: "Doe", given: ["Jane"] }],
            birthDate: "1990-01-01",
          },
        },
        {
          resource: {
            resourceType: "Encounter",
            id: "encounter-1",
            status: "finished",
            class: {
              system: "http://terminology.hl7.org/CodeSystem/v3-ActCode",
              code: "AMB",
              display: "ambulatory",
            },
            subject: { reference: `Patient/${ADT_A01_PATIENT_ID}` },
            identifier: [
              {
                type: { coding: [{ system: "http://terminology.hl7.org/CodeSystem/v2-0203", code: "VN" }] },
                value: "VIS1",
              },
            ],
            period: { start: "2024-01-01T01:00:00", end: "2024-01-01T02:00:00" },
            participant: [{ individual: { display: "1^Smith^John" } }],
            location: [{ location: { display: "AMB^^^Hosp" } }],
          },
        },
      ],
    });
  });

  test("ORU^R01 with NK1 and AL1", () => {
    const bundle = convertToFHIR(ORU_R01, makeTestContext());
    const resources = bundle.entry?.map((e) => e.resource) ?? [];

    expect(resources.map((r) => `${r?.resourceType}/${r?.id}`)).toEqual([
      `Patient/${ORU_R01_PATIENT_ID}`,
      "Observation/observation-1",
      "Observation/observation-2",
      "RelatedPerson/related-person-3",
      "AllergyIntolerance/allergy-4",
    ]);

    expect(resources[1]).toEqual({
      resourceType: "Observation",
      id: "observation-1",
      status: "final",
      code: { coding: [{ system: "http://loinc.org", code: "2345-7", display: "Glucose" }] },
      subject: { reference: `Patient/${ORU_R01_PATIENT_ID}` },
      valueQuantity: { value: 95, unit: "mg/dL" },
      referenceRange: [{ low: { value: 70 }, high: { value: 99 } }],
      interpretation: [
        {
          coding: [
            {
              system: "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation",
              code: "N",
              display: "Normal",
            },
          ],
        },
      ],
    });
  });

  test("observations reference the encounter when PV1 is present", () => {
    const bundle = convertToFHIR(`${ADT_A01}\rOBX|1|NM|2345-7^Glucose||95|mg/dL`, makeTestContext());
    const observation = bundle.entry?.[2]?.resource;

    expect(observation?.resourceType).toBe("Observation");
    expect(observation?.resourceType === "Observation" && observation.encounter).toEqual({
      reference: "Encounter/encounter-1",
    });
  });

  test("uses the configured observation code system", () => {
    const context = makeTestContext({
      config: { ...DEFAULT_CONFIG, observation: { codeSystem: "http://example.org/lab" } },
    });
    const bundle = convertToFHIR(ORU_R01, context);
    const observation = bundle.entry?.[1]?.resource;

    expect(observation?.resourceType === "Observation" && observation.code.coding?.[0]?.system).toBe(
      "http://example.org/lab",
    );
  });

  test("same MRN gives the same Patient.id while session ids change", () => {
    const context = makeTestContext({ newSessionId: randomSessionId });
    const first = convertToFHIR(ADT_A01, context);
    const second = convertToFHIR(ADT_A01, context);

    expect(first.entry?.[0]?.resource?.id).toBe(ADT_A01_PATIENT_ID);
    expect(second.entry?.[0]?.resource?.id).toBe(ADT_A01_PATIENT_ID);
    expect(first.entry?.[1]?.resource?.id).not.toBe(second.entry?.[1]?.resource?.id);
  });

  test("missing PID is fatal", () => {
    expect(() => convertToFHIR("MSH|^~\\&|A|B\rOBX|1|NM|X||1", makeTestContext())).toThrow(NoPatientError);
  });

  test("missing MRN is fatal", () => {
    expect(() => convertToFHIR("MSH|^~\\&\rPID|1||||Doe^Jane", makeTestContext())).toThrow(
      MissingPatientIdentifierError,
    );
  });

  test("non-numeric NM value is fatal", () => {
    expect(() => convertToFHIR("MSH|^~\\&\rPID|1||MRN123\rOBX|1|NM|X||pending", makeTestContext())).toThrow(
      NonNumericObservationError,
    );
  });

  test("NM value that overflows to infinity is fatal", () => {
    expect(() => convertToFHIR("MSH|^~\\&\rPID|1||MRN1\rOBX|1|NM|X^Y||1e400|mg", makeTestContext())).toThrow(
      NonNumericObservationError,
    );
  });
});

describe("convertParsedMessage", () => {
  test("does not modify the IR", () => {
    const parsed = parseMessage(ORU_R01);
    const before = JSON.stringify(parsed);

    convertParsedMessage(parsed, makeTestContext());

    expect(JSON.stringify(parsed)).toBe(before);
  });
});

describe("processMessage", () => {
  const PID_BEFORE_MSH = ["PID|1||MRN123||Doe^Jane", "MSH|^~\\&|LAB|HOSP|||20240101||ORU^R01|1|P|2.5"].join("\r");

  test("strict mode refuses invalid messages", () => {
    const result = processMessage(PID_BEFORE_MSH, { mode: "strict", context: makeTestContext() });

    expect(result).toEqual({
      status: "invalid",
      issues: [{ severity: "error", message: "PID appears before MSH (invalid order)" }],
    });
  });

  test("lenient mode converts and reports issues", () => {
    const result = processMessage(PID_BEFORE_MSH, { mode: "lenient", context: makeTestContext() });

    expect(result.status).toBe("converted");
    expect(result.issues).toEqual([{ severity: "error", message: "PID appears before MSH (invalid order)" }]);
    if (result.status === "converted") {
      expect(result.parsed.patient.mrn).toBe("MRN123");
      expect(result.bundle.entry).toHaveLength(1);
    }
  });

  test("lenient is the default", () => {
    expect(processMessage(PID_BEFORE_MSH, { context: makeTestContext() }).status).toBe("converted");
  });

  test("warnings do not block strict mode", () => {
    const result = processMessage(ADT_A01, { mode: "strict", context: makeTestContext() });

    expect(result.status).toBe("converted");
    expect(result.issues).toEqual([
      { severity: "warning", message: "Missing recommended segment: EVN (expected in ADT messages)" },
    ]);
  });

  test("fatal conversion errors are returned, not thrown", () => {
    const result = processMessage("MSH|^~\\&|LAB|HOSP|||20240101||ORU^R01|1|P|2.5", { context: makeTestContext() });

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.error).toBeInstanceOf(NoPatientError);
      expect(result.error.code).toBe("no-patient");
    }
    expect(result.issues).toEqual([{ severity: "error", message: "Missing required segment: PID" }]);
  });

  test("strict mode reports a missing PID as invalid", () => {
    const result = processMessage("MSH|^~\\&|LAB|HOSP|||20240101||ORU^R01|1|P|2.5", {
      mode: "strict",
      context: makeTestContext(),
    });

    expect(result.status).toBe("invalid");
  });
});
