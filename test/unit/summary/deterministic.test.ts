import { describe, test, expect } from "vitest";
import type { Bundle } from "fhir/r4";
import { summarizeBundle } from "../../../src/summary/deterministic";
import { convertToFHIR } from "../../../src/v2-to-fhir/converter";
import { ADT_A01, ORU_R01, makeTestContext } from "../v2-to-fhir/helpers";

describe("summarizeBundle", () => {
  test("patient header and lab observations", () => {
    const bundle = convertToFHIR(ORU_R01, makeTestContext());

    expect(summarizeBundle(bundle)).toBe(
      [
        "Patient: Rick Roe, DOB: 1980-05-15, Sex: male",
        "",
        "Lab Observations:",
        "- Glucose (2345-7): 95 mg/dL",
        "- Note (8251-1): see comment",
      ].join("\n"),
    );
  });

  test("no observations", () => {
    const bundle = convertToFHIR(ADT_A01, makeTestContext());

    expect(summarizeBundle(bundle)).toBe(
      "Patient: Jane Doe, DOB: 1990-01-01, Sex: female\n\nLab Observations:\n- none",
    );
  });

  test("missing details fall back to placeholders", () => {
    const bundle: Bundle = {
      resourceType: "Bundle",
      type: "collection",
      entry: [
        { resource: { resourceType: "Patient", id: "patient-1" } },
        {
          resource: {
            resourceType: "Observation",
            id: "observation-1",
            status: "final",
            code: { text: "Unknown" },
          },
        },
      ],
    };

    expect(summarizeBundle(bundle)).toBe(
      "Patient: Unknown, DOB: Not provided, Sex: Not provided\n\nLab Observations:\n- Unknown (no code): N/A",
    );
  });

  test("empty bundle", () => {
    expect(summarizeBundle({ resourceType: "Bundle", type: "collection" })).toBe(
      "Patient: Unknown, DOB: Not provided, Sex: Not provided\n\nLab Observations:\n- none",
    );
  });
});
