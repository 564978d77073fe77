/**
 * HL7v2 AL1 Segment to FHIR AllergyIntolerance Mapping
 */

import type { AllergyIntolerance, AllergyIntoleranceReaction, CodeableConcept } from "fhir/r4";
import type { AllergyRecord } from "../../hl7v2/types";
import type { DerivedId, SessionId } from "../id-generation";
import { referenceTo } from "../id-generation";

// ============================================================================
// Code Systems
// ============================================================================

const CLINICAL_STATUS_SYSTEM = "http://terminology.hl7.org/CodeSystem/allergyintolerance-clinical";

// ============================================================================
// Category and Type Mapping (HL7 Table 0127)
// ============================================================================

type AllergyCategory = NonNullable<AllergyIntolerance["category"]>[number];

const CATEGORY_MAP: Record<string, AllergyCategory> = {
  DA: "medication", // Drug allergy
  FA: "food",       // Food allergy
  MA: "medication", // Miscellaneous allergy
  MC: "medication", // Miscellaneous contraindication
  EA: "environment",
  AA: "biologic",   // Animal allergy
  PA: "environment", // Plant allergy
  LA: "environment", // Pollen allergy
};

const TYPE_MAP: Record<string, AllergyIntolerance["type"]> = {
  DA: "allergy",
  FA: "allergy",
  MA: "allergy",
  MC: "intolerance",
  EA: "allergy",
  AA: "allergy",
  PA: "allergy",
  LA: "allergy",
};

// ============================================================================
// Severity Mapping (HL7 Table 0128)
// ============================================================================

const CRITICALITY_MAP: Record<string, AllergyIntolerance["criticality"]> = {
  SV: "high",
  MO: "low",
  MI: "low",
  U: "unable-to-assess",
};

const SEVERITY_MAP: Record<string, AllergyIntoleranceReaction["severity"]> = {
  SV: "severe",
  MO: "moderate",
  MI: "mild",
};

function buildCode(allergy: AllergyRecord): CodeableConcept | undefined {
  if (!allergy.allergenCode && !allergy.description) return undefined;

  const code: CodeableConcept = {};
  if (allergy.allergenCode && allergy.allergenCode !== allergy.description) {
    code.coding = [{ code: allergy.allergenCode }];
  }
  if (allergy.description) code.text = allergy.description;
  return code;
}

/**
 * Convert AL1 to AllergyIntolerance.
 *
 * Field Mappings:
 * - AL1-2 -> category, type
 * - AL1-3 -> code (coding when a separate code is sent, text = description)
 * - AL1-4 -> criticality, reaction.severity
 * - AL1-5 -> reaction.manifestation.text
 *
 * clinicalStatus is always "active" (FHIR constraint ait-1).
 */
export function convertAL1ToAllergyIntolerance(
  allergy: AllergyRecord,
  id: SessionId,
  patientId: DerivedId,
): AllergyIntolerance {
  const resource: AllergyIntolerance = {
    resourceType: "AllergyIntolerance",
    id: id.value,
    clinicalStatus: {
      coding: [{ system: CLINICAL_STATUS_SYSTEM, code: "active" }],
    },
    patient: referenceTo("Patient", patientId),
  };

  const code = buildCode(allergy);
  if (code) resource.code = code;

  const typeCode = allergy.allergenType?.toUpperCase();
  if (typeCode) {
    const category = CATEGORY_MAP[typeCode];
    if (category) resource.category = [category];

    const allergyType = TYPE_MAP[typeCode];
    if (allergyType) resource.type = allergyType;
  }

  const severityCode = allergy.severity?.toUpperCase();
  const criticality = severityCode ? CRITICALITY_MAP[severityCode] : undefined;
  if (criticality) resource.criticality = criticality;

  if (allergy.reaction) {
    const reaction: AllergyIntoleranceReaction = {
      manifestation: [{ text: allergy.reaction }],
    };
    const severity = severityCode ? SEVERITY_MAP[severityCode] : undefined;
    if (severity) reaction.severity = severity;
    resource.reaction = [reaction];
  }

  return resource;
}
