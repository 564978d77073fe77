/**
 * Declarative field layouts for the segments the converter reads.
 *
 * Each layout maps an IR property to an HL7 field (1-based) and, for
 * composite fields, a component. Adding a field to the IR is an entry here,
 * not new indexing code in the decoder.
 */

import type {
  AllergyRecord,
  EncounterRecord,
  EventRecord,
  HL7v2Segment,
  MessageHeaderRecord,
  ObservationRecord,
  OrderRecord,
  PatientRecord,
  RelatedPersonRecord,
} from "./types";
import { getComponent, getField } from "./segment";

export interface FieldDescriptor<K extends string> {
  key: K;
  field: number;
  /** Component of a `^`-delimited field; the whole field when omitted */
  component?: number;
}

export type SegmentLayout<K extends string> = readonly FieldDescriptor<K>[];

// ============================================================================
// Layouts
// ============================================================================

export const MSH_LAYOUT: SegmentLayout<keyof MessageHeaderRecord> = [
  { key: "sendingApplication", field: 3, component: 1 },
  { key: "sendingFacility", field: 4, component: 1 },
  { key: "timestamp", field: 7 },
  { key: "messageType", field: 9 },
  { key: "controlId", field: 10 },
  { key: "version", field: 12 },
];

export const PID_LAYOUT: SegmentLayout<keyof PatientRecord> = [
  { key: "mrn", field: 3, component: 1 },
  { key: "family", field: 5, component: 1 },
  { key: "given", field: 5, component: 2 },
  { key: "dob", field: 7 },
  { key: "sex", field: 8 },
];

export const OBR_LAYOUT: SegmentLayout<keyof OrderRecord> = [
  { key: "placerOrderNumber", field: 2 },
  { key: "fillerOrderNumber", field: 3 },
  { key: "testCode", field: 4, component: 1 },
  { key: "testName", field: 4, component: 2 },
  { key: "specimenTime", field: 5 },
  { key: "resultTime", field: 6 },
  { key: "orderingProvider", field: 13 },
];

export const OBX_LAYOUT: SegmentLayout<keyof ObservationRecord> = [
  { key: "valueType", field: 2 },
  { key: "code", field: 3, component: 1 },
  { key: "text", field: 3, component: 2 },
  { key: "value", field: 5 },
  { key: "unit", field: 6 },
  { key: "referenceRange", field: 7 },
  { key: "abnormalFlag", field: 8 },
];

/** Admit/discharge times are not positional, see {@link readAdmitDischarge}. */
export const PV1_LAYOUT: SegmentLayout<Exclude<keyof EncounterRecord, "admitTime" | "dischargeTime">> = [
  { key: "setId", field: 1 },
  { key: "patientClass", field: 2 },
  { key: "location", field: 3 },
  { key: "attending", field: 7 },
  { key: "hospitalService", field: 10 },
  { key: "visitNumber", field: 18 },
];

export const EVN_LAYOUT: SegmentLayout<keyof EventRecord> = [
  { key: "eventType", field: 1 },
  { key: "recordedTime", field: 2 },
  { key: "eventOccurredTime", field: 6 },
];

export const NK1_LAYOUT: SegmentLayout<keyof RelatedPersonRecord> = [
  { key: "name", field: 2 },
  { key: "family", field: 2, component: 1 },
  { key: "given", field: 2, component: 2 },
  { key: "relationshipCode", field: 3, component: 1 },
  { key: "relationshipText", field: 3, component: 2 },
  { key: "phone", field: 5, component: 1 },
];

export const AL1_LAYOUT: SegmentLayout<Exclude<keyof AllergyRecord, "description">> = [
  { key: "allergenType", field: 2, component: 1 },
  { key: "allergenCode", field: 3, component: 1 },
  { key: "severity", field: 4, component: 1 },
  { key: "reaction", field: 5 },
];

// ============================================================================
// Readers
// ============================================================================

export function readLayout<K extends string>(
  segment: HL7v2Segment,
  layout: SegmentLayout<K>,
): Partial<Record<K, string>> {
  const result: Partial<Record<K, string>> = {};

  for (const descriptor of layout) {
    const field = getField(segment, descriptor.field);
    const value =
      descriptor.component === undefined
        ? field
        : getComponent(field, descriptor.component);
    if (value !== undefined) {
      result[descriptor.key] = value;
    }
  }

  return result;
}

/**
 * How PV1 admit/discharge times are located.
 *
 * - `trailing-non-empty`: the last two non-empty fields of the segment.
 *   Matches feeds that truncate PV1 right after the discharge time, at the
 *   cost of misreading any populated optional field in their place.
 * - `fixed-position`: PV1-44 (admit) and PV1-45 (discharge).
 */
export type AdmitDischargeStrategy = "trailing-non-empty" | "fixed-position";

export const ADMIT_DISCHARGE_STRATEGIES: readonly AdmitDischargeStrategy[] = [
  "trailing-non-empty",
  "fixed-position",
];

export interface AdmitDischarge {
  admitTime?: string;
  dischargeTime?: string;
}

export function readAdmitDischarge(
  pv1: HL7v2Segment,
  strategy: AdmitDischargeStrategy,
): AdmitDischarge {
  if (strategy === "fixed-position") {
    const result: AdmitDischarge = {};
    const admitTime = getComponent(getField(pv1, 44), 1);
    const dischargeTime = getComponent(getField(pv1, 45), 1);
    if (admitTime !== undefined) result.admitTime = admitTime;
    if (dischargeTime !== undefined) result.dischargeTime = dischargeTime;
    return result;
  }

  const nonEmpty = pv1.raw.slice(1).filter((value) => value !== "");
  const admitTime = nonEmpty[nonEmpty.length - 2];
  const dischargeTime = nonEmpty[nonEmpty.length - 1];
  if (admitTime === undefined || dischargeTime === undefined) return {};

  return { admitTime, dischargeTime };
}

/** AL1-3 text when sent, otherwise the allergen code. */
export function readAllergyDescription(al1: HL7v2Segment): string | undefined {
  const allergen = getField(al1, 3);
  return getComponent(allergen, 2) ?? getComponent(allergen, 1);
}
