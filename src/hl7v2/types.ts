/**
 * HL7v2 wire-level and intermediate representation (IR) types.
 *
 * The IR is the decoded-but-unmapped form of one message. Every field is
 * optional: an empty or missing HL7 field is `undefined`, never "".
 */

export interface HL7v2Segment {
  /** Segment identifier, e.g. "PID" */
  segment: string;
  /** Raw `|`-split values; index 0 holds the segment identifier */
  raw: readonly string[];
}

export type HL7v2Message = readonly HL7v2Segment[];

export interface MessageHeaderRecord {
  readonly sendingApplication?: string;
  readonly sendingFacility?: string;
  readonly timestamp?: string;
  /** MSH-9 as sent, e.g. "ADT^A01" */
  readonly messageType?: string;
  readonly controlId?: string;
  readonly version?: string;
}

export interface PatientRecord {
  readonly mrn?: string;
  readonly family?: string;
  readonly given?: string;
  /** YYYYMMDD */
  readonly dob?: string;
  readonly sex?: string;
}

export interface EncounterRecord {
  readonly setId?: string;
  readonly patientClass?: string;
  readonly location?: string;
  readonly attending?: string;
  readonly hospitalService?: string;
  readonly visitNumber?: string;
  readonly admitTime?: string;
  readonly dischargeTime?: string;
}

export interface EventRecord {
  readonly eventType?: string;
  readonly recordedTime?: string;
  readonly eventOccurredTime?: string;
}

export interface OrderRecord {
  readonly placerOrderNumber?: string;
  readonly fillerOrderNumber?: string;
  readonly testCode?: string;
  readonly testName?: string;
  readonly specimenTime?: string;
  readonly resultTime?: string;
  readonly orderingProvider?: string;
}

export interface ObservationRecord {
  readonly code?: string;
  readonly text?: string;
  /** OBX-2, e.g. "NM", "ST" */
  readonly valueType?: string;
  readonly value?: string;
  readonly unit?: string;
  /** "low-high" as sent */
  readonly referenceRange?: string;
  readonly abnormalFlag?: string;
}

export interface RelatedPersonRecord {
  readonly family?: string;
  readonly given?: string;
  /** NK1-2 as sent, used when the name has no usable components */
  readonly name?: string;
  readonly relationshipCode?: string;
  readonly relationshipText?: string;
  readonly phone?: string;
}

export interface AllergyRecord {
  readonly allergenType?: string;
  readonly allergenCode?: string;
  readonly description?: string;
  readonly severity?: string;
  readonly reaction?: string;
}

export interface ParsedMessage {
  readonly header?: MessageHeaderRecord;
  readonly patient: PatientRecord;
  readonly encounter?: EncounterRecord;
  readonly event?: EventRecord;
  /** Only the first OBR of a message is kept */
  readonly orders: readonly OrderRecord[];
  readonly observations: readonly ObservationRecord[];
  readonly relatedPersons: readonly RelatedPersonRecord[];
  readonly allergies: readonly AllergyRecord[];
}
