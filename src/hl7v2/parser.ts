/**
 * HL7v2 text → intermediate representation.
 *
 * Reads only the segments the converter maps (MSH, PID, PV1, EVN, OBR, OBX,
 * NK1, AL1). Anything else, Z-segments included, is skipped.
 */

import { NoPatientError } from "../errors";
import {
  AL1_LAYOUT,
  EVN_LAYOUT,
  MSH_LAYOUT,
  NK1_LAYOUT,
  OBR_LAYOUT,
  OBX_LAYOUT,
  PID_LAYOUT,
  PV1_LAYOUT,
  readAdmitDischarge,
  readAllergyDescription,
  readLayout,
  type AdmitDischargeStrategy,
} from "./fields";
import { findAllSegments, findLastSegment, findSegment, isBlankLine, parseSegment } from "./segment";
import { splitSegments } from "./tokenizer";
import type { AllergyRecord, EncounterRecord, HL7v2Message, HL7v2Segment, ParsedMessage } from "./types";

export interface ParseOptions {
  admitDischarge?: AdmitDischargeStrategy;
}

export function toSegments(lines: readonly string[]): HL7v2Message {
  return lines.filter((line) => !isBlankLine(line)).map(parseSegment);
}

function decodeEncounter(pv1: HL7v2Segment, strategy: AdmitDischargeStrategy): EncounterRecord {
  return {
    ...readLayout(pv1, PV1_LAYOUT),
    ...readAdmitDischarge(pv1, strategy),
  };
}

function decodeAllergy(al1: HL7v2Segment): AllergyRecord {
  const description = readAllergyDescription(al1);
  return {
    ...readLayout(al1, AL1_LAYOUT),
    ...(description !== undefined ? { description } : {}),
  };
}

/**
 * Decode a message into its IR.
 *
 * Accepts raw text or lines already produced by {@link splitSegments}.
 * When PID, PV1, EVN or MSH repeat, the last occurrence wins; only the first
 * OBR is kept.
 *
 * @throws NoPatientError when the message has no PID segment
 */
export function parseMessage(
  input: string | readonly string[],
  options: ParseOptions = {},
): ParsedMessage {
  const lines = typeof input === "string" ? splitSegments(input) : input;
  const message = toSegments(lines);
  const strategy = options.admitDischarge ?? "trailing-non-empty";

  const pidSegment = findLastSegment(message, "PID");
  if (!pidSegment) {
    throw new NoPatientError();
  }

  const mshSegment = findLastSegment(message, "MSH");
  const pv1Segment = findLastSegment(message, "PV1");
  const evnSegment = findLastSegment(message, "EVN");
  const obrSegment = findSegment(message, "OBR");

  return {
    header: mshSegment ? readLayout(mshSegment, MSH_LAYOUT) : undefined,
    patient: readLayout(pidSegment, PID_LAYOUT),
    encounter: pv1Segment ? decodeEncounter(pv1Segment, strategy) : undefined,
    event: evnSegment ? readLayout(evnSegment, EVN_LAYOUT) : undefined,
    orders: obrSegment ? [readLayout(obrSegment, OBR_LAYOUT)] : [],
    observations: findAllSegments(message, "OBX").map((obx) => readLayout(obx, OBX_LAYOUT)),
    relatedPersons: findAllSegments(message, "NK1").map((nk1) => readLayout(nk1, NK1_LAYOUT)),
    allergies: findAllSegments(message, "AL1").map(decodeAllergy),
  };
}
