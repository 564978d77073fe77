/**
 * Total accessors over raw segments.
 *
 * Every accessor returns `undefined` for an out-of-range position or an empty
 * value, so a short or malformed segment decodes to fewer values instead of
 * failing.
 */

import type { HL7v2Message, HL7v2Segment } from "./types";

export const FIELD_SEPARATOR = "|";
export const COMPONENT_SEPARATOR = "^";

export function parseSegment(line: string): HL7v2Segment {
  const raw = line.split(FIELD_SEPARATOR);
  return { segment: raw[0] ?? "", raw };
}

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

/**
 * Index in the `|`-split array that holds field `n`.
 *
 * MSH-1 is the field separator itself, so the value after the first pipe
 * (the encoding characters) is MSH-2 and MSH-n sits one position earlier
 * than field n of any other segment.
 */
export function fieldIndex(segmentId: string, n: number): number {
  return segmentId === "MSH" ? n - 1 : n;
}

/** Raw field `n` (1-based, HL7 numbering), or undefined when absent or empty. */
export function getField(segment: HL7v2Segment, n: number): string | undefined {
  if (!Number.isInteger(n) || n < 1) return undefined;
  if (segment.segment === "MSH" && n === 1) return FIELD_SEPARATOR;

  const value = segment.raw[fieldIndex(segment.segment, n)];
  return value === undefined || value === "" ? undefined : value;
}

/** Component `n` (1-based) of a `^`-delimited field value. */
export function getComponent(field: string | undefined, n: number): string | undefined {
  if (field === undefined || !Number.isInteger(n) || n < 1) return undefined;

  const value = field.split(COMPONENT_SEPARATOR)[n - 1];
  return value === undefined || value === "" ? undefined : value;
}

/** Number of fields the segment carries, in HL7 numbering. */
export function fieldCount(segment: HL7v2Segment): number {
  return segment.segment === "MSH" ? segment.raw.length : segment.raw.length - 1;
}

export function findSegment(message: HL7v2Message, name: string): HL7v2Segment | undefined {
  return message.find((s) => s.segment === name);
}

export function findLastSegment(message: HL7v2Message, name: string): HL7v2Segment | undefined {
  for (let i = message.length - 1; i >= 0; i--) {
    const segment = message[i];
    if (segment?.segment === name) return segment;
  }
  return undefined;
}

export function findAllSegments(message: HL7v2Message, name: string): HL7v2Segment[] {
  return message.filter((s) => s.segment === name);
}
