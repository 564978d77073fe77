/**
 * Structural validation of HL7v2 segment lines.
 *
 * Every rule runs and every violation is collected. Validation never throws:
 * a malformed line is itself reported as an issue. Whether issues block
 * conversion is the caller's decision.
 */

import { splitSegments } from "../hl7v2/tokenizer";
import { FIELD_SEPARATOR, fieldIndex } from "../hl7v2/segment";

export type ValidationSeverity = "error" | "warning";

export interface ValidationIssue {
  severity: ValidationSeverity;
  message: string;
  /** 1-based line number, for line-level issues */
  line?: number;
}

const SEGMENT_NAME_RE = /^[A-Z][A-Z0-9]{1,2}$/;
const HL7_TIMESTAMP_RE = /^\d{12,14}$/;
const VISIT_NUMBER_RE = /^[A-Za-z0-9-]+$/;

// ============================================================================
// Helpers
// ============================================================================

function segmentName(line: string): string {
  return (line.split(FIELD_SEPARATOR, 1)[0] ?? "").trim();
}

function isValidSegmentName(name: string): boolean {
  return SEGMENT_NAME_RE.test(name) || name.startsWith("Z");
}

/** Trimmed field `n` of a line, or undefined when the line is too short. */
function fieldOf(parts: readonly string[], segment: string, n: number): string | undefined {
  return parts[fieldIndex(segment, n)]?.trim();
}

function error(message: string, line?: number): ValidationIssue {
  return line === undefined ? { severity: "error", message } : { severity: "error", message, line };
}

function warning(message: string): ValidationIssue {
  return { severity: "warning", message };
}

// ============================================================================
// Message-level rules
// ============================================================================

function checkPresence(names: readonly string[], lines: readonly string[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const present = new Set(names);

  if (!present.has("MSH")) issues.push(error("Missing required segment: MSH"));
  if (!present.has("PID")) issues.push(error("Missing required segment: PID"));

  const mshLine = lines[names.indexOf("MSH")];
  const messageType = mshLine === undefined
    ? undefined
    : fieldOf(mshLine.split(FIELD_SEPARATOR), "MSH", 9);

  if (messageType?.startsWith("ADT")) {
    if (!present.has("PV1")) {
      issues.push(error("Missing required segment: PV1 (required for ADT messages)"));
    }
    if (!present.has("EVN")) {
      issues.push(warning("Missing recommended segment: EVN (expected in ADT messages)"));
    }
  }

  if (present.has("OBX") && !present.has("OBR")) {
    issues.push(error("OBX exists but OBR segment is missing"));
  }

  return issues;
}

/** [earlier, later]: `later` must not appear before `earlier` */
const ORDER_RULES: readonly [string, string][] = [
  ["MSH", "PID"],
  ["PID", "OBR"],
  ["OBR", "OBX"],
  ["PID", "PV1"],
  ["PV1", "OBR"],
];

function checkOrdering(names: readonly string[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const [earlier, later] of ORDER_RULES) {
    const earlierIndex = names.indexOf(earlier);
    const laterIndex = names.indexOf(later);
    if (earlierIndex === -1 || laterIndex === -1) continue;

    if (laterIndex < earlierIndex) {
      issues.push(error(`${later} appears before ${earlier} (invalid order)`));
    }
  }

  return issues;
}

// ============================================================================
// Line-level rules
// ============================================================================

function checkRequired(
  parts: readonly string[],
  segment: string,
  n: number,
  label: string,
  lineNumber: number,
): ValidationIssue[] {
  const value = fieldOf(parts, segment, n);
  return value ? [] : [error(`${segment}-${n} (${label}) is missing or empty`, lineNumber)];
}

function checkPattern(
  parts: readonly string[],
  segment: string,
  n: number,
  pattern: RegExp,
  expected: string,
  lineNumber: number,
): ValidationIssue[] {
  const value = fieldOf(parts, segment, n);
  if (!value || pattern.test(value)) return [];
  return [error(`${segment}-${n} must be ${expected}, got '${value}'`, lineNumber)];
}

function checkFields(parts: readonly string[], segment: string, lineNumber: number): ValidationIssue[] {
  switch (segment) {
    case "MSH":
      return checkRequired(parts, segment, 9, "message type", lineNumber);

    case "PID":
      return [
        ...checkRequired(parts, segment, 3, "patient identifier", lineNumber),
        ...checkRequired(parts, segment, 5, "patient name", lineNumber),
      ];

    case "OBR":
      return checkRequired(parts, segment, 4, "test code", lineNumber);

    case "OBX":
      return [
        ...checkRequired(parts, segment, 3, "observation code", lineNumber),
        ...checkRequired(parts, segment, 5, "observation value", lineNumber),
      ];

    case "PV1": {
      const issues = checkRequired(parts, segment, 2, "patient class", lineNumber);
      const patientClass = fieldOf(parts, segment, 2);
      if (patientClass && patientClass.length !== 1) {
        issues.push(error(`PV1-2 (patient class) must be a single character, got '${patientClass}'`, lineNumber));
      }
      return [
        ...issues,
        ...checkPattern(parts, segment, 19, VISIT_NUMBER_RE, "alphanumeric (visit number)", lineNumber),
        ...checkPattern(parts, segment, 44, HL7_TIMESTAMP_RE, "a 12-14 digit timestamp (admit)", lineNumber),
        ...checkPattern(parts, segment, 45, HL7_TIMESTAMP_RE, "a 12-14 digit timestamp (discharge)", lineNumber),
      ];
    }

    case "EVN":
      return [
        ...checkRequired(parts, segment, 1, "event type", lineNumber),
        ...checkPattern(parts, segment, 2, HL7_TIMESTAMP_RE, "a 12-14 digit timestamp (recorded)", lineNumber),
      ];

    default:
      return [];
  }
}

function checkLine(line: string, lineNumber: number): ValidationIssue[] {
  if (line.trim() === "") {
    return [error(`Line ${lineNumber}: Empty or whitespace-only line`, lineNumber)];
  }

  const issues: ValidationIssue[] = [];
  const parts = line.split(FIELD_SEPARATOR);
  const segment = (parts[0] ?? "").trim();

  if (!isValidSegmentName(segment)) {
    issues.push(error(`Line ${lineNumber}: Invalid segment name '${segment}'`, lineNumber));
  }

  if (!line.includes(FIELD_SEPARATOR)) {
    issues.push(error(`Line ${lineNumber}: Segment '${segment}' contains no field separators '|'`, lineNumber));
  }

  return [...issues, ...checkFields(parts, segment, lineNumber)];
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate segment lines as produced by {@link splitSegments}.
 * Returns an empty array when the message is structurally valid.
 */
export function validateHL7Lines(lines: readonly string[]): ValidationIssue[] {
  const names = lines.map(segmentName);

  return [
    ...checkPresence(names, lines),
    ...checkOrdering(names),
    ...lines.flatMap((line, i) => checkLine(line, i + 1)),
  ];
}

export function validateMessage(text: string): ValidationIssue[] {
  return validateHL7Lines(splitSegments(text));
}

/** True when at least one issue is an error; warnings never block. */
export function hasBlockingIssues(issues: readonly ValidationIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}

export function formatIssue(issue: ValidationIssue): string {
  return issue.severity === "warning" ? `warning: ${issue.message}` : issue.message;
}
