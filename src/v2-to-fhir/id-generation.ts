/**
 * Resource identity.
 *
 * Two kinds of ids leave the converter:
 * - DerivedId: computed from message content (Patient, from the MRN). The same
 *   MRN yields the same id in every run, so downstream systems can upsert.
 * - SessionId: random per conversion (everything else). Converting the same
 *   message twice yields different Encounter/Observation/... ids.
 *
 * They are distinct types so a random id cannot be passed where a stable one
 * is expected.
 */

import { v4 as uuidv4, v5 as uuidv5 } from "uuid";
import type { Reference } from "fhir/r4";

export interface DerivedId {
  readonly kind: "derived";
  readonly value: string;
}

export interface SessionId {
  readonly kind: "session";
  readonly value: string;
}

export type ResourceId = DerivedId | SessionId;

/** Creates a fresh id for one resource, e.g. "encounter-<uuid>". */
export type SessionIdFactory = (prefix: string) => SessionId;

export const randomSessionId: SessionIdFactory = (prefix) => ({
  kind: "session",
  value: `${prefix}-${uuidv4()}`,
});

/**
 * Deterministic ids for tests: "<prefix>-1", "<prefix>-2", ...
 * Each call returns an independent counter.
 */
export function sequentialSessionIds(): SessionIdFactory {
  let counter = 0;
  return (prefix) => {
    counter++;
    return { kind: "session", value: `${prefix}-${counter}` };
  };
}

/**
 * Patient.id from the MRN: "patient-" + UUID v5 of the MRN in `namespace`.
 */
export function derivePatientId(mrn: string, namespace: string): DerivedId {
  return { kind: "derived", value: `patient-${uuidv5(mrn, namespace)}` };
}

export function referenceTo(resourceType: string, id: ResourceId): Reference {
  return { reference: `${resourceType}/${id.value}` };
}
