/**
 * Plain-text clinical summary of a converted bundle.
 *
 * Deterministic and offline: the same bundle always yields the same text.
 * The bundle is only read.
 */

import type { Bundle, Observation, Patient } from "fhir/r4";

function findPatient(bundle: Bundle): Patient | undefined {
  for (const entry of bundle.entry ?? []) {
    if (entry.resource?.resourceType === "Patient") return entry.resource;
  }
  return undefined;
}

function findObservations(bundle: Bundle): Observation[] {
  const observations: Observation[] = [];
  for (const entry of bundle.entry ?? []) {
    if (entry.resource?.resourceType === "Observation") observations.push(entry.resource);
  }
  return observations;
}

function patientName(patient: Patient | undefined): string {
  const name = patient?.name?.[0];
  if (!name) return "Unknown";
  const parts = [...(name.given ?? []), name.family].filter((part): part is string => !!part);
  return parts.length > 0 ? parts.join(" ") : name.text ?? "Unknown";
}

function observationLine(observation: Observation): string {
  const coding = observation.code.coding?.[0];
  const label = coding?.display ?? observation.code.text ?? "Unknown";
  const code = coding?.code ?? "no code";
  const value = observation.valueQuantity?.value ?? observation.valueString ?? "N/A";
  const unit = observation.valueQuantity?.unit ?? "";
  return `- ${label} (${code}): ${value} ${unit}`.trimEnd();
}

export function summarizeBundle(bundle: Bundle): string {
  const patient = findPatient(bundle);
  const observations = findObservations(bundle);

  const lines = [
    `Patient: ${patientName(patient)}, DOB: ${patient?.birthDate ?? "Not provided"}, Sex: ${patient?.gender ?? "Not provided"}`,
    "",
    "Lab Observations:",
  ];

  if (observations.length === 0) {
    lines.push("- none");
  }
  for (const observation of observations) {
    lines.push(observationLine(observation));
  }

  return lines.join("\n");
}
