import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { validate as isUuid } from "uuid";
import { ADMIT_DISCHARGE_STRATEGIES, type AdmitDischargeStrategy } from "../hl7v2/fields";

/**
 * Deployment-level converter configuration.
 *
 * Loaded from config/hl7v2-to-fhir.json (or $HL7V2_TO_FHIR_CONFIG) once per
 * process and treated as read-only afterwards.
 */
export type Hl7v2ToFhirConfig = {
  patient: {
    /** Identifier.system for the MRN */
    identifierSystem: string;
    /** UUID namespace for the content-derived Patient.id */
    idNamespace: string;
  };
  observation: {
    /** Coding.system for OBX-3 codes */
    codeSystem: string;
  };
  pv1: {
    admitDischarge: AdmitDischargeStrategy;
  };
};

export const DEFAULT_CONFIG: Hl7v2ToFhirConfig = {
  patient: {
    identifierSystem: "http://hospital.example.org/mrn",
    // RFC 4122 DNS namespace
    idNamespace: "6ba7b810-9dad-11d1-80b4-00c04fd430c8",
  },
  observation: {
    codeSystem: "http://loinc.org",
  },
  pv1: {
    admitDischarge: "trailing-non-empty",
  },
};

function defaultConfigPath(): string {
  return join(process.cwd(), "config", "hl7v2-to-fhir.json");
}

function getConfigPath(): string {
  return process.env.HL7V2_TO_FHIR_CONFIG ?? defaultConfigPath();
}

let cachedConfig: Hl7v2ToFhirConfig | null = null;

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid HL7v2-to-FHIR config: "${name}" must be an object`);
  }
  return value;
}

function optionalString(
  parent: Record<string, unknown>,
  path: string,
  key: string,
  fallback: string,
): string {
  const value = parent[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`Invalid HL7v2-to-FHIR config: "${path}.${key}" must be a non-empty string`);
  }
  return value;
}

function isAdmitDischargeStrategy(value: unknown): value is AdmitDischargeStrategy {
  return ADMIT_DISCHARGE_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Build a config from parsed JSON, filling defaults for missing keys.
 * @throws Error on wrong types or unknown values
 */
export function parseConfig(parsed: unknown): Hl7v2ToFhirConfig {
  if (!isRecord(parsed)) {
    throw new Error(
      `Invalid HL7v2-to-FHIR config: expected object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`,
    );
  }

  const patient = section(parsed, "patient");
  const observation = section(parsed, "observation");
  const pv1 = section(parsed, "pv1");

  const idNamespace = optionalString(patient, "patient", "idNamespace", DEFAULT_CONFIG.patient.idNamespace);
  if (!isUuid(idNamespace)) {
    throw new Error(`Invalid HL7v2-to-FHIR config: "patient.idNamespace" must be a UUID, got "${idNamespace}"`);
  }

  const admitDischarge = pv1.admitDischarge ?? DEFAULT_CONFIG.pv1.admitDischarge;
  if (!isAdmitDischargeStrategy(admitDischarge)) {
    throw new Error(
      `Invalid HL7v2-to-FHIR config: "pv1.admitDischarge" must be one of ` +
        `${ADMIT_DISCHARGE_STRATEGIES.join(", ")}, got ${JSON.stringify(admitDischarge)}`,
    );
  }

  return {
    patient: {
      identifierSystem: optionalString(
        patient,
        "patient",
        "identifierSystem",
        DEFAULT_CONFIG.patient.identifierSystem,
      ),
      idNamespace,
    },
    observation: {
      codeSystem: optionalString(observation, "observation", "codeSystem", DEFAULT_CONFIG.observation.codeSystem),
    },
    pv1: { admitDischarge },
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Returns the HL7v2-to-FHIR configuration (lazy singleton).
 * Config is loaded once at first call and cached for process lifetime.
 *
 * Without $HL7V2_TO_FHIR_CONFIG the file is looked up under
 * `<cwd>/config/`; when it is not there, DEFAULT_CONFIG is used. An
 * explicitly configured path must exist.
 *
 * @throws Error if the config file is missing, malformed, or has invalid values
 */
export function hl7v2ToFhirConfig(): Hl7v2ToFhirConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  if (process.env.HL7V2_TO_FHIR_CONFIG === undefined && !existsSync(defaultConfigPath())) {
    cachedConfig = Object.freeze({ ...DEFAULT_CONFIG });
    return cachedConfig;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(getConfigPath(), "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new Error(`Failed to load HL7v2-to-FHIR config from ${getConfigPath()}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse HL7v2-to-FHIR config as JSON: ${message}`);
  }

  cachedConfig = Object.freeze(parseConfig(parsed));
  return cachedConfig;
}

/**
 * Clears the cached config. Used for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
