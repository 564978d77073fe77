import type { Hl7v2ToFhirConfig } from "./config";
import { hl7v2ToFhirConfig } from "./config";
import type { SessionIdFactory } from "./id-generation";
import { randomSessionId } from "./id-generation";

/**
 * Runtime dependencies of a conversion.
 *
 * Built once per call (or shared between calls: nothing in it is mutated),
 * so concurrent conversions need no coordination.
 */
export interface ConverterContext {
  /**
   * Loaded HL7v2-to-FHIR config.
   * Injected explicitly so tests can supply alternatives without env-var overrides.
   */
  config: Hl7v2ToFhirConfig;

  /** Source of non-patient resource ids. */
  newSessionId: SessionIdFactory;
}

/**
 * Production context: config from {@link hl7v2ToFhirConfig} (the file under
 * `<cwd>/config/`, $HL7V2_TO_FHIR_CONFIG, or DEFAULT_CONFIG when neither
 * exists), random session ids.
 */
export function createConverterContext(overrides?: Partial<ConverterContext>): ConverterContext {
  return {
    config: overrides?.config ?? hl7v2ToFhirConfig(),
    newSessionId: overrides?.newSessionId ?? randomSessionId,
  };
}
