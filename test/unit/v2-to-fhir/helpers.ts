import type { ConverterContext } from "../../../src/v2-to-fhir/converter-context";
import { DEFAULT_CONFIG } from "../../../src/v2-to-fhir/config";
import { sequentialSessionIds } from "../../../src/v2-to-fhir/id-generation";

/** Context with default config and "<prefix>-<n>" session ids. */
export function makeTestContext(overrides?: Partial<ConverterContext>): ConverterContext {
  return {
    config: DEFAULT_CONFIG,
    newSessionId: sequentialSessionIds(),
    ...overrides,
  };
}

export const ADT_A01 = [
  "MSH|^~\\&|A|B|C|D|20240101010101||ADT^A01|1|P|2.3",
  "PID|1||MRN123^^^HOSP^MR||Doe^Jane||19900101|F",
  "PV1|1|O|AMB^^^Hosp||||1^Smith^John|||||||||||VIS1||||||||||||||||||20240101010000|20240101020000",
].join("\r");

export const ORU_R01 = [
  "MSH|^~\\&|LAB|HOSP|||20240101||ORU^R01|99|P|2.5",
  "PID|1||123456||Roe^Rick||19800515|M",
  "NK1|1|Roe^Rita|SPO^Spouse||555-1234",
  "AL1|1|DA|PCN^Penicillin|SV|Hives",
  "OBR|1|ORD1|FIL1|CBC^Complete Blood Count",
  "OBX|1|NM|2345-7^Glucose||95|mg/dL|70-99|N",
  "OBX|2|ST|8251-1^Note||see comment",
].join("\n");

export const ADT_A01_PATIENT_ID = "patient-e1973c37-cd6e-5a2f-bc74-12eabfee2ebd";
export const ORU_R01_PATIENT_ID = "patient-a52b2702-9bcf-5701-852a-2f4edc640fe1";
