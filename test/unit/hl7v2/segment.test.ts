import { describe, test, expect } from "vitest";
import {
  fieldCount,
  findAllSegments,
  findLastSegment,
  findSegment,
  getComponent,
  getField,
  parseSegment,
} from "../../../src/hl7v2/segment";

describe("getField", () => {
  test("MSH fields are offset by one", () => {
    const msh = parseSegment("MSH|^~\\&|LAB|HOSP|||20240101||ORU^R01|42|P|2.5");

    expect(getField(msh, 1)).toBe("|");
    expect(getField(msh, 2)).toBe("^~\\&");
    expect(getField(msh, 3)).toBe("LAB");
    expect(getField(msh, 9)).toBe("ORU^R01");
    expect(getField(msh, 10)).toBe("42");
    expect(getField(msh, 12)).toBe("2.5");
  });

  test("other segments index fields from one after the identifier", () => {
    const pid = parseSegment("PID|1||MRN123^^^HOSP^MR||Doe^Jane");

    expect(getField(pid, 1)).toBe("1");
    expect(getField(pid, 3)).toBe("MRN123^^^HOSP^MR");
    expect(getField(pid, 5)).toBe("Doe^Jane");
  });

  test("returns undefined for empty and out-of-range fields", () => {
    const pid = parseSegment("PID|1||MRN123");

    expect(getField(pid, 2)).toBeUndefined();
    expect(getField(pid, 40)).toBeUndefined();
    expect(getField(pid, 0)).toBeUndefined();
  });
});

describe("getComponent", () => {
  test("returns the requested component", () => {
    expect(getComponent("Doe^Jane^Q", 1)).toBe("Doe");
    expect(getComponent("Doe^Jane^Q", 2)).toBe("Jane");
  });

  test("returns undefined for empty or missing components", () => {
    expect(getComponent("^Jane", 1)).toBeUndefined();
    expect(getComponent("Doe", 2)).toBeUndefined();
    expect(getComponent(undefined, 1)).toBeUndefined();
  });

  test("a field without separators is its own first component", () => {
    expect(getComponent("MRN123", 1)).toBe("MRN123");
  });
});

describe("fieldCount", () => {
  test("counts HL7 fields for MSH and other segments", () => {
    expect(fieldCount(parseSegment("MSH|^~\\&|A"))).toBe(3);
    expect(fieldCount(parseSegment("PID|1||MRN"))).toBe(3);
  });
});

describe("segment lookup", () => {
  const message = [
    parseSegment("MSH|^~\\&"),
    parseSegment("OBX|1|NM|A"),
    parseSegment("OBX|2|NM|B"),
  ];

  test("findSegment returns the first match", () => {
    expect(findSegment(message, "OBX")?.raw[3]).toBe("A");
  });

  test("findLastSegment returns the last match", () => {
    expect(findLastSegment(message, "OBX")?.raw[3]).toBe("B");
  });

  test("findAllSegments keeps message order", () => {
    expect(findAllSegments(message, "OBX").map((s) => s.raw[1])).toEqual(["1", "2"]);
    expect(findAllSegments(message, "NK1")).toEqual([]);
  });
});
