/**
 * Command-line front end: reads an HL7v2 file, optionally validates it, and
 * writes the IR or the FHIR bundle as JSON.
 *
 * Exit codes:
 *   0 success · 1 usage/input error · 2 decode failure · 3 conversion failure
 *   4 output write failure · 5 validation failed
 */

import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { parseMessage } from "./hl7v2/parser";
import { splitSegments } from "./hl7v2/tokenizer";
import type { ParsedMessage } from "./hl7v2/types";
import { summarizeBundle } from "./summary/deterministic";
import { formatIssue, hasBlockingIssues, validateHL7Lines } from "./validation/validator";
import { convertParsedMessage } from "./v2-to-fhir/converter";
import { createConverterContext, type ConverterContext } from "./v2-to-fhir/converter-context";

export const VERSION = "0.2.0";

export const EXIT = {
  OK: 0,
  INPUT: 1,
  PARSE: 2,
  CONVERT: 3,
  WRITE: 4,
  INVALID: 5,
} as const;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => string;
  writeFile: (path: string, data: string) => void;
}

export const nodeIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (path) => readFileSync(path, "utf-8"),
  writeFile: (path, data) => writeFileSync(path, data, "utf-8"),
};

const USAGE = `Usage: hl7-to-fhir -i <file> [options]

Options:
  -i, --input <file>    HL7v2 message file
  -o, --output <file>   Write JSON here instead of stdout
      --pretty          Pretty-print JSON
      --raw             Output the decoded message instead of the FHIR bundle
      --validate        Validate before converting; stop on errors
      --validate-only   Validate and exit
      --summary         Print a plain-text clinical summary after the bundle
      --debug           Print intermediate stages to stderr
      --version         Show version
  -h, --help            Show this help`;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fail(io: CliIO, message: string): void {
  io.stderr(`❌ ${message}`);
}

function ok(io: CliIO, message: string): void {
  io.stderr(`✅ ${message}`);
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      pretty: { type: "boolean", default: false },
      raw: { type: "boolean", default: false },
      validate: { type: "boolean", default: false },
      "validate-only": { type: "boolean", default: false },
      summary: { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
      version: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

type CliValues = ReturnType<typeof parseCliArgs>;

/**
 * Run the converter CLI and return its exit code. Nothing here calls
 * `process.exit`; `bin.ts` does that.
 */
export function runCli(
  argv: readonly string[],
  io: CliIO = nodeIO,
  context?: ConverterContext,
): number {
  let values: CliValues;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    fail(io, errorMessage(err));
    io.stderr(USAGE);
    return EXIT.INPUT;
  }

  if (values.version) {
    io.stdout(`hl7-to-fhir version ${VERSION}`);
    return EXIT.OK;
  }

  if (values.help) {
    io.stdout(USAGE);
    return EXIT.OK;
  }

  if (!values.input) {
    fail(io, "You must provide -i/--input");
    return EXIT.INPUT;
  }

  let raw: string;
  try {
    raw = io.readFile(values.input);
  } catch (err) {
    fail(io, `Error loading HL7 file: ${errorMessage(err)}`);
    return EXIT.INPUT;
  }

  let ctx: ConverterContext;
  try {
    ctx = context ?? createConverterContext();
  } catch (err) {
    fail(io, errorMessage(err));
    return EXIT.INPUT;
  }

  const lines = splitSegments(raw);
  if (values.debug) {
    io.stderr(`[debug] segments:\n${lines.map((line) => `  ${JSON.stringify(line)}`).join("\n")}`);
  }

  // === VALIDATION ===
  if (values.validate || values["validate-only"]) {
    const issues = validateHL7Lines(lines);

    if (hasBlockingIssues(issues)) {
      fail(io, "HL7 Validation Failed:");
      for (const issue of issues) {
        fail(io, `  - ${formatIssue(issue)}`);
      }
      return EXIT.INVALID;
    }

    ok(io, "HL7 validation passed.");
    for (const issue of issues) {
      io.stderr(`⚠️  ${formatIssue(issue)}`);
    }

    if (values["validate-only"]) {
      return EXIT.OK;
    }
  }

  // === DECODE ===
  let parsed: ParsedMessage;
  try {
    parsed = parseMessage(lines, { admitDischarge: ctx.config.pv1.admitDischarge });
  } catch (err) {
    fail(io, `Failed to parse HL7: ${errorMessage(err)}`);
    return EXIT.PARSE;
  }

  if (values.debug) {
    io.stderr(`[debug] parsed:\n${JSON.stringify(parsed, null, 2)}`);
  }

  // === CONVERT ===
  let output: unknown = parsed;
  let summary: string | undefined;
  if (!values.raw) {
    try {
      const bundle = convertParsedMessage(parsed, ctx);
      output = bundle;
      if (values.summary) summary = summarizeBundle(bundle);
    } catch (err) {
      fail(io, `Failed to convert to FHIR: ${errorMessage(err)}`);
      return EXIT.CONVERT;
    }
  }

  // === OUTPUT ===
  const json = JSON.stringify(output, null, values.pretty ? 2 : undefined);

  if (values.output) {
    try {
      io.writeFile(values.output, json);
    } catch (err) {
      fail(io, `Failed to write output: ${errorMessage(err)}`);
      return EXIT.WRITE;
    }
    ok(io, `Wrote output to ${values.output}`);
  } else {
    io.stdout(json);
  }

  if (summary !== undefined) {
    io.stdout("\n===== CLINICAL SUMMARY =====\n");
    io.stdout(summary);
  }

  return EXIT.OK;
}
