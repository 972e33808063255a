/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a ConversionConfig
 * or a structured error. Uses only Node.js built-ins, no external
 * argument-parsing libraries.
 *
 * Dependencies: Types, Resolver.
 */

import type { OutputFormat, ConversionConfig } from "../types/config.js";
import { UNIT_FAMILIES } from "../resolver/unit-families.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help request, version request, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp" | "list-units";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: ConversionConfig }
  | { readonly ok: false; readonly error: ParseError };

const VALID_FORMATS: ReadonlySet<string> = new Set([
  "terminal-compact",
  "json",
]);

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  "--from",
  "--to",
  "--input",
  "--resolve",
  "--format",
  "--output",
  "--help",
  "--version",
  "--mcp",
  "--list-units",
  "--no-color",
]);

/**
 * Flags that take a value, in long form.
 */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--from",
  "--to",
  "--input",
  "--resolve",
  "--format",
  "--output",
]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-f", "--from"],
  ["-t", "--to"],
  ["-i", "--input"],
  ["-r", "--resolve"],
  ["-o", "--output"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

function isNumeric(arg: string): boolean {
  return NUMBER_PATTERN.test(arg);
}

function fail(message: string): ParseResult {
  return { ok: false, error: { kind: "error", message } };
}

/**
 * Parse a CLI argument array into a ConversionConfig.
 *
 * Expected usage:
 *   chronaxis --from <unit> --to <unit> <value...>
 *   chronaxis --input <file> [--to <unit>]
 *   chronaxis --resolve <unit>
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // --help and --version short-circuit everything else.
  if (expandedArgv.includes("--help")) {
    return { ok: false, error: { kind: "help", message: helpText() } };
  }

  if (expandedArgv.includes("--version")) {
    return { ok: false, error: { kind: "version", message: `chronaxis ${VERSION}` } };
  }

  if (expandedArgv.includes("--mcp")) {
    return { ok: false, error: { kind: "mcp", message: "Starting MCP server" } };
  }

  if (expandedArgv.includes("--list-units")) {
    return { ok: false, error: { kind: "list-units", message: listUnitsText() } };
  }

  const flagValues = new Map<string, string>();
  const values: number[] = [];
  let format: OutputFormat = "terminal-compact";
  let formatExplicit = false;
  let noColor = false;

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i]!;
    const originalArg = argv[i]!;

    // Negative numbers look like flags; a numeric argument is always a value.
    if (isNumeric(arg)) {
      values.push(Number(arg));
      i += 1;
      continue;
    }

    if (VALUE_FLAGS.has(arg)) {
      const value = expandedArgv[i + 1];
      if (value === undefined) {
        return fail(`${originalArg} requires a value`);
      }
      if (arg === "--format") {
        if (!VALID_FORMATS.has(value)) {
          return fail(
            `Unknown format "${value}". Valid formats: ${[...VALID_FORMATS].join(", ")}`,
          );
        }
        format = value === "json" ? "json" : "terminal-compact";
        formatExplicit = true;
      } else {
        flagValues.set(arg, value);
      }
      i += 2;
      continue;
    }

    if (arg === "--no-color") {
      noColor = true;
      i += 1;
      continue;
    }

    if (arg.startsWith("-") && !KNOWN_FLAGS.has(arg)) {
      return fail(`Unknown flag "${originalArg}"`);
    }

    return fail(`"${originalArg}" is not a number`);
  }

  const inputPath = flagValues.get("--input");
  const resolveLabel = flagValues.get("--resolve");
  const toUnit = flagValues.get("--to");
  const outputPath = flagValues.get("--output");

  if (resolveLabel === undefined) {
    if (inputPath !== undefined && values.length > 0) {
      return fail("Give either --input or values on the command line, not both");
    }
    if (inputPath !== undefined && flagValues.has("--from")) {
      return fail("--from applies to values given on the command line; set timeUnit per series in the input file");
    }
    if (inputPath === undefined && values.length === 0) {
      return fail("Missing values. Usage: chronaxis [options] --to <unit> <value...>");
    }
    if (inputPath === undefined && toUnit === undefined) {
      return fail("--to is required when converting values from the command line");
    }
  }

  // Infer JSON output from an --output file extension when --format was not explicit.
  if (!formatExplicit && outputPath !== undefined && outputPath.toLowerCase().endsWith(".json")) {
    format = "json";
  }

  const config: ConversionConfig = {
    fromUnit: flagValues.get("--from"),
    toUnit,
    values,
    resolveLabel,
    inputPath,
    outputFormat: format,
    outputPath,
    noColor,
  };

  return { ok: true, value: config };
}

function listUnitsText(): string {
  return [
    "Recognized time units:",
    "",
    ...UNIT_FAMILIES.map(
      (f) => `  ${f.name.padEnd(10)} ${f.aliases.join(", ")}`,
    ),
  ].join("\n");
}

function helpText(): string {
  return [
    "Usage: chronaxis [options] --to <unit> <value...>",
    "       chronaxis [options] --input <file>",
    "       chronaxis --resolve <unit>",
    "",
    "Convert paleoclimate time axes between time units.",
    "",
    "Options:",
    "  -f, --from <unit>       Unit of the values given on the command line (default: years CE)",
    "  -t, --to <unit>         Target unit",
    "  -i, --input <path>      JSON file of series to convert to one shared unit",
    "  -r, --resolve <unit>    Show how a unit label is interpreted",
    "      --format <format>   Output format (terminal-compact, json)",
    "  -o, --output <path>     Write output to file instead of stdout",
    "                          (json is inferred from a .json extension if --format is omitted)",
    "      --no-color          Disable ANSI color codes in terminal output (also honors NO_COLOR env var)",
    "      --list-units        List recognized time units",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
  ].join("\n");
}
