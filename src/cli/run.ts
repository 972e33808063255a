/**
 * CLI runner — the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into a ConversionConfig
 *   2. Build a collection from the command-line values or an input file
 *   3. Convert it and format the result
 *   4. Write output to stdout or a file
 *
 * Dependencies: All layers.
 */

import type { ConversionConfig, OutputFormat } from "../types/config.js";
import type { CollectionConversion, SeriesRecord } from "../types/series.js";
import type { Result } from "../types/result.js";
import type { Formatter, FormatterOptions } from "../formatter/formatter.js";
import { ok, err } from "../types/result.js";
import { resolveUnit, canonicalLabel } from "../resolver/resolver.js";
import { createCollection } from "../orchestration/collection.js";
import { formatJson } from "../formatter/json.js";
import { formatTerminalCompact } from "../formatter/terminal-compact.js";
import { parseArgs } from "./parse-args.js";
import { parseInputFile, toSeriesRecords } from "./input-file.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide mocks.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFn?: (path: string) => Promise<string>;
  readonly writeFn?: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
  /** When true, suppresses ANSI color codes (mirrors the NO_COLOR env var). */
  readonly noColorEnv?: boolean;
}

/** Member id given to values passed on the command line. */
export const INPUT_SERIES_ID = "input";

function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "terminal-compact":
      return formatTerminalCompact;
  }
}

function describeUnit(label: string, format: OutputFormat): Result<string, string> {
  const resolved = resolveUnit(label);
  if (!resolved.ok) {
    return err(resolved.error.message);
  }
  const descriptor = resolved.value;
  if (format === "json") {
    return ok(JSON.stringify({ label, canonicalUnit: canonicalLabel(descriptor), ...descriptor }, null, 2));
  }
  return ok([
    `${label} = ${canonicalLabel(descriptor)}`,
    `  scale:     10^${descriptor.scaleExponent} years`,
    `  direction: ${descriptor.direction}`,
    `  datum:     ${descriptor.datumOffset}`,
  ].join("\n"));
}

async function loadRecords(
  config: ConversionConfig,
  deps: CliDeps,
): Promise<Result<{ records: SeriesRecord[]; timeUnit: string | undefined }, string>> {
  if (config.inputPath === undefined) {
    return ok({
      records: [{ id: INPUT_SERIES_ID, times: config.values, timeUnit: config.fromUnit }],
      timeUnit: config.toUnit,
    });
  }
  if (deps.readFn === undefined) {
    return err("Reading input files is not available");
  }

  let text: string;
  try {
    text = await deps.readFn(config.inputPath);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err(`Failed to read input: ${message}`);
  }

  const parsed = parseInputFile(text);
  if (!parsed.ok) {
    return err(parsed.error.message);
  }
  return ok({
    records: toSeriesRecords(parsed.value.series),
    timeUnit: config.toUnit ?? parsed.value.timeUnit,
  });
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version" || kind === "list-units") {
      deps.stdout(message);
      return 0;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return 1;
      }
      await deps.startMcpServer();
      return 0;
    }
    deps.stderr(message);
    return 1;
  }

  const config = parseResult.value;

  if (config.resolveLabel !== undefined) {
    const described = describeUnit(config.resolveLabel, config.outputFormat);
    if (!described.ok) {
      deps.stderr(described.error);
      return 1;
    }
    deps.stdout(described.value);
    return 0;
  }

  const loaded = await loadRecords(config, deps);
  if (!loaded.ok) {
    deps.stderr(loaded.error);
    return 1;
  }

  // Reversal notices go to stderr so they never mix with JSON on stdout.
  const created = createCollection(loaded.value.records, loaded.value.timeUnit, {
    notify: deps.stderr,
  });
  if (!created.ok) {
    deps.stderr(created.error.message);
    return 1;
  }

  const conversion: CollectionConversion = created.value;
  const formatter = selectFormatter(config.outputFormat);
  const noColor = config.noColor || deps.noColorEnv === true;
  const formatterOptions: FormatterOptions = { noColor };
  const output = formatter(conversion, formatterOptions);

  if (config.outputPath !== undefined && deps.writeFn !== undefined) {
    try {
      await deps.writeFn(config.outputPath, output);
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      deps.stderr(`Failed to write output: ${message}`);
      return 1;
    }
    deps.stdout(`Output written to ${config.outputPath}`);
  } else {
    deps.stdout(output);
  }

  const failed = conversion.outcomes.filter((o) => !o.ok).length;
  return failed > 0 ? 1 : 0;
}
