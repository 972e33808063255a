/**
 * MCP server for Chronaxis.
 *
 * Exposes time unit resolution and conversion to AI agents via the
 * Model Context Protocol (stdio transport). Every tool returns JSON text.
 *
 * Dependencies: Types, Resolver, Conversion, Orchestration, Formatter
 * (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SeriesRecord } from "../types/series.js";
import { resolveUnit, canonicalLabel } from "../resolver/resolver.js";
import { createTimeAxis, convertAxis } from "../conversion/time-axis.js";
import { createCollection } from "../orchestration/collection.js";
import { formatJson } from "../formatter/json.js";
import { SeriesRecordSchema, toSeriesRecords } from "../cli/input-file.js";
import { VERSION } from "../version.js";

/**
 * The shape returned by every tool handler.
 */
export interface ToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

interface ResolveUnitArgs {
  readonly label: string;
}

interface ConvertAxisArgs {
  readonly times: readonly number[];
  readonly from?: string | undefined;
  readonly to: string;
}

interface ConvertCollectionArgs {
  readonly series: readonly z.infer<typeof SeriesRecordSchema>[];
  readonly timeUnit?: string | undefined;
}

/**
 * Core logic for the resolve_unit tool.
 */
export function handleResolveUnitCall(args: ResolveUnitArgs): ToolResult {
  const resolved = resolveUnit(args.label);
  if (!resolved.ok) {
    return errorResult(resolved.error.message);
  }
  return textResult(JSON.stringify({
    label: args.label,
    canonicalUnit: canonicalLabel(resolved.value),
    ...resolved.value,
  }, null, 2));
}

/**
 * Core logic for the convert_axis tool. The result carries the
 * `reordered` flag so the caller can reverse any values it holds.
 */
export function handleConvertAxisCall(args: ConvertAxisArgs): ToolResult {
  const axis = createTimeAxis(args.times, args.from);
  if (!axis.ok) {
    return errorResult(axis.error.message);
  }
  const converted = convertAxis(axis.value, args.to);
  if (!converted.ok) {
    return errorResult(converted.error.message);
  }
  const result = converted.value;
  return textResult(JSON.stringify({
    timeUnit: result.axis.label,
    descriptor: result.axis.descriptor,
    times: result.axis.times,
    reordered: result.reordered,
  }, null, 2));
}

/**
 * Core logic for the convert_collection tool. Failing members are
 * reported in the output; the call only errors when the target unit
 * itself is unrecognized.
 */
export function handleConvertCollectionCall(args: ConvertCollectionArgs): ToolResult {
  const records: SeriesRecord[] = toSeriesRecords(args.series);
  const created = createCollection(records, args.timeUnit);
  if (!created.ok) {
    return errorResult(created.error.message);
  }
  return textResult(formatJson(created.value));
}

/**
 * Create a configured McpServer instance with the conversion tools
 * registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "chronaxis",
    version: VERSION,
  });

  server.registerTool(
    "resolve_unit",
    {
      title: "Resolve Time Unit",
      description:
        "Interpret a paleoclimate time unit label (e.g. \"ky BP\", \"ma\", \"years CE\") " +
        "as a scale exponent, direction and datum.",
      inputSchema: {
        label: z.string().describe("Time unit label"),
      },
    },
    async (args) => {
      const result = handleResolveUnitCall({ label: args.label });
      return { content: result.content, isError: result.isError };
    },
  );

  server.registerTool(
    "convert_axis",
    {
      title: "Convert Time Axis",
      description:
        "Convert a numeric time axis from one time unit to another. " +
        "The returned axis is ascending; `reordered` tells whether it was reversed.",
      inputSchema: {
        times: z.array(z.number()).describe("Time axis values"),
        from: z
          .string()
          .optional()
          .describe("Unit of the input values. Defaults to years CE."),
        to: z.string().describe("Target time unit"),
      },
    },
    async (args) => {
      const result = handleConvertAxisCall({ times: args.times, from: args.from, to: args.to });
      return { content: result.content, isError: result.isError };
    },
  );

  server.registerTool(
    "convert_collection",
    {
      title: "Convert Series Collection",
      description:
        "Bring several time series, each in its own time unit, onto one shared unit. " +
        "Values are reversed together with their time axis when needed.",
      inputSchema: {
        series: z.array(SeriesRecordSchema).describe("Series to convert"),
        timeUnit: z
          .string()
          .optional()
          .describe("Shared target unit. If omitted, series keep their own units."),
      },
    },
    async (args) => {
      const result = handleConvertCollectionCall({ series: args.series, timeUnit: args.timeUnit });
      return { content: result.content, isError: result.isError };
    },
  );

  return server;
}
