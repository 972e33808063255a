/**
 * Series input file.
 *
 * The CLI and the MCP server accept series records as JSON:
 *
 *   {
 *     "timeUnit": "ky BP",
 *     "series": [
 *       { "id": "core-a", "time": [1, 2, 3], "timeUnit": "ka", "values": [0.1, 0.2, 0.3] }
 *     ]
 *   }
 *
 * The top-level timeUnit is the shared target; --to overrides it.
 */

import { z } from "zod";
import type { Result } from "../types/result.js";
import type { SeriesRecord } from "../types/series.js";
import { ok, err } from "../types/result.js";

export const SeriesRecordSchema = z.object({
  id: z.string().min(1),
  time: z.array(z.number()),
  timeUnit: z.string().optional(),
  values: z.array(z.number()).optional(),
});

export const InputFileSchema = z.object({
  timeUnit: z.string().optional(),
  series: z.array(SeriesRecordSchema),
});

export type InputFile = z.infer<typeof InputFileSchema>;

export interface InputFileError {
  readonly message: string;
}

/**
 * Map validated file entries to collection records.
 */
export function toSeriesRecords(
  series: readonly z.infer<typeof SeriesRecordSchema>[],
): SeriesRecord[] {
  return series.map((s) => ({
    id: s.id,
    times: s.time,
    timeUnit: s.timeUnit,
    values: s.values,
  }));
}

/**
 * Parse and validate the text of an input file.
 */
export function parseInputFile(text: string): Result<InputFile, InputFileError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err({ message: `Input is not valid JSON: ${message}` });
  }

  const parsed = InputFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err({ message: `Invalid input file: ${issues}` });
  }
  return ok(parsed.data);
}
