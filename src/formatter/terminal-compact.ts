/**
 * Terminal-compact formatter — one row per member with its unit, extent
 * and whether its axis was reversed, followed by each member's times.
 */

import type { CollectionConversion, MemberOutcome } from "../types/series.js";
import type { FormatterOptions } from "./formatter.js";

const ANSI_RESET = "\x1b[0m";
const ANSI_YELLOW = "\x1b[33m";
const ANSI_RED = "\x1b[31m";

function colorize(text: string, color: string, noColor: boolean): string {
  return noColor ? text : `${color}${text}${ANSI_RESET}`;
}

/**
 * Renders a time value without trailing float noise (79.00000000000006
 * shows as 79).
 */
export function formatTime(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(Number(value.toPrecision(12)));
}

const TIMES_SHOWN_AT_EACH_END = 6;

/**
 * Comma-separated times. Long axes show only their first and last few
 * values around an ellipsis.
 */
export function formatTimes(times: readonly number[]): string {
  if (times.length <= TIMES_SHOWN_AT_EACH_END * 2) {
    return times.map(formatTime).join(", ");
  }
  return [
    ...times.slice(0, TIMES_SHOWN_AT_EACH_END).map(formatTime),
    "...",
    ...times.slice(-TIMES_SHOWN_AT_EACH_END).map(formatTime),
  ].join(", ");
}

function statusText(outcome: MemberOutcome | undefined): string {
  if (outcome === undefined) {
    return "-";
  }
  if (!outcome.ok) {
    return "failed";
  }
  return outcome.reordered ? "reversed" : "kept";
}

/**
 * Formats a conversion as a compact terminal table.
 *
 * Padding is computed on plain text; colors are applied afterwards so
 * columns stay aligned.
 */
export function formatTerminalCompact(
  conversion: CollectionConversion,
  options?: FormatterOptions,
): string {
  const noColor = options?.noColor === true;
  const { collection, outcomes } = conversion;
  const lines: string[] = [];

  lines.push(`Time unit: ${collection.timeUnit ?? "(unchanged)"}`);
  lines.push("");

  if (collection.members.length === 0) {
    lines.push("No series.");
    return lines.join("\n");
  }

  const rows = collection.members.map((member, i) => {
    const times = member.axis.times;
    const first = times[0];
    const last = times[times.length - 1];
    return {
      id: member.id,
      unit: member.axis.label,
      points: String(times.length),
      range: first !== undefined && last !== undefined
        ? `${formatTime(first)} .. ${formatTime(last)}`
        : "-",
      status: statusText(outcomes[i]),
    };
  });

  const idWidth = Math.max(...rows.map((r) => r.id.length), 6);
  const unitWidth = Math.max(...rows.map((r) => r.unit.length), 4);
  const pointsWidth = Math.max(...rows.map((r) => r.points.length), 6);
  const rangeWidth = Math.max(...rows.map((r) => r.range.length), 5);

  lines.push([
    "Series".padEnd(idWidth),
    "Unit".padEnd(unitWidth),
    "Points".padEnd(pointsWidth),
    "Range".padEnd(rangeWidth),
    "Order",
  ].join("  "));
  lines.push([
    "-".repeat(idWidth),
    "-".repeat(unitWidth),
    "-".repeat(pointsWidth),
    "-".repeat(rangeWidth),
    "-".repeat(8),
  ].join("  "));

  for (const row of rows) {
    let status = row.status;
    if (status === "reversed") {
      status = colorize(status, ANSI_YELLOW, noColor);
    } else if (status === "failed") {
      status = colorize(status, ANSI_RED, noColor);
    }
    lines.push([
      row.id.padEnd(idWidth),
      row.unit.padEnd(unitWidth),
      row.points.padEnd(pointsWidth),
      row.range.padEnd(rangeWidth),
      status,
    ].join("  "));
  }

  lines.push("");
  lines.push("Times:");
  for (const member of collection.members) {
    lines.push(`  ${member.id}: ${formatTimes(member.axis.times)}`);
  }

  const failures = outcomes.filter((o) => !o.ok);
  if (failures.length > 0) {
    lines.push("");
    lines.push("Errors:");
    for (const failure of failures) {
      if (!failure.ok) {
        lines.push(`  ${failure.id}: ${failure.error.message}`);
      }
    }
  }

  return lines.join("\n");
}
