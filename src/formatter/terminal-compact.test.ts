/**
 * Tests for the terminal-compact formatter.
 *
 * One row per member, then each member's times; reversed and failed
 * members are highlighted unless colors are disabled.
 */

import { describe, it, expect } from "vitest";
import type { CollectionConversion } from "../types/series.js";
import type { Formatter } from "./formatter.js";
import { createCollection } from "../orchestration/collection.js";
import { formatTerminalCompact, formatTime, formatTimes } from "./terminal-compact.js";

function conversion(): CollectionConversion {
  const result = createCollection<number>([
    { id: "core-a", times: [1, 2, 3], timeUnit: "ka" },
    { id: "core-c", times: [5, 6], timeUnit: "fathoms" },
  ], "years");
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

describe("formatTime", () => {
  it("drops floating point noise", () => {
    expect(formatTime(1950 - 2003.92)).toBe("-53.92");
    expect(formatTime(0.079)).toBe("0.079");
  });

  it("prints non-finite values as is", () => {
    expect(formatTime(NaN)).toBe("NaN");
    expect(formatTime(-Infinity)).toBe("-Infinity");
  });
});

describe("formatTimes", () => {
  it("lists every value of a short axis", () => {
    expect(formatTimes([-1050, -50, 950])).toBe("-1050, -50, 950");
    expect(formatTimes([])).toBe("");
  });

  it("elides the middle of a long axis", () => {
    const times = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(formatTimes(times)).toBe("1, 2, 3, 4, 5, 6, ..., 15, 16, 17, 18, 19, 20");
  });

  it("keeps twelve values whole", () => {
    const times = Array.from({ length: 12 }, (_, i) => i);
    expect(formatTimes(times)).toBe("0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11");
  });
});

describe("formatTerminalCompact", () => {
  it("satisfies the Formatter type", () => {
    const formatter: Formatter = formatTerminalCompact;
    expect(typeof formatter).toBe("function");
  });

  it("renders one row per member, their times and the errors", () => {
    const output = formatTerminalCompact(conversion(), { noColor: true });
    expect(output.split("\n")).toEqual([
      "Time unit: years",
      "",
      "Series  Unit     Points  Range         Order",
      "------  -------  ------  ------------  --------",
      "core-a  years    3       -1050 .. 950  reversed",
      "core-c  fathoms  2       5 .. 6        failed",
      "",
      "Times:",
      "  core-a: -1050, -50, 950",
      "  core-c: 5, 6",
      "",
      "Errors:",
      '  core-c: Unrecognized time unit "fathoms"',
    ]);
  });

  it("colors reversed and failed rows unless disabled", () => {
    const lines = formatTerminalCompact(conversion()).split("\n");
    expect(lines[4]).toBe("core-a  years    3       -1050 .. 950  \x1b[33mreversed\x1b[0m");
    expect(lines[5]).toBe("core-c  fathoms  2       5 .. 6        \x1b[31mfailed\x1b[0m");
  });

  it("handles an empty collection", () => {
    const output = formatTerminalCompact({
      collection: { members: [], timeUnit: undefined },
      outcomes: [],
    });
    expect(output).toBe("Time unit: (unchanged)\n\nNo series.");
  });
});
