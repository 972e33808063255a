/**
 * Tests for the MCP server module.
 *
 * The tool handlers are plain functions so they can be tested without a
 * transport; these tests cover their JSON output and error reporting.
 */

import { describe, it, expect } from "vitest";
import {
  createMcpServer,
  handleConvertAxisCall,
  handleConvertCollectionCall,
  handleResolveUnitCall,
} from "./server.js";

function firstText(result: { content: { type: "text"; text: string }[] }): string {
  const first = result.content[0];
  if (first === undefined) {
    throw new Error("tool returned no content");
  }
  return first.text;
}

describe("createMcpServer", () => {
  it("creates an McpServer instance", () => {
    const server = createMcpServer();
    expect(server).toBeDefined();
    expect(server.server).toBeDefined();
  });
});

describe("handleResolveUnitCall", () => {
  it("returns the descriptor as JSON", () => {
    const result = handleResolveUnitCall({ label: "ma" });
    expect(result.isError).not.toBe(true);
    expect(JSON.parse(firstText(result))).toEqual({
      label: "ma",
      canonicalUnit: "my BP",
      scaleExponent: 6,
      direction: "retrograde",
      datumOffset: 1950,
    });
  });

  it("flags an unrecognized label as an error", () => {
    const result = handleResolveUnitCall({ label: "cubits" });
    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe('Unrecognized time unit "cubits"');
  });
});

describe("handleConvertAxisCall", () => {
  it("converts and reports the reversal", () => {
    const result = handleConvertAxisCall({ times: [1871, 1900], to: "yr BP" });
    expect(result.isError).not.toBe(true);
    expect(JSON.parse(firstText(result))).toEqual({
      timeUnit: "yr BP",
      descriptor: { scaleExponent: 0, direction: "retrograde", datumOffset: 1950 },
      times: [50, 79],
      reordered: true,
    });
  });

  it("honors the source unit", () => {
    const result = handleConvertAxisCall({ times: [1, 2], from: "ma", to: "ka" });
    expect(JSON.parse(firstText(result)).times).toEqual([1000, 2000]);
  });

  it("flags an unrecognized source or target", () => {
    expect(handleConvertAxisCall({ times: [1], from: "aeons", to: "ka" }).isError).toBe(true);
    expect(handleConvertAxisCall({ times: [1], to: "aeons" }).isError).toBe(true);
  });
});

describe("handleConvertCollectionCall", () => {
  it("returns every member, failed ones included", () => {
    const result = handleConvertCollectionCall({
      timeUnit: "ka",
      series: [
        { id: "a", time: [1, 2], timeUnit: "ma" },
        { id: "b", time: [3], timeUnit: "fortnights" },
      ],
    });
    expect(result.isError).not.toBe(true);
    const parsed = JSON.parse(firstText(result));
    expect(parsed.members.map((m: { id: string }) => m.id)).toEqual(["a", "b"]);
    expect(parsed.members[0].times).toEqual([1000, 2000]);
    expect(parsed.members[1].error).toBe('Unrecognized time unit "fortnights"');
  });

  it("flags an unrecognized shared unit", () => {
    const result = handleConvertCollectionCall({ timeUnit: "fortnights", series: [] });
    expect(result.isError).toBe(true);
  });
});
