#!/usr/bin/env node

/**
 * Chronaxis CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, MCP transport) and delegates to the runner.
 */

import * as node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { readTextFile, writeTextFile } from "./file-io.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  readFn: readTextFile,
  writeFn: writeTextFile,
  startMcpServer: async () => {
    const server = createMcpServer();
    const transport = new StdioServerTransport();
    // Keep the process alive until the client disconnects.
    const closed = new Promise<void>((resolve) => {
      server.server.onclose = resolve;
    });
    await server.connect(transport);
    await closed;
  },
  noColorEnv: node_process.env["NO_COLOR"] !== undefined,
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

run(argv, deps).then(
  (code) => {
    // eslint-disable-next-line no-process-exit
    node_process.exit(code);
  },
  (cause: unknown) => {
    node_process.stderr.write(`${cause instanceof Error ? cause.message : String(cause)}\n`);
    // eslint-disable-next-line no-process-exit
    node_process.exit(1);
  },
);
