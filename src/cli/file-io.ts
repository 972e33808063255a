/**
 * Filesystem access used by the CLI entry point.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

export async function readTextFile(path: string): Promise<string> {
  return node_fs.readFile(path, "utf-8");
}

/**
 * Write a file, creating missing parent directories so
 * `--output deep/nested/result.json` works without preparation.
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await node_fs.mkdir(node_path.dirname(path), { recursive: true });
  await node_fs.writeFile(path, content, "utf-8");
}
