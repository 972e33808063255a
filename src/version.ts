/**
 * Package version, printed by `chronaxis --version` and advertised by
 * the MCP server in its initialize response.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const VERSION: string = pkg.version;
