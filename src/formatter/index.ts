export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatJson } from "./json.js";
export { formatTerminalCompact, formatTime } from "./terminal-compact.js";
