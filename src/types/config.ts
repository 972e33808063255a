/**
 * Configuration for a CLI conversion run.
 */

/**
 * Supported output formats.
 */
export type OutputFormat = "terminal-compact" | "json";

export interface ConversionConfig {
  /** Unit of the positional values. Undefined means the default unit. */
  readonly fromUnit?: string | undefined;
  /** Target unit. Undefined leaves axes in their own units. */
  readonly toUnit?: string | undefined;
  /** Values given on the command line. */
  readonly values: readonly number[];
  /** Unit label to describe instead of converting anything. */
  readonly resolveLabel?: string | undefined;
  /** JSON file of series records, used instead of positional values. */
  readonly inputPath?: string | undefined;
  readonly outputFormat: OutputFormat;
  /** Optional output file path. If omitted, output goes to stdout. */
  readonly outputPath?: string | undefined;
  /** Disable ANSI color codes in terminal output. */
  readonly noColor: boolean;
}
