/**
 * Formatter interface for rendering a collection conversion as text.
 *
 * Each output format is a function conforming to this type. Formatters
 * depend only on the Types and Resolver layers.
 */

import type { CollectionConversion } from "../types/series.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Disable ANSI color codes in terminal output. */
  readonly noColor?: boolean;
}

export type Formatter = (
  conversion: CollectionConversion,
  options?: FormatterOptions,
) => string;
