/**
 * Time axis, series and collection records.
 *
 * All records are immutable. Conversions build new records; arrays bound
 * to an axis are only ever permuted, never resized.
 */

import type { ConversionError } from "./errors.js";
import type { UnitDescriptor } from "./unit.js";

/**
 * One entry of an axis's conversion history.
 */
export interface ConversionLogEntry {
  readonly operation: "convert-time";
  /** Label before the conversion. */
  readonly from: string;
  /** Label after the conversion. */
  readonly to: string;
  readonly reordered: boolean;
}

/**
 * A numeric time axis with its resolved unit.
 */
export interface TimeAxis {
  readonly times: readonly number[];
  /** Label as supplied, or the default label when none was given. */
  readonly label: string;
  readonly descriptor: UnitDescriptor;
  /** Conversion history, populated only when a caller keeps a log. */
  readonly log: readonly ConversionLogEntry[];
}

/**
 * The axis of a collection member whose unit label was not recognized.
 * It keeps the raw label and times but has no descriptor.
 */
export interface UnresolvedTimeAxis {
  readonly times: readonly number[];
  readonly label: string;
  readonly descriptor: undefined;
  readonly log: readonly ConversionLogEntry[];
}

export type MemberAxis = TimeAxis | UnresolvedTimeAxis;

/**
 * A time axis with a value array bound to it one-to-one.
 */
export interface TimeSeries<V = number> {
  readonly axis: TimeAxis;
  readonly values: readonly V[];
}

/**
 * Independently built input record for a collection.
 */
export interface SeriesRecord<V = number> {
  /** Opaque identifier preserved through every conversion. */
  readonly id: string;
  readonly times: readonly number[];
  readonly timeUnit?: string | undefined;
  readonly values?: readonly V[] | undefined;
}

export interface CollectionMember<V = number> {
  readonly id: string;
  readonly axis: MemberAxis;
  readonly values?: readonly V[] | undefined;
  /** Set when the member could not be built; it is then never converted. */
  readonly error?: ConversionError | undefined;
}

export interface SeriesCollection<V = number> {
  readonly members: readonly CollectionMember<V>[];
  /** Shared target unit, when the collection was converted to one. */
  readonly timeUnit: string | undefined;
}

/**
 * Per-member result of a collection conversion.
 */
export type MemberOutcome =
  | { readonly id: string; readonly ok: true; readonly reordered: boolean }
  | { readonly id: string; readonly ok: false; readonly error: ConversionError };

export interface CollectionConversion<V = number> {
  readonly collection: SeriesCollection<V>;
  readonly outcomes: readonly MemberOutcome[];
}

/**
 * Options shared by every converting operation.
 */
export interface ConversionOptions {
  /** Append a ConversionLogEntry to each converted axis. */
  readonly keepLog?: boolean;
  /** Receives a one-line notice whenever an axis is reversed. */
  readonly notify?: (message: string) => void;
}
