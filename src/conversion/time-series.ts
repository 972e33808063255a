/**
 * Series-level conversion: a time axis plus the value array bound to it.
 *
 * This is the boundary where shape mismatches surface; the axis
 * converter itself never sees the values.
 */

import type { ConversionError, ShapeMismatchError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import type { ConversionOptions, TimeAxis, TimeSeries } from "../types/series.js";
import { ok } from "../types/result.js";
import { convertAxis } from "./time-axis.js";
import { checkShape, permuteBound } from "./permutation.js";

export interface SeriesConversion<V> {
  readonly series: TimeSeries<V>;
  readonly reordered: boolean;
}

/**
 * Bind a value array to an axis. Fails when the lengths differ.
 */
export function createTimeSeries<V>(
  axis: TimeAxis,
  values: readonly V[],
): Result<TimeSeries<V>, ShapeMismatchError> {
  const shape = checkShape(axis.times.length, values);
  if (!shape.ok) {
    return shape;
  }
  return ok({ axis, values: [...values] });
}

/**
 * Convert a series' time axis and reverse its values in lockstep when
 * the axis was reversed. Fails without converting anything when the
 * values do not match the axis.
 */
export function convertSeries<V>(
  series: TimeSeries<V>,
  targetLabel: string | undefined,
  options?: ConversionOptions,
): Result<SeriesConversion<V>, ConversionError> {
  // Checked first so a failing call never reports a reversal.
  const shape = checkShape(series.axis.times.length, series.values);
  if (!shape.ok) {
    return shape;
  }
  const converted = convertAxis(series.axis, targetLabel, options);
  if (!converted.ok) {
    return converted;
  }
  const { axis, reordered } = converted.value;
  const values = permuteBound(series.values, series.axis.times.length, reordered);
  if (!values.ok) {
    return values;
  }
  return ok({ series: { axis, values: values.value }, reordered });
}
