/**
 * Keeps arrays bound to a time axis in step with it.
 *
 * A conversion only ever reverses an axis, so the permutation is fully
 * described by the `reordered` flag it returns.
 */

import type { ShapeMismatchError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { shapeMismatch } from "../types/errors.js";
import { ok, err } from "../types/result.js";

/**
 * Check that a bound array has the axis's length.
 */
export function checkShape(
  axisLength: number,
  values: readonly unknown[],
): Result<void, ShapeMismatchError> {
  if (values.length !== axisLength) {
    return err(shapeMismatch(axisLength, values.length));
  }
  return ok(undefined);
}

/**
 * Apply an axis reversal to a co-indexed array. Returns a new array; the
 * input is left untouched.
 */
export function permuteBound<V>(
  values: readonly V[],
  axisLength: number,
  reordered: boolean,
): Result<V[], ShapeMismatchError> {
  const shape = checkShape(axisLength, values);
  if (!shape.ok) {
    return shape;
  }
  return ok(reordered ? [...values].reverse() : [...values]);
}
