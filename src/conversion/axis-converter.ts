/**
 * Axis converter — re-expresses a numeric time axis under another unit.
 *
 * The transform goes through absolute years:
 *   absolute  = datum_from + sign_from * value * 10^exp_from
 *   converted = sign_to * (absolute - datum_to) / 10^exp_to
 * and then restores ascending order if the transform inverted it.
 *
 * Dependencies: Types layer only.
 */

import type { UnitDescriptor } from "../types/unit.js";
import { descriptorsEqual, directionSign } from "../types/unit.js";

export interface TimeConversion {
  readonly times: number[];
  /** True when the result was reversed to keep it ascending. */
  readonly reordered: boolean;
}

/**
 * Whether more consecutive steps go down than up. Steps involving NaN
 * count in neither direction.
 */
export function isPredominantlyDecreasing(times: readonly number[]): boolean {
  let increasing = 0;
  let decreasing = 0;
  for (let i = 1; i < times.length; i++) {
    const step = times[i]! - times[i - 1]!;
    if (step > 0) {
      increasing++;
    } else if (step < 0) {
      decreasing++;
    }
  }
  return decreasing > increasing;
}

/**
 * Apply the linear transform between two units to a single value.
 */
export function convertValue(
  value: number,
  from: UnitDescriptor,
  to: UnitDescriptor,
): number {
  const absolute =
    from.datumOffset + directionSign(from.direction) * value * 10 ** from.scaleExponent;
  return (directionSign(to.direction) * (absolute - to.datumOffset)) / 10 ** to.scaleExponent;
}

/**
 * Convert a whole axis between two units.
 *
 * Equal units return an unchanged copy. Otherwise every value is
 * transformed and the result is reversed when its steps mostly
 * decrease. The input array is never modified.
 */
export function convertTimes(
  times: readonly number[],
  from: UnitDescriptor,
  to: UnitDescriptor,
): TimeConversion {
  if (descriptorsEqual(from, to)) {
    return { times: [...times], reordered: false };
  }
  const converted = times.map((t) => convertValue(t, from, to));
  if (isPredominantlyDecreasing(converted)) {
    return { times: converted.reverse(), reordered: true };
  }
  return { times: converted, reordered: false };
}
