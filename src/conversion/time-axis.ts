/**
 * Time axis operations: build an axis from a label and convert it to
 * another label.
 *
 * Dependencies: Types, Resolver.
 */

import type { UnitDescriptor } from "../types/unit.js";
import type { UnrecognizedUnitError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import type { ConversionLogEntry, ConversionOptions, TimeAxis } from "../types/series.js";
import { ok } from "../types/result.js";
import { resolveUnit } from "../resolver/resolver.js";
import { DEFAULT_TIME_UNIT } from "../resolver/unit-families.js";
import { convertTimes } from "./axis-converter.js";

export interface AxisConversion {
  readonly axis: TimeAxis;
  readonly reordered: boolean;
}

export function labelOrDefault(label: string | undefined): string {
  return label === undefined || label.trim() === "" ? DEFAULT_TIME_UNIT : label;
}

/**
 * Build a time axis, resolving its label. A missing label gives the
 * default unit.
 */
export function createTimeAxis(
  times: readonly number[],
  label?: string,
): Result<TimeAxis, UnrecognizedUnitError> {
  const descriptor = resolveUnit(label);
  if (!descriptor.ok) {
    return descriptor;
  }
  return ok({
    times: [...times],
    label: labelOrDefault(label),
    descriptor: descriptor.value,
    log: [],
  });
}

/**
 * Convert an axis to an already resolved target unit.
 */
export function convertAxisTo(
  axis: TimeAxis,
  target: UnitDescriptor,
  targetLabel: string,
  options?: ConversionOptions,
): AxisConversion {
  const { times, reordered } = convertTimes(axis.times, axis.descriptor, target);
  const label = labelOrDefault(targetLabel);

  if (reordered && options?.notify !== undefined) {
    options.notify(
      `Time axis reversed to stay ascending after converting "${axis.label}" to "${label}"`,
    );
  }

  const log: readonly ConversionLogEntry[] = options?.keepLog === true
    ? [...axis.log, { operation: "convert-time", from: axis.label, to: label, reordered }]
    : axis.log;

  return {
    axis: { times, label, descriptor: target, log },
    reordered,
  };
}

/**
 * Convert an axis to the unit named by `targetLabel`.
 *
 * Fails without a partial result when the label is not recognized.
 */
export function convertAxis(
  axis: TimeAxis,
  targetLabel: string | undefined,
  options?: ConversionOptions,
): Result<AxisConversion, UnrecognizedUnitError> {
  const target = resolveUnit(targetLabel);
  if (!target.ok) {
    return target;
  }
  return ok(convertAxisTo(axis, target.value, labelOrDefault(targetLabel), options));
}
