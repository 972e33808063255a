/**
 * Operational errors returned through Result.
 */

/**
 * A unit label matched none of the recognized conventions.
 */
export interface UnrecognizedUnitError {
  readonly kind: "unrecognized-unit";
  /** The label as the caller supplied it. */
  readonly label: string;
  readonly message: string;
}

/**
 * A value array bound to a time axis does not have the axis's length,
 * so it cannot be permuted in lockstep with it.
 */
export interface ShapeMismatchError {
  readonly kind: "shape-mismatch";
  readonly axisLength: number;
  readonly valuesLength: number;
  readonly message: string;
}

export type ConversionError = UnrecognizedUnitError | ShapeMismatchError;

export function unrecognizedUnit(label: string): UnrecognizedUnitError {
  return {
    kind: "unrecognized-unit",
    label,
    message: `Unrecognized time unit "${label}"`,
  };
}

export function shapeMismatch(axisLength: number, valuesLength: number): ShapeMismatchError {
  return {
    kind: "shape-mismatch",
    axisLength,
    valuesLength,
    message: `Value array has ${valuesLength} entries but the time axis has ${axisLength}`,
  };
}
