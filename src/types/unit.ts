/**
 * Time unit descriptors.
 *
 * A descriptor is the structured form of a free-form unit label such as
 * "ky BP". Every conversion works on descriptors, never on raw labels.
 */

/**
 * Whether increasing label values move forward ("prograde") or backward
 * ("retrograde") in absolute time.
 */
export type TimeDirection = "prograde" | "retrograde";

export interface UnitDescriptor {
  /** Power of ten relating the label's base unit to years (3 for ky). */
  readonly scaleExponent: number;
  readonly direction: TimeDirection;
  /** Zero point of the convention in absolute years (1950 for BP). */
  readonly datumOffset: number;
}

/**
 * A named convention and every label spelling that resolves to it.
 */
export interface UnitFamily {
  /** Canonical label, used when a converted axis is relabeled. */
  readonly name: string;
  readonly aliases: readonly string[];
  readonly descriptor: UnitDescriptor;
}

/**
 * Sign a direction contributes to the linear transform.
 */
export function directionSign(direction: TimeDirection): 1 | -1 {
  return direction === "prograde" ? 1 : -1;
}

export function descriptorsEqual(a: UnitDescriptor, b: UnitDescriptor): boolean {
  return (
    a.scaleExponent === b.scaleExponent &&
    a.direction === b.direction &&
    a.datumOffset === b.datumOffset
  );
}
