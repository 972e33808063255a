/**
 * Unit descriptor resolver.
 *
 * Maps free-form unit labels to descriptors through a lookup table built
 * once from UNIT_FAMILIES. Stateless apart from that immutable table.
 *
 * Dependencies: Types layer only.
 */

import type { UnitDescriptor, UnitFamily } from "../types/unit.js";
import type { UnrecognizedUnitError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { descriptorsEqual } from "../types/unit.js";
import { unrecognizedUnit } from "../types/errors.js";
import { ok, err } from "../types/result.js";
import { DEFAULT_DESCRIPTOR, UNIT_FAMILIES } from "./unit-families.js";

/**
 * Lookup key for a label: trimmed, lower-cased, inner whitespace
 * collapsed to single spaces.
 */
export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Build the alias index. Throws if two families claim the same alias
 * (programmer error in the table).
 */
export function buildUnitIndex(
  families: readonly UnitFamily[],
): ReadonlyMap<string, UnitFamily> {
  const index = new Map<string, UnitFamily>();
  for (const family of families) {
    for (const alias of [family.name, ...family.aliases]) {
      const key = normalizeLabel(alias);
      const existing = index.get(key);
      if (existing !== undefined && existing !== family) {
        throw new Error(
          `Unit alias "${alias}" is claimed by both "${existing.name}" and "${family.name}"`,
        );
      }
      index.set(key, family);
    }
  }
  return index;
}

const UNIT_INDEX = buildUnitIndex(UNIT_FAMILIES);

/**
 * Find the family a label belongs to, if any.
 */
export function findUnitFamily(label: string): UnitFamily | undefined {
  return UNIT_INDEX.get(normalizeLabel(label));
}

/**
 * Resolve a unit label to its descriptor.
 *
 * An absent or blank label resolves to the default (years CE). Any other
 * label must match a known alias.
 */
export function resolveUnit(
  label: string | undefined,
): Result<UnitDescriptor, UnrecognizedUnitError> {
  if (label === undefined || label.trim() === "") {
    return ok(DEFAULT_DESCRIPTOR);
  }
  const family = findUnitFamily(label);
  if (family === undefined) {
    return err(unrecognizedUnit(label));
  }
  return ok(family.descriptor);
}

/**
 * Canonical label for a descriptor: the name of the first family with
 * that descriptor, or a generic description when none matches.
 */
export function canonicalLabel(descriptor: UnitDescriptor): string {
  const family = UNIT_FAMILIES.find((f) => descriptorsEqual(f.descriptor, descriptor));
  if (family !== undefined) {
    return family.name;
  }
  return `1e${descriptor.scaleExponent} yr ${descriptor.direction} from ${descriptor.datumOffset}`;
}
