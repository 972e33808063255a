export {
  normalizeLabel,
  buildUnitIndex,
  findUnitFamily,
  resolveUnit,
  canonicalLabel,
} from "./resolver.js";
export {
  DEFAULT_TIME_UNIT,
  DEFAULT_DESCRIPTOR,
  BP_DATUM,
  B2K_DATUM,
  UNIT_FAMILIES,
} from "./unit-families.js";
