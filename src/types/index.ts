export { type Result, ok, err } from "./result.js";
export {
  type TimeDirection,
  type UnitDescriptor,
  type UnitFamily,
  directionSign,
  descriptorsEqual,
} from "./unit.js";
export {
  type UnrecognizedUnitError,
  type ShapeMismatchError,
  type ConversionError,
  unrecognizedUnit,
  shapeMismatch,
} from "./errors.js";
export {
  type ConversionLogEntry,
  type TimeAxis,
  type UnresolvedTimeAxis,
  type MemberAxis,
  type TimeSeries,
  type SeriesRecord,
  type CollectionMember,
  type SeriesCollection,
  type MemberOutcome,
  type CollectionConversion,
  type ConversionOptions,
} from "./series.js";
export { type OutputFormat, type ConversionConfig } from "./config.js";
