export {
  type TimeConversion,
  isPredominantlyDecreasing,
  convertValue,
  convertTimes,
} from "./axis-converter.js";
export { checkShape, permuteBound } from "./permutation.js";
export {
  type AxisConversion,
  createTimeAxis,
  convertAxisTo,
  convertAxis,
} from "./time-axis.js";
export {
  type SeriesConversion,
  createTimeSeries,
  convertSeries,
} from "./time-series.js";
