import { describe, it, expect, vi } from "vitest";
import { createTimeAxis } from "./time-axis.js";
import { convertSeries, createTimeSeries } from "./time-series.js";
import type { TimeAxis, TimeSeries } from "../types/series.js";

function axisOf(times: number[], label?: string): TimeAxis {
  const result = createTimeAxis(times, label);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

function seriesOf<V>(axis: TimeAxis, values: V[]): TimeSeries<V> {
  const result = createTimeSeries(axis, values);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

describe("createTimeSeries", () => {
  it("binds values of the axis length", () => {
    const series = seriesOf(axisOf([1, 2]), [-0.4, 0.1]);
    expect(series.values).toEqual([-0.4, 0.1]);
  });

  it("rejects values of another length", () => {
    const result = createTimeSeries(axisOf([1, 2, 3]), [0.5]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: "shape-mismatch", axisLength: 3, valuesLength: 1 });
  });
});

describe("convertSeries", () => {
  it("reverses values in lockstep with the axis", () => {
    const series = seriesOf(axisOf([1, 2, 3], "ka"), ["early", "middle", "late"]);
    const result = convertSeries(series, "years");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.reordered).toBe(true);
    expect(result.value.series.axis.times).toEqual([-1050, -50, 950]);
    expect(result.value.series.values).toEqual(["late", "middle", "early"]);
    expect(series.values).toEqual(["early", "middle", "late"]);
  });

  it("keeps value order when the axis keeps its order", () => {
    const series = seriesOf(axisOf([1, 2], "ma"), [7, 8]);
    const result = convertSeries(series, "ka");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.series.axis.times).toEqual([1000, 2000]);
    expect(result.value.series.values).toEqual([7, 8]);
  });

  it("reports a shape mismatch from a hand-built series", () => {
    const broken: TimeSeries = { axis: axisOf([1, 2, 3], "ka"), values: [1, 2] };
    const result = convertSeries(broken, "years");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("shape-mismatch");
  });

  it("does not announce a reversal for a series that fails its shape check", () => {
    const notify = vi.fn();
    const broken: TimeSeries = { axis: axisOf([1, 2, 3], "ka"), values: [1, 2] };
    const result = convertSeries(broken, "years", { notify });
    expect(result.ok).toBe(false);
    expect(notify).not.toHaveBeenCalled();
  });

  it("reports an unrecognized target", () => {
    const series = seriesOf(axisOf([1]), [1]);
    const result = convertSeries(series, "moons");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("unrecognized-unit");
  });
});
