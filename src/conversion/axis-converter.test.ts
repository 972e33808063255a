/**
 * Tests for the axis converter.
 *
 * Expected values follow the linear transform through absolute years:
 * "years CE" is prograde from 0, "yr BP" retrograde from 1950, and
 * "ky BP" the same scaled by 10^3.
 */

import { describe, it, expect } from "vitest";
import { convertTimes, convertValue, isPredominantlyDecreasing } from "./axis-converter.js";
import type { UnitDescriptor } from "../types/unit.js";

const YEAR_CE: UnitDescriptor = { scaleExponent: 0, direction: "prograde", datumOffset: 0 };
const YEAR_BP: UnitDescriptor = { scaleExponent: 0, direction: "retrograde", datumOffset: 1950 };
const KY_BP: UnitDescriptor = { scaleExponent: 3, direction: "retrograde", datumOffset: 1950 };
const MY_BP: UnitDescriptor = { scaleExponent: 6, direction: "retrograde", datumOffset: 1950 };
const YR_B2K: UnitDescriptor = { scaleExponent: 0, direction: "retrograde", datumOffset: 2000 };

/** Monthly axis from January 1871 through December 2003. */
function monthlyAxis(): number[] {
  return Array.from({ length: (2004 - 1871) * 12 }, (_, k) => 1871 + k / 12);
}

function isNonDecreasing(values: readonly number[]): boolean {
  return values.every((v, i) => i === 0 || v >= values[i - 1]!);
}

describe("isPredominantlyDecreasing", () => {
  it("is false for ascending, empty and single-element axes", () => {
    expect(isPredominantlyDecreasing([1, 2, 3])).toBe(false);
    expect(isPredominantlyDecreasing([])).toBe(false);
    expect(isPredominantlyDecreasing([5])).toBe(false);
  });

  it("is true when more steps go down than up", () => {
    expect(isPredominantlyDecreasing([3, 2, 1])).toBe(true);
    expect(isPredominantlyDecreasing([4, 3, 3.5, 1])).toBe(true);
  });

  it("is false on a tie", () => {
    expect(isPredominantlyDecreasing([3, 1, 2])).toBe(false);
  });

  it("ignores steps involving NaN", () => {
    expect(isPredominantlyDecreasing([NaN, 2, 1])).toBe(true);
    expect(isPredominantlyDecreasing([1, NaN, 0])).toBe(false);
  });
});

describe("convertValue", () => {
  it("shifts and flips across the BP datum", () => {
    expect(convertValue(1871, YEAR_CE, YEAR_BP)).toBe(79);
    expect(convertValue(79, YEAR_BP, YEAR_CE)).toBe(1871);
  });

  it("applies the scale after the datum shift", () => {
    expect(convertValue(1871, YEAR_CE, KY_BP)).toBeCloseTo(0.079, 12);
    expect(convertValue(2, KY_BP, YEAR_CE)).toBe(-50);
  });

  it("moves between datums", () => {
    expect(convertValue(0, YEAR_BP, YR_B2K)).toBe(50);
    expect(convertValue(1, MY_BP, KY_BP)).toBe(1000);
  });
});

describe("convertTimes", () => {
  it("converts a monthly CE axis to yr BP and reverses it", () => {
    const source = monthlyAxis();
    const { times, reordered } = convertTimes(source, YEAR_CE, YEAR_BP);

    expect(reordered).toBe(true);
    expect(times).toHaveLength(source.length);
    expect(times[0]).toBeCloseTo(-53.92, 2);
    expect(times[times.length - 1]).toBe(79);
    expect(isNonDecreasing(times)).toBe(true);
  });

  it("converts the same axis to ky BP", () => {
    const { times, reordered } = convertTimes(monthlyAxis(), YEAR_CE, KY_BP);

    expect(reordered).toBe(true);
    expect(times[0]).toBeCloseTo(-0.05392, 4);
    expect(times[times.length - 1]).toBeCloseTo(0.079, 12);
  });

  it("returns an unchanged copy for equal units", () => {
    const source = [3, 1, 2];
    const result = convertTimes(source, KY_BP, { ...KY_BP });

    expect(result.reordered).toBe(false);
    expect(result.times).toEqual([3, 1, 2]);
    expect(result.times).not.toBe(source);
  });

  it("keeps order when the transform preserves it", () => {
    const result = convertTimes([1, 2, 3], KY_BP, YEAR_BP);
    expect(result).toEqual({ times: [1000, 2000, 3000], reordered: false });
  });

  it("never reorders empty or single-element axes", () => {
    expect(convertTimes([], YEAR_CE, YEAR_BP)).toEqual({ times: [], reordered: false });
    expect(convertTimes([2000], YEAR_CE, YEAR_BP)).toEqual({ times: [-50], reordered: false });
  });

  it("does not modify its input", () => {
    const source = [1900, 1925, 1949];
    convertTimes(source, YEAR_CE, YEAR_BP);
    expect(source).toEqual([1900, 1925, 1949]);
  });

  it("propagates non-finite values through the arithmetic", () => {
    expect(convertTimes([NaN, 1, 2], YEAR_CE, YEAR_BP)).toEqual({
      times: [1948, 1949, NaN],
      reordered: true,
    });
    expect(convertTimes([Infinity], YEAR_CE, KY_BP).times).toEqual([-Infinity]);
  });

  it("round-trips and the two reversals cancel", () => {
    const source = [1, 2, 3];
    const there = convertTimes(source, KY_BP, YEAR_CE);
    expect(there).toEqual({ times: [-1050, -50, 950], reordered: true });

    const back = convertTimes(there.times, YEAR_CE, KY_BP);
    expect(back.reordered).toBe(true);
    expect(back.times).toEqual(source);
  });

  it("round-trips a fractional axis within tolerance", () => {
    const source = [0.5, 12.25, 800.125];
    const there = convertTimes(source, MY_BP, YR_B2K);
    const back = convertTimes(there.times, YR_B2K, MY_BP);

    expect(there.reordered).toBe(false);
    expect(back.reordered).toBe(false);
    back.times.forEach((t, i) => {
      expect(t).toBeCloseTo(source[i]!, 9);
    });
  });
});
