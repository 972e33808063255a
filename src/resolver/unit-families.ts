/**
 * Recognized time unit conventions.
 *
 * Each family lists every label spelling that resolves to it. Aliases
 * are written in display form; lookup normalizes both sides, so case
 * and spacing here do not matter. A new convention is one more entry.
 */

import type { UnitDescriptor, UnitFamily } from "../types/unit.js";

/** Label used when a series carries no unit. */
export const DEFAULT_TIME_UNIT = "years CE";

export const DEFAULT_DESCRIPTOR: UnitDescriptor = {
  scaleExponent: 0,
  direction: "prograde",
  datumOffset: 0,
};

/** Datum of the "Before Present" conventions. */
export const BP_DATUM = 1950;

/** Datum of the "before 2000" ice-core conventions. */
export const B2K_DATUM = 2000;

export const UNIT_FAMILIES: readonly UnitFamily[] = [
  {
    name: DEFAULT_TIME_UNIT,
    aliases: [
      "year", "years", "yr", "yrs", "y",
      "year CE", "years CE", "yr CE", "yrs CE", "CE",
      "AD", "year AD", "years AD",
    ],
    descriptor: DEFAULT_DESCRIPTOR,
  },
  {
    name: "yr BP",
    aliases: ["y BP", "yr BP", "yrs BP", "year BP", "years BP", "BP"],
    descriptor: { scaleExponent: 0, direction: "retrograde", datumOffset: BP_DATUM },
  },
  {
    name: "ky BP",
    aliases: [
      "ky BP", "kyr BP", "kyrs BP", "ka BP", "ka",
      "ky", "kyr", "kyrs", "kiloyear BP", "kiloyears BP",
    ],
    descriptor: { scaleExponent: 3, direction: "retrograde", datumOffset: BP_DATUM },
  },
  {
    name: "my BP",
    aliases: ["my BP", "myr BP", "myrs BP", "ma BP", "ma", "my", "myr", "myrs"],
    descriptor: { scaleExponent: 6, direction: "retrograde", datumOffset: BP_DATUM },
  },
  {
    name: "gy BP",
    aliases: ["gy BP", "gyr BP", "gyrs BP", "ga BP", "ga", "gy", "gyr", "gyrs"],
    descriptor: { scaleExponent: 9, direction: "retrograde", datumOffset: BP_DATUM },
  },
  {
    name: "yr b2k",
    aliases: ["y b2k", "yr b2k", "yrs b2k", "year b2k", "years b2k", "b2k"],
    descriptor: { scaleExponent: 0, direction: "retrograde", datumOffset: B2K_DATUM },
  },
  {
    name: "ky b2k",
    aliases: ["ky b2k", "kyr b2k", "kyrs b2k", "ka b2k"],
    descriptor: { scaleExponent: 3, direction: "retrograde", datumOffset: B2K_DATUM },
  },
];
