/**
 * Chronaxis public API.
 *
 * Resolve paleoclimate time unit labels, convert time axes between them,
 * and bring collections of series onto one shared unit.
 */

export * from "./types/index.js";
export * from "./resolver/index.js";
export * from "./conversion/index.js";
export * from "./orchestration/index.js";
export * from "./formatter/index.js";
export { VERSION } from "./version.js";
