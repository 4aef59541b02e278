/**
 * Throttle module - paced reads over byte sources
 */
export * from "./completion.js";
export * from "./byte-source.js";
export * from "./throttled-stream.js";
export * from "./throttled-readable.js";
