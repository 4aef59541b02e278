/**
 * bytepace: smooth, externally controllable bandwidth shaping for byte streams
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/rate/index.js";
export * from "./lib/throttle/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/units.js";
export * from "./utils/config-loader.js";
