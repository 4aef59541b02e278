/**
 * Core type definitions for bytepace
 */

export * from "./stream.js";
export * from "./rate.js";
export * from "./config.js";
