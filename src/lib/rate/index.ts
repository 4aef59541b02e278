/**
 * Rate module - schedules and quota feeds
 */
export * from "./schedule.js";
export * from "./quota-channel.js";
export * from "./ticker.js";
export * from "./derived-source.js";
export * from "./feed.js";
