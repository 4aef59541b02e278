/**
 * Throttle configuration and defaults
 */

import { performance } from "node:perf_hooks";
import { KB } from "../utils/units.js";

export interface ThrottleOptions {
  /** Canonical tick W in milliseconds */
  tickMs?: number;
  /** Capacity of the internal staging buffer in bytes */
  bufferSize?: number;
  /** Shortest interval the emitter timer is scheduled at */
  minTimerIntervalMs?: number;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export type ResolvedThrottleOptions = Required<ThrottleOptions>;

export const DEFAULT_THROTTLE_OPTIONS: ResolvedThrottleOptions = {
  tickMs: 0.1,
  bufferSize: 8 * KB,
  minTimerIntervalMs: 1,
  now: () => performance.now(),
};

/**
 * A rate expressed as "count units per duration".
 */
export interface RateSpec {
  count: number;
  durationMs: number;
}
