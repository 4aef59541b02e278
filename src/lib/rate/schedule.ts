/**
 * Rate normalization: turns "count per duration" into a fixed-cadence schedule.
 */

import { RateSchedule } from "../../types/rate.js";
import { ConfigError } from "../../utils/errors.js";

/**
 * Compute the emission schedule for `count` units every `durationMs`,
 * using `tickMs` as the canonical tick.
 *
 * Rates of at least one unit per tick emit `round(count / ticks)` units on
 * every tick. Slower rates stretch the period instead, emitting exactly one
 * unit every `durationMs / count`, so a quota is never zero or fractional.
 *
 * @example
 * computeSchedule(1_000_000, 1000, 0.1); // { quota: 100, periodMs: 0.1, ... }
 * computeSchedule(1, 10_000, 0.1);       // { quota: 1, periodMs: 10000, ... }
 */
export function computeSchedule(
  count: number,
  durationMs: number,
  tickMs: number,
): RateSchedule {
  assertPositive("count", count);
  assertPositive("duration", durationMs);
  assertPositive("tick", tickMs);

  const ratio = durationMs / tickMs;
  const perTick = count / ratio;

  if (perTick >= 1) {
    const quota = Math.round(perTick);
    return {
      quota,
      periodMs: tickMs,
      unitsPerSecond: (quota / tickMs) * 1000,
    };
  }

  const periodMs = durationMs / count;
  return {
    quota: 1,
    periodMs,
    unitsPerSecond: 1000 / periodMs,
  };
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Rate ${name} must be a positive number, got ${value}`, {
      [name]: value,
    });
  }
}
