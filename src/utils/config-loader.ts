/**
 * Configuration loading for throttled streams and the pipe command
 */

import {
  DEFAULT_THROTTLE_OPTIONS,
  RateSpec,
  ResolvedThrottleOptions,
  ThrottleOptions,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import { parseByteSize, parseDuration } from "./units.js";

/**
 * CLI options for throttling, as received from commander
 */
export interface ThrottleCliOptions {
  rate?: string;
  per?: string;
  tick?: string;
  bufferSize?: string;
  minTimerInterval?: string;
}

/**
 * Config file section for throttling
 */
export interface ThrottleConfigSection {
  rate?: string | number;
  per?: string | number;
  tick?: string | number;
  bufferSize?: string | number;
  minTimerInterval?: string | number;
}

export interface ThrottleConfig {
  /** Absent means unthrottled */
  rate?: RateSpec;
  options: Required<Omit<ThrottleOptions, "now">>;
}

/**
 * Fill in defaults and validate throttle options.
 *
 * @throws ConfigError if a value is out of range
 */
export function resolveThrottleOptions(
  options: ThrottleOptions = {},
): ResolvedThrottleOptions {
  const resolved: ResolvedThrottleOptions = {
    tickMs: options.tickMs ?? DEFAULT_THROTTLE_OPTIONS.tickMs,
    bufferSize: options.bufferSize ?? DEFAULT_THROTTLE_OPTIONS.bufferSize,
    minTimerIntervalMs:
      options.minTimerIntervalMs ?? DEFAULT_THROTTLE_OPTIONS.minTimerIntervalMs,
    now: options.now ?? DEFAULT_THROTTLE_OPTIONS.now,
  };

  if (!Number.isFinite(resolved.tickMs) || resolved.tickMs <= 0) {
    throw new ConfigError(`tickMs must be > 0, got ${resolved.tickMs}`);
  }
  if (!Number.isInteger(resolved.bufferSize) || resolved.bufferSize < 1) {
    throw new ConfigError(
      `bufferSize must be a positive integer, got ${resolved.bufferSize}`,
    );
  }
  if (
    !Number.isFinite(resolved.minTimerIntervalMs) ||
    resolved.minTimerIntervalMs < 0
  ) {
    throw new ConfigError(
      `minTimerIntervalMs must be >= 0, got ${resolved.minTimerIntervalMs}`,
    );
  }

  return resolved;
}

/**
 * Load throttle configuration from CLI options and config file
 *
 * Precedence: CLI > config file > defaults. A rate needs a byte count; the
 * duration defaults to one second.
 *
 * @example
 * const config = loadThrottleConfig({ rate: "64KB" }, { per: "500ms" });
 * // config.rate: { count: 65536, durationMs: 500 }
 */
export function loadThrottleConfig(
  cliOptions: ThrottleCliOptions = {},
  configFile: ThrottleConfigSection = {},
): ThrottleConfig {
  const rateInput = cliOptions.rate ?? configFile.rate;
  const perInput = cliOptions.per ?? configFile.per;
  const tickInput = cliOptions.tick ?? configFile.tick;
  const bufferInput = cliOptions.bufferSize ?? configFile.bufferSize;
  const timerInput = cliOptions.minTimerInterval ?? configFile.minTimerInterval;

  if (rateInput === undefined && perInput !== undefined) {
    throw new ConfigError("A duration (--per) was given without a rate (--rate)");
  }

  const rate: RateSpec | undefined =
    rateInput === undefined
      ? undefined
      : {
          count: parseByteSize(rateInput),
          durationMs: perInput === undefined ? 1000 : parseDuration(perInput),
        };

  if (rate && (rate.count <= 0 || rate.durationMs <= 0)) {
    throw new ConfigError("Rate and duration must both be greater than zero", {
      count: rate.count,
      durationMs: rate.durationMs,
    });
  }

  const { now: _now, ...options } = resolveThrottleOptions({
    tickMs: tickInput === undefined ? undefined : parseDuration(tickInput),
    bufferSize:
      bufferInput === undefined ? undefined : parseByteSize(bufferInput),
    minTimerIntervalMs:
      timerInput === undefined ? undefined : parseDuration(timerInput),
  });

  logger.debug("Throttle config loaded", {
    rate,
    tickMs: options.tickMs,
    bufferSize: options.bufferSize,
    minTimerIntervalMs: options.minTimerIntervalMs,
  });

  return { rate, options };
}
