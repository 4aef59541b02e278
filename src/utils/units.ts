/**
 * Byte-size and duration units.
 *
 * Sizes are binary multiples (1 KB = 1024 bytes). Durations are expressed in
 * milliseconds, fractional where the unit is finer than a millisecond.
 */

import { ConfigError } from "./errors.js";

export const B = 1;
export const KB = B << 10;
export const MB = KB << 10;
export const GB = MB << 10;

const SIZE_UNITS: Record<string, number> = {
  "": B,
  b: B,
  k: KB,
  kb: KB,
  kib: KB,
  m: MB,
  mb: MB,
  mib: MB,
  g: GB,
  gb: GB,
  gib: GB,
};

const DURATION_UNITS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/i;
const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ns|us|µs|ms|s|m|h)?$/i;

/**
 * Parse a byte size such as `8KB`, `1.5MB` or `512`.
 *
 * @example
 * parseByteSize("64KB"); // 65536
 */
export function parseByteSize(input: string | number): number {
  if (typeof input === "number") {
    return requireNonNegative(input, input);
  }

  const match = SIZE_PATTERN.exec(input.trim());
  const unit = match?.[2]?.toLowerCase() ?? "";
  const multiplier = SIZE_UNITS[unit];
  if (!match || multiplier === undefined) {
    throw new ConfigError(`Invalid byte size: ${input}`, { input });
  }

  return requireNonNegative(Math.round(Number(match[1]) * multiplier), input);
}

/**
 * Parse a duration such as `100us`, `250ms` or `1.5s` into milliseconds.
 * A bare number is taken as milliseconds.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === "number") {
    return requireNonNegative(input, input);
  }

  const match = DURATION_PATTERN.exec(input.trim());
  const unit = match?.[2]?.toLowerCase() ?? "ms";
  const multiplier = DURATION_UNITS[unit];
  if (!match || multiplier === undefined) {
    throw new ConfigError(`Invalid duration: ${input}`, { input });
  }

  return requireNonNegative(Number(match[1]) * multiplier, input);
}

/**
 * Render a byte count with the largest whole binary unit.
 */
export function formatByteSize(bytes: number): string {
  if (bytes >= GB && bytes % GB === 0) return `${bytes / GB}GB`;
  if (bytes >= MB && bytes % MB === 0) return `${bytes / MB}MB`;
  if (bytes >= KB && bytes % KB === 0) return `${bytes / KB}KB`;
  return `${bytes}B`;
}

function requireNonNegative(value: number, input: string | number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Expected a non-negative finite value, got ${input}`, {
      input,
    });
  }
  return value;
}
