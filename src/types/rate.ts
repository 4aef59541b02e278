/**
 * Rate and quota types
 */

/**
 * Fixed-cadence emission plan derived from "count per duration".
 */
export interface RateSchedule {
  /** Units emitted on every period */
  quota: number;
  /** Emission period in milliseconds */
  periodMs: number;
  /** Effective delivery rate after rounding */
  unitsPerSecond: number;
}

export type QuotaPoll =
  | { status: "value"; quota: number }
  | { status: "empty" }
  | { status: "closed" };

/**
 * A single-consumer feed of quota values.
 *
 * `receive` resolves `undefined` once the feed is closed and drained, and
 * rejects with the signal's reason when `signal` aborts first. An aborted
 * receive must not consume a value.
 */
export interface QuotaFeed {
  tryReceive(): QuotaPoll;
  receive(signal?: AbortSignal): Promise<number | undefined>;
}

/**
 * Read bound for one inner transfer.
 */
export type QuotaBound =
  | { kind: "unbounded" }
  | { kind: "limited"; remaining: number };

export interface Limiter {
  setRate(count: number, durationMs: number): RateSchedule;
  setRateSource(feed: QuotaFeed | undefined): void;
}

export interface LimitWaiter extends Limiter {
  wait(): Promise<void>;
}
