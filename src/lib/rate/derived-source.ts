/**
 * Derived rate source: a quota feed driven by an internal fixed-cadence emitter.
 */

import { QuotaFeed, QuotaPoll, RateSchedule } from "../../types/rate.js";
import { DEFAULT_THROTTLE_OPTIONS } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { QuotaChannel } from "./quota-channel.js";
import { computeSchedule } from "./schedule.js";
import { Ticker } from "./ticker.js";

export interface DerivedRateSourceOptions {
  minTimerIntervalMs?: number;
  now?: () => number;
  /** Stops the emitter when aborted */
  signal?: AbortSignal;
}

/**
 * Emits `schedule.quota` per elapsed period into a single-slot channel.
 * A value offered while the slot is still full is dropped, so an idle
 * consumer never builds up a burst.
 *
 * The emitter runs from `start()` until `stop()` or until `signal` aborts.
 */
export class DerivedRateSource implements QuotaFeed {
  private readonly channel = new QuotaChannel(1);
  private readonly ticker: Ticker;
  private readonly signal: AbortSignal | undefined;
  private stopped = false;

  constructor(
    readonly schedule: RateSchedule,
    options: DerivedRateSourceOptions = {},
  ) {
    this.signal = options.signal;
    this.ticker = new Ticker(
      {
        periodMs: schedule.periodMs,
        minIntervalMs:
          options.minTimerIntervalMs ??
          DEFAULT_THROTTLE_OPTIONS.minTimerIntervalMs,
        now: options.now ?? DEFAULT_THROTTLE_OPTIONS.now,
      },
      (ticks) => this.emit(ticks),
    );
  }

  static fromRate(
    count: number,
    durationMs: number,
    options: DerivedRateSourceOptions & { tickMs?: number } = {},
  ): DerivedRateSource {
    const schedule = computeSchedule(
      count,
      durationMs,
      options.tickMs ?? DEFAULT_THROTTLE_OPTIONS.tickMs,
    );
    return new DerivedRateSource(schedule, options);
  }

  get running(): boolean {
    return this.ticker.running;
  }

  start(): void {
    if (this.stopped) return;
    if (this.signal?.aborted) {
      this.stop();
      return;
    }

    this.signal?.addEventListener("abort", this.handleAbort, { once: true });
    this.ticker.start();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    this.ticker.stop();
    this.signal?.removeEventListener("abort", this.handleAbort);
    this.channel.close();
    logger.debug("Derived rate emitter stopped", {
      quota: this.schedule.quota,
      periodMs: this.schedule.periodMs,
    });
  }

  tryReceive(): QuotaPoll {
    return this.channel.tryReceive();
  }

  receive(signal?: AbortSignal): Promise<number | undefined> {
    return this.channel.receive(signal);
  }

  private readonly handleAbort = (): void => {
    this.stop();
  };

  private emit(ticks: number): void {
    this.channel.offer(ticks * this.schedule.quota);
  }
}
