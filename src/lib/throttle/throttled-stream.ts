/**
 * Throttled byte stream: bounds each read by the quota of the installed rate source.
 */

import { Readable } from "stream";
import { ByteSource, ReadResult } from "../../types/stream.js";
import {
  LimitWaiter,
  QuotaBound,
  QuotaFeed,
  RateSchedule,
} from "../../types/rate.js";
import {
  ResolvedThrottleOptions,
  ThrottleOptions,
} from "../../types/config.js";
import { resolveThrottleOptions } from "../../utils/config-loader.js";
import {
  StreamClosedError,
  UnexpectedEndOfStreamError,
  toError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { computeSchedule } from "../rate/schedule.js";
import { DerivedRateSource } from "../rate/derived-source.js";
import { ReadableByteSource } from "./byte-source.js";
import { CompletionSignal } from "./completion.js";

const UNBOUNDED: QuotaBound = { kind: "unbounded" };

// Returned by a quota wait that was interrupted by a rate source swap
const SWAPPED = Symbol("swapped");

/**
 * Wraps a byte source and paces reads according to the installed rate.
 *
 * Without a rate source reads pass straight through, bounded only by the
 * destination and the internal buffer. With one, every byte read consumes a
 * unit of quota. A new rate source takes effect at the next quota refill; a
 * read already holding quota finishes it first.
 *
 * One reader at a time is assumed.
 */
export class ThrottledStream implements ByteSource, LimitWaiter {
  private readonly options: ResolvedThrottleOptions;
  private buffer: Uint8Array | undefined;
  private reachedEnd = false;
  private closed = false;
  private remaining = 0;
  private delivered = 0;

  private rateSource: QuotaFeed | undefined;
  private ownedSource: DerivedRateSource | undefined;
  private refill: AbortController | undefined;

  private readonly completion = new CompletionSignal();
  private readonly teardown = new AbortController();

  constructor(
    private readonly source: ByteSource | undefined,
    options: ThrottleOptions = {},
  ) {
    this.options = resolveThrottleOptions(options);
  }

  /** True once the wrapped source reported end-of-stream */
  get ended(): boolean {
    return this.reachedEnd;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Total bytes handed to callers */
  get bytesRead(): number {
    return this.delivered;
  }

  get throttled(): boolean {
    return this.rateSource !== undefined;
  }

  /** Schedule of the installed derived rate, if the active source is one */
  get schedule(): RateSchedule | undefined {
    return this.ownedSource?.schedule;
  }

  async read(destination: Uint8Array): Promise<ReadResult> {
    if (!this.source) {
      return {
        bytesRead: 0,
        status: "error",
        error: new UnexpectedEndOfStreamError(),
      };
    }
    if (this.reachedEnd) return { bytesRead: 0, status: "eof" };
    if (this.closed) {
      return { bytesRead: 0, status: "error", error: new StreamClosedError() };
    }

    const buffer = (this.buffer ??= new Uint8Array(this.options.bufferSize));
    let written = 0;

    while (written < destination.length) {
      let bound: QuotaBound | undefined;
      try {
        bound = await this.nextBound(written);
      } catch (error) {
        return this.settle(written, toError(error));
      }
      if (!bound) break;

      const space = Math.min(destination.length - written, buffer.length);
      const limit =
        bound.kind === "limited" ? Math.min(bound.remaining, space) : space;

      const result = await this.readSource(this.source, buffer.subarray(0, limit));
      const transferred = Math.min(result.bytesRead, limit);

      destination.set(buffer.subarray(0, transferred), written);
      written += transferred;
      if (bound.kind === "limited") {
        this.remaining -= transferred;
      }

      if (result.status === "eof") {
        const settled = this.settle(written, "eof");
        this.markEnd();
        return settled;
      }
      if (result.status === "error") {
        return this.settle(written, result.error);
      }
      if (transferred === 0) break;
    }

    return this.settle(written, "ok");
  }

  /**
   * Limit reads to `count` bytes every `durationMs`. Replaces any active rate
   * source; the previous derived emitter is stopped.
   */
  setRate(count: number, durationMs: number): RateSchedule {
    const schedule = computeSchedule(count, durationMs, this.options.tickMs);
    const derived = new DerivedRateSource(schedule, {
      minTimerIntervalMs: this.options.minTimerIntervalMs,
      now: this.options.now,
      signal: this.teardown.signal,
    });

    this.install(derived, derived);
    logger.debug("Installed derived rate", {
      count,
      durationMs,
      quota: schedule.quota,
      periodMs: schedule.periodMs,
    });
    return schedule;
  }

  /**
   * Install an externally driven quota feed, or remove the limit with `undefined`.
   */
  setRateSource(feed: QuotaFeed | undefined): void {
    this.install(feed, undefined);
    logger.debug("Installed delegated rate source", { throttled: !!feed });
  }

  /** Resolves once the wrapped source has reached end-of-stream */
  wait(): Promise<void> {
    return this.completion.wait();
  }

  /**
   * Stop the derived emitter and release the wrapped source. Reads after
   * closing fail with StreamClosedError; a read waiting for quota is woken
   * and fails the same way.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.refill?.abort();
    this.teardown.abort();
    this.source?.close?.();
    logger.debug("Throttled stream closed", { bytesRead: this.delivered });
  }

  private install(
    feed: QuotaFeed | undefined,
    owned: DerivedRateSource | undefined,
  ): void {
    const previous = this.ownedSource;
    this.rateSource = feed;
    this.ownedSource = owned;

    // Wake a reader parked on the previous feed so it re-checks the new one
    this.refill?.abort();
    previous?.stop();

    if (!owned) return;
    if (this.reachedEnd || this.closed) {
      owned.stop();
    } else {
      owned.start();
    }
  }

  /**
   * Bound for the next inner transfer, refilling quota when it is spent.
   * Returns undefined when quota ran out after something was written, so
   * the caller hands back the partial read instead of waiting.
   */
  private async nextBound(written: number): Promise<QuotaBound | undefined> {
    for (;;) {
      if (this.closed) throw new StreamClosedError();

      const feed = this.rateSource;
      if (!feed) return UNBOUNDED;
      if (this.remaining > 0) {
        return { kind: "limited", remaining: this.remaining };
      }

      const poll = feed.tryReceive();
      if (poll.status === "value") {
        this.remaining = poll.quota;
        continue;
      }
      if (poll.status === "closed") {
        this.dropClosedFeed(feed);
        continue;
      }
      if (written > 0) return undefined;

      const quota = await this.awaitQuota(feed);
      if (quota === SWAPPED) continue;
      if (quota === undefined) {
        this.dropClosedFeed(feed);
        continue;
      }
      this.remaining = quota;
    }
  }

  private async awaitQuota(
    feed: QuotaFeed,
  ): Promise<number | undefined | typeof SWAPPED> {
    const controller = new AbortController();
    this.refill = controller;
    try {
      return await feed.receive(controller.signal);
    } catch (error) {
      if (controller.signal.aborted) return SWAPPED;
      throw error;
    } finally {
      if (this.refill === controller) this.refill = undefined;
    }
  }

  private dropClosedFeed(feed: QuotaFeed): void {
    if (this.rateSource !== feed) return;
    this.rateSource = undefined;
    this.remaining = 0;
    logger.debug("Quota feed closed; reads are no longer throttled");
  }

  private async readSource(
    source: ByteSource,
    chunk: Uint8Array,
  ): Promise<ReadResult> {
    try {
      return await source.read(chunk);
    } catch (error) {
      return { bytesRead: 0, status: "error", error: toError(error) };
    }
  }

  private markEnd(): void {
    if (this.reachedEnd) return;
    this.reachedEnd = true;
    this.completion.release();
    this.ownedSource?.stop();
    logger.debug("Throttled stream reached end of stream", {
      bytesRead: this.delivered,
    });
  }

  private settle(written: number, outcome: "ok" | "eof" | Error): ReadResult {
    this.delivered += written;
    if (outcome === "ok") return { bytesRead: written, status: "ok" };
    if (outcome === "eof") return { bytesRead: written, status: "eof" };
    return { bytesRead: written, status: "error", error: outcome };
  }
}

export type Wrappable = ThrottledStream | ByteSource | Readable | null | undefined;

/**
 * Wrap a byte source or Node.js readable in a ThrottledStream. Wrapping a
 * ThrottledStream returns it unchanged, and `options` are then ignored.
 */
export function wrap(input: Wrappable, options?: ThrottleOptions): ThrottledStream {
  if (input instanceof ThrottledStream) return input;
  if (input instanceof Readable) {
    return new ThrottledStream(new ReadableByteSource(input), options);
  }
  return new ThrottledStream(input ?? undefined, options);
}
