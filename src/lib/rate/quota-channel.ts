/**
 * Bounded single-consumer channel of quota values.
 */

import { QuotaFeed, QuotaPoll } from "../../types/rate.js";
import { ConfigError } from "../../utils/errors.js";

type Receiver = (quota: number | undefined) => void;

interface PendingSend {
  quota: number;
  resolve: (accepted: boolean) => void;
}

/**
 * A channel with room for `capacity` buffered values. With capacity 0 a value
 * only passes when a receiver is already waiting.
 *
 * Producers either `offer` (never waits, returns false when full) or `send`
 * (waits for room). Closing keeps buffered values readable; once drained,
 * receivers see `closed`.
 */
export class QuotaChannel implements QuotaFeed {
  private readonly buffer: number[] = [];
  private readonly receivers: Receiver[] = [];
  private readonly senders: PendingSend[] = [];
  private closed = false;

  constructor(private readonly capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ConfigError(
        `Quota channel capacity must be a non-negative integer, got ${capacity}`,
      );
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Buffered values not yet received */
  get size(): number {
    return this.buffer.length;
  }

  offer(quota: number): boolean {
    assertQuota(quota);
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(quota);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(quota);
      return true;
    }

    return false;
  }

  /**
   * Deliver a value, waiting for room. Resolves false if the channel closes first.
   */
  send(quota: number): Promise<boolean> {
    if (this.offer(quota)) return Promise.resolve(true);
    if (this.closed) return Promise.resolve(false);

    return new Promise((resolve) => {
      this.senders.push({ quota, resolve });
    });
  }

  tryReceive(): QuotaPoll {
    const quota = this.take();
    if (quota !== undefined) return { status: "value", quota };
    return this.closed ? { status: "closed" } : { status: "empty" };
  }

  receive(signal?: AbortSignal): Promise<number | undefined> {
    if (signal?.aborted) return Promise.reject(signal.reason);

    const quota = this.take();
    if (quota !== undefined) return Promise.resolve(quota);
    if (this.closed) return Promise.resolve(undefined);

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.receivers.indexOf(receiver);
        if (index !== -1) this.receivers.splice(index, 1);
        reject(signal?.reason);
      };
      const receiver: Receiver = (value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(receiver);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
  }

  private take(): number | undefined {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      const next = this.senders.shift();
      if (next) {
        this.buffer.push(next.quota);
        next.resolve(true);
      }
      return buffered;
    }

    // Rendezvous with a waiting sender (capacity 0, or a full buffer just drained)
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return sender.quota;
    }

    return undefined;
  }
}

function assertQuota(quota: number): void {
  if (!Number.isInteger(quota) || quota < 0) {
    throw new ConfigError(`Quota must be a non-negative integer, got ${quota}`, {
      quota,
    });
  }
}
