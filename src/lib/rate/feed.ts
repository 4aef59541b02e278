/**
 * Helpers for building delegated quota feeds.
 */

import { logger } from "../../utils/logger.js";
import { toError } from "../../utils/errors.js";
import { QuotaChannel } from "./quota-channel.js";

export interface QuotaFeedFromOptions {
  capacity?: number;
  /** Stops pulling values from the iterable when aborted */
  signal?: AbortSignal;
}

/**
 * Build a quota feed from any iterable of quota values. Values are pulled as
 * the channel makes room; the channel closes when the iterable finishes.
 *
 * @example
 * async function* everySecond() {
 *   for (;;) {
 *     await setTimeout(1000);
 *     yield 64 * KB;
 *   }
 * }
 * stream.setRateSource(quotaFeedFrom(everySecond()));
 */
export function quotaFeedFrom(
  values: Iterable<number> | AsyncIterable<number>,
  options: QuotaFeedFromOptions = {},
): QuotaChannel {
  const channel = new QuotaChannel(options.capacity ?? 1);

  void pump(values, channel, options.signal).then(
    () => channel.close(),
    (error: unknown) => {
      logger.warn("Quota feed iterable failed", {
        error: toError(error).message,
      });
      channel.close();
    },
  );

  return channel;
}

async function pump(
  values: Iterable<number> | AsyncIterable<number>,
  channel: QuotaChannel,
  signal: AbortSignal | undefined,
): Promise<void> {
  for await (const quota of values) {
    if (signal?.aborted || channel.isClosed) return;
    const accepted = await channel.send(quota);
    if (!accepted) return;
  }
}
