import { describe, it, expect } from 'vitest';
import { quotaFeedFrom } from '../../../src/lib/rate/feed.js';

describe('quotaFeedFrom', () => {
  it('delivers values from a sync iterable and closes at the end', async () => {
    const feed = quotaFeedFrom([1, 2, 3]);

    const received: Array<number | undefined> = [];
    for (let i = 0; i < 4; i++) {
      received.push(await feed.receive());
    }

    expect(received).toEqual([1, 2, 3, undefined]);
    expect(feed.isClosed).toBe(true);
  });

  it('delivers values from an async generator', async () => {
    async function* quotas() {
      yield 10;
      yield 20;
    }

    const feed = quotaFeedFrom(quotas());
    await expect(feed.receive()).resolves.toBe(10);
    await expect(feed.receive()).resolves.toBe(20);
    await expect(feed.receive()).resolves.toBeUndefined();
  });

  it('closes the feed when the iterable throws', async () => {
    async function* failing() {
      yield 5;
      throw new Error('upstream policy failed');
    }

    const feed = quotaFeedFrom(failing());
    await expect(feed.receive()).resolves.toBe(5);
    await expect(feed.receive()).resolves.toBeUndefined();
  });

  it('stops pulling once the signal aborts', async () => {
    const controller = new AbortController();
    let pulled = 0;
    function* counting() {
      for (;;) {
        pulled++;
        yield 1;
      }
    }

    const feed = quotaFeedFrom(counting(), { signal: controller.signal });
    await expect(feed.receive()).resolves.toBe(1);

    controller.abort();
    // Buffered values stay readable; no new ones are pulled after them
    await feed.receive();
    await feed.receive();
    const pulledAfterAbort = pulled;
    await new Promise((resolve) => setImmediate(resolve));
    expect(pulled).toBe(pulledAfterAbort);
    await expect(feed.receive()).resolves.toBeUndefined();
  });
});
