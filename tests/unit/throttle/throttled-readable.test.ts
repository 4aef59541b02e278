import { describe, it, expect } from 'vitest';
import { once } from 'events';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { wrap } from '../../../src/lib/throttle/throttled-stream.js';
import {
  ThrottledReadable,
  createThrottledReadable,
} from '../../../src/lib/throttle/throttled-readable.js';
import { FailingSource, MemorySource, sequentialBytes } from '../../helpers/memory-source.js';

function collector(): { sink: Writable; chunks: Buffer[] } {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { sink, chunks };
}

describe('ThrottledReadable', () => {
  it('pipes every byte of the wrapped stream', async () => {
    const data = sequentialBytes(5000);
    const stream = wrap(new MemorySource(data), { bufferSize: 512 });
    const { sink, chunks } = collector();

    await pipeline(createThrottledReadable(stream, { chunkSize: 1000 }), sink);

    expect(Buffer.concat(chunks)).toEqual(Buffer.from(data));
    expect(chunks.every((chunk) => chunk.length <= 1000)).toBe(true);
    expect(stream.ended).toBe(true);
    expect(stream.bytesRead).toBe(5000);
  });

  it('exposes the wrapped stream', () => {
    const stream = wrap(new MemorySource(sequentialBytes(1)));
    expect(new ThrottledReadable(stream).throttledStream).toBe(stream);
  });

  it('destroys itself with the upstream error', async () => {
    const boom = new Error('disk gone');
    const stream = wrap(new FailingSource(boom, 4));
    const { sink } = collector();

    await expect(pipeline(createThrottledReadable(stream), sink)).rejects.toBe(boom);
    expect(stream.isClosed).toBe(true);
  });

  it('closes the throttled stream and its source when destroyed', async () => {
    const source = new MemorySource(sequentialBytes(10));
    const stream = wrap(source);
    const readable = createThrottledReadable(stream);

    readable.destroy();
    await once(readable, 'close');

    expect(stream.isClosed).toBe(true);
    expect(source.closed).toBe(true);
  });
});
