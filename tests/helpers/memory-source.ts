/**
 * In-process byte sources for tests
 */

import { ByteSource, ReadResult } from '../../src/types/stream.js';

/**
 * Serves a fixed byte array, then end-of-stream. Records the size of every
 * read request it receives.
 */
export class MemorySource implements ByteSource {
  readonly requests: number[] = [];
  closed = false;
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  async read(destination: Uint8Array): Promise<ReadResult> {
    this.requests.push(destination.length);
    if (this.offset >= this.data.length) {
      return { bytesRead: 0, status: 'eof' };
    }

    const count = Math.min(destination.length, this.data.length - this.offset);
    destination.set(this.data.subarray(this.offset, this.offset + count));
    this.offset += count;
    return { bytesRead: count, status: 'ok' };
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Writes `prefix` bytes and then reports `error` in the same result.
 */
export class FailingSource implements ByteSource {
  constructor(
    private readonly error: Error,
    private readonly prefix = 0,
  ) {}

  async read(destination: Uint8Array): Promise<ReadResult> {
    const count = Math.min(this.prefix, destination.length);
    destination.fill(7, 0, count);
    return { bytesRead: count, status: 'error', error: this.error };
  }
}

export function sequentialBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = i % 256;
  }
  return bytes;
}

export function errorOf(result: ReadResult): Error {
  if (result.status !== 'error') {
    throw new Error(`Expected an error result, got ${result.status}`);
  }
  return result.error;
}

/**
 * Let pending promise callbacks and I/O callbacks run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
