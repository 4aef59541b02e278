/**
 * Adapts Node.js readable streams to the pull-based ByteSource contract.
 */

import { Readable } from "stream";
import { ByteSource, ReadResult } from "../../types/stream.js";
import { InvalidChunkError, toError } from "../../utils/errors.js";

/**
 * Pulls chunks through the readable's async iterator and hands them out in
 * destination-sized pieces. The unread part of a chunk is kept for the next read.
 */
export class ReadableByteSource implements ByteSource {
  private readonly iterator: AsyncIterator<unknown>;
  private pending: Uint8Array = new Uint8Array(0);
  private ended = false;

  constructor(readonly readable: Readable) {
    this.iterator = readable[Symbol.asyncIterator]();
  }

  async read(destination: Uint8Array): Promise<ReadResult> {
    if (destination.length === 0) return { bytesRead: 0, status: "ok" };

    while (this.pending.length === 0) {
      if (this.ended) return { bytesRead: 0, status: "eof" };

      let next: IteratorResult<unknown>;
      try {
        next = await this.iterator.next();
      } catch (error) {
        return { bytesRead: 0, status: "error", error: toError(error) };
      }

      if (next.done) {
        this.ended = true;
        return { bytesRead: 0, status: "eof" };
      }

      const chunk = toBytes(next.value);
      if (!chunk) {
        return {
          bytesRead: 0,
          status: "error",
          error: new InvalidChunkError(
            "Readable produced a chunk that is not bytes or a string",
            { chunkType: typeof next.value },
          ),
        };
      }
      this.pending = chunk;
    }

    const count = Math.min(destination.length, this.pending.length);
    destination.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return { bytesRead: count, status: "ok" };
  }

  close(): void {
    this.ended = true;
    this.pending = new Uint8Array(0);
    this.readable.destroy();
  }
}

function toBytes(chunk: unknown): Uint8Array | undefined {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  return undefined;
}
