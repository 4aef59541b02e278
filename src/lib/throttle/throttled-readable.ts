/**
 * Node.js Readable view of a ThrottledStream, for piping.
 */

import { Readable } from "stream";
import { toError } from "../../utils/errors.js";
import { KB } from "../../utils/units.js";
import { ThrottledStream } from "./throttled-stream.js";

export interface ThrottledReadableOptions {
  /** Largest chunk requested per throttled read */
  chunkSize?: number;
  highWaterMark?: number;
}

/**
 * Readable stream that pulls from a ThrottledStream. Destroying it closes
 * the throttled stream, which stops its rate emitter and releases the source.
 */
export class ThrottledReadable extends Readable {
  private readonly chunkSize: number;

  constructor(
    private readonly stream: ThrottledStream,
    options: ThrottledReadableOptions = {},
  ) {
    super({ highWaterMark: options.highWaterMark });
    this.chunkSize = options.chunkSize ?? 16 * KB;
  }

  get throttledStream(): ThrottledStream {
    return this.stream;
  }

  async _read(size: number): Promise<void> {
    const chunk = new Uint8Array(Math.max(1, Math.min(size, this.chunkSize)));

    try {
      // A zero-byte ok read pushes nothing, and _read is only called again after a push
      for (;;) {
        const result = await this.stream.read(chunk);
        if (this.destroyed) return;

        if (result.bytesRead > 0) {
          this.push(Buffer.from(chunk.buffer, chunk.byteOffset, result.bytesRead));
        }

        if (result.status === "eof") {
          this.push(null);
          return;
        }
        if (result.status === "error") {
          this.destroy(result.error);
          return;
        }
        if (result.bytesRead > 0) return;

        // Yield event loop so an idle source cannot starve it
        await new Promise((resolve) => setImmediate(resolve));
      }
    } catch (error) {
      this.destroy(toError(error));
    }
  }

  _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ): void {
    this.stream.close();
    callback(error);
  }
}

export function createThrottledReadable(
  stream: ThrottledStream,
  options?: ThrottledReadableOptions,
): ThrottledReadable {
  return new ThrottledReadable(stream, options);
}
