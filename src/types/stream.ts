/**
 * Byte stream contracts shared by sources, adapters and the throttled stream.
 */

/**
 * Outcome of a single read. `bytesRead` counts bytes written into the
 * destination by this call, including when it also reports eof or an error.
 */
export type ReadResult =
  | { bytesRead: number; status: "ok" }
  | { bytesRead: number; status: "eof" }
  | { bytesRead: number; status: "error"; error: Error };

/**
 * A pull-based byte source. `read` fills at most `destination.length` bytes
 * and settles once at least one byte, end-of-stream or an error is available.
 */
export interface ByteSource {
  read(destination: Uint8Array): Promise<ReadResult>;
  /** Release underlying resources; called when the consumer is torn down */
  close?(): void;
}
