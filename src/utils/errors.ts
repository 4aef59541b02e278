/**
 * Standard error classes for bytepace
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  UNEXPECTED_EOF = "UNEXPECTED_EOF",
  STREAM_CLOSED = "STREAM_CLOSED",
  INVALID_CHUNK = "INVALID_CHUNK",
}

export type ErrorDetails = Record<string, unknown>;

export class BytePaceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BytePaceError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends BytePaceError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends BytePaceError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Raised when a throttled stream has no underlying source to read from.
 */
export class UnexpectedEndOfStreamError extends BytePaceError {
  constructor(message = "unexpected end of stream", details?: ErrorDetails) {
    super(ErrorCode.UNEXPECTED_EOF, message, details);
    this.name = "UnexpectedEndOfStreamError";
  }
}

export class StreamClosedError extends BytePaceError {
  constructor(message = "throttled stream is closed", details?: ErrorDetails) {
    super(ErrorCode.STREAM_CLOSED, message, details);
    this.name = "StreamClosedError";
  }
}

export class InvalidChunkError extends BytePaceError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.INVALID_CHUNK, message, details);
    this.name = "InvalidChunkError";
  }
}

/**
 * Normalize an unknown thrown value into an Error, keeping Error instances as-is.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new BytePaceError(ErrorCode.GENERAL_ERROR, String(value), undefined, {
    cause: value,
  });
}
