/**
 * Error codes for MPEG audio format problems
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum MpegAudioErrorCode {
  NOT_MPEG_AUDIO = "NOT_MPEG_AUDIO",
  TRUNCATED_STREAM = "TRUNCATED_STREAM",
  CORRUPT_FRAME = "CORRUPT_FRAME",
}

/**
 * Base error class for format errors raised while reading MPEG audio
 */
export class MpegAudioError extends Error {
  constructor(
    public readonly code: MpegAudioErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MpegAudioError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MpegAudioError);
    }
  }
}

/**
 * No confirmed frame within the lookahead window
 */
export class NotMpegAudioError extends MpegAudioError {
  constructor(
    public readonly searchStart: number,
    public readonly searchEnd: number,
  ) {
    super(
      MpegAudioErrorCode.NOT_MPEG_AUDIO,
      `No MPEG audio frame found between offsets ${searchStart} and ${searchEnd}`,
    );
    this.name = "NotMpegAudioError";
  }
}

/**
 * The stream ended before a first frame could be read whole
 */
export class TruncatedStreamError extends MpegAudioError {
  constructor(message: string) {
    super(MpegAudioErrorCode.TRUNCATED_STREAM, message);
    this.name = "TruncatedStreamError";
  }
}

/**
 * A region that should have held frames but did not.
 * Recorded in scan reports, never thrown by the engine.
 */
export class CorruptFrameError extends MpegAudioError {
  constructor(
    public readonly offset: number,
    public readonly length: number,
  ) {
    super(
      MpegAudioErrorCode.CORRUPT_FRAME,
      `Corrupt frame data: ${length} bytes skipped at offset ${offset}`,
    );
    this.name = "CorruptFrameError";
  }
}

/**
 * Error codes for failures of the storage behind a byte source
 */
export enum ByteSourceErrorCode {
  OPEN_ERROR = "OPEN_ERROR",
  READ_ERROR = "READ_ERROR",
}

/**
 * Base error class for transport failures of a byte source
 */
export class ByteSourceError extends Error {
  constructor(
    public readonly code: ByteSourceErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "ByteSourceError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ByteSourceError);
    }
  }
}

export class ByteSourceOpenError extends ByteSourceError {
  constructor(path: string, cause?: unknown) {
    super(
      ByteSourceErrorCode.OPEN_ERROR,
      `Failed to open ${path}: ${describeCause(cause)}`,
      cause,
    );
    this.name = "ByteSourceOpenError";
  }
}

export class ByteSourceReadError extends ByteSourceError {
  constructor(position: number, length: number, cause?: unknown) {
    super(
      ByteSourceErrorCode.READ_ERROR,
      `Failed to read ${length} bytes at offset ${position}: ${describeCause(cause)}`,
      cause,
    );
    this.name = "ByteSourceReadError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

