/**
 * Error codes for MPEG audio decoding
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum MpegAudioErrorCode {
  SYNC_WORD_MISSING = "SYNC_WORD_MISSING",
  RESERVED_VERSION = "RESERVED_VERSION",
  RESERVED_LAYER = "RESERVED_LAYER",
  INVALID_BITRATE_INDEX = "INVALID_BITRATE_INDEX",
  RESERVED_SAMPLE_RATE = "RESERVED_SAMPLE_RATE",
  RESERVED_EMPHASIS = "RESERVED_EMPHASIS",
  PROHIBITED_BITRATE_CHANNEL_COMBINATION = "PROHIBITED_BITRATE_CHANNEL_COMBINATION",
  UNDEFINED_FRAME_LENGTH = "UNDEFINED_FRAME_LENGTH",
  TRUNCATED_PAYLOAD = "TRUNCATED_PAYLOAD",
  NO_VALID_FRAMES = "NO_VALID_FRAMES",
  EXCESSIVE_RESYNC = "EXCESSIVE_RESYNC",
  CONCURRENT_READ = "CONCURRENT_READ",
}

/**
 * Codes the header decoder can produce for a 4-byte window
 */
export type FrameHeaderErrorCode =
  | MpegAudioErrorCode.SYNC_WORD_MISSING
  | MpegAudioErrorCode.RESERVED_VERSION
  | MpegAudioErrorCode.RESERVED_LAYER
  | MpegAudioErrorCode.INVALID_BITRATE_INDEX
  | MpegAudioErrorCode.RESERVED_SAMPLE_RATE
  | MpegAudioErrorCode.RESERVED_EMPHASIS
  | MpegAudioErrorCode.PROHIBITED_BITRATE_CHANNEL_COMBINATION;

/**
 * Base error class for MPEG audio errors
 * Framework-agnostic error that can be caught and converted to framework-specific exceptions
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
 * A 4-byte window that is not a valid frame header
 */
export class FrameHeaderError extends MpegAudioError {
  constructor(
    public readonly code: FrameHeaderErrorCode,
    message: string,
  ) {
    super(code, message);
    this.name = "FrameHeaderError";
  }
}

/**
 * Free-format header: the frame length cannot be derived from the header alone
 */
export class UndefinedFrameLengthError extends MpegAudioError {
  constructor(message: string = "Frame length is undefined for free bitrate") {
    super(MpegAudioErrorCode.UNDEFINED_FRAME_LENGTH, message);
    this.name = "UndefinedFrameLengthError";
  }
}

/**
 * End of input arrived before a declared frame was complete
 */
export class TruncatedPayloadError extends MpegAudioError {
  constructor(
    message: string,
    public readonly expectedLength: number,
    public readonly availableLength: number,
  ) {
    super(MpegAudioErrorCode.TRUNCATED_PAYLOAD, message);
    this.name = "TruncatedPayloadError";
  }
}

/**
 * Errors the scanner recovers from by resynchronizing
 */
export type ResyncCause =
  | FrameHeaderError
  | UndefinedFrameLengthError
  | TruncatedPayloadError;

/**
 * Error thrown when no valid frames are found
 */
export class NoValidFramesError extends MpegAudioError {
  constructor(message: string = "Invalid MPEG audio stream: no valid frames found") {
    super(MpegAudioErrorCode.NO_VALID_FRAMES, message);
    this.name = "NoValidFramesError";
  }
}

/**
 * Error thrown when a stream skipped more bytes than the caller tolerates
 */
export class ExcessiveResyncError extends MpegAudioError {
  constructor(
    public readonly skippedBytes: number,
    public readonly maxSkippedBytes: number,
  ) {
    super(
      MpegAudioErrorCode.EXCESSIVE_RESYNC,
      `Invalid MPEG audio stream: skipped ${skippedBytes} bytes while resynchronizing (tolerance ${maxSkippedBytes})`,
    );
    this.name = "ExcessiveResyncError";
  }
}

/**
 * Error thrown when next() is called while a previous call is still pending
 */
export class ConcurrentReadError extends MpegAudioError {
  constructor(message: string = "Multiple concurrent calls to next() are not supported") {
    super(MpegAudioErrorCode.CONCURRENT_READ, message);
    this.name = "ConcurrentReadError";
  }
}
