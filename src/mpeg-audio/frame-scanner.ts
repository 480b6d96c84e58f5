import { MPEG_AUDIO_CONSTANTS } from "./consts";
import { decodeFrameHeader, FrameHeader, isFrameSync } from "./frame-header";
import { frameLengthBytes } from "./frame-length";
import {
  MpegAudioErrorCode,
  ResyncCause,
  TruncatedPayloadError,
} from "./mpeg-audio.errors";
import { Frame, ParsedStream } from "./types";

export enum ScannerState {
  Seeking = "seeking",
  Validating = "validating",
  Resyncing = "resyncing",
  Done = "done",
}

export type ScanStep =
  | { readonly kind: "frame"; readonly frame: Frame }
  | { readonly kind: "need-data" }
  | { readonly kind: "done" };

/**
 * A candidate window the scanner rejected before resynchronizing
 */
export interface ResyncEvent {
  /**
   * Absolute position of the rejected sync candidate
   */
  offset: number;
  cause: ResyncCause;
}

export interface FrameScannerOptions {
  onResync?: (event: ResyncEvent) => void;
}

const NEED_DATA: ScanStep = { kind: "need-data" };
const DONE: ScanStep = { kind: "done" };

/**
 * Synchronous MPEG audio frame scanner.
 *
 * Bytes are fed with {@link push} and {@link end}; {@link poll} advances the
 * Seeking / Validating / Resyncing / Done state machine until it produces a
 * frame, runs out of buffered bytes, or finishes. Invalid windows never fail
 * the scan: the cursor moves one byte past the candidate and seeking resumes.
 */
export class FrameScanner {
  private buffer: Buffer = Buffer.alloc(0);
  private bufferOffset: number = 0; // Absolute position of buffer[0]
  private cursor: number = 0;
  private ended: boolean = false;
  private currentState: ScannerState = ScannerState.Seeking;
  private pendingCause: ResyncCause | null = null;
  private readonly frames: Frame[] = [];
  private consumed: number = 0;
  private skipped: number = 0;
  private readonly errorCounts: Partial<Record<MpegAudioErrorCode, number>> = {};

  constructor(private readonly options: FrameScannerOptions = {}) {}

  get state(): ScannerState {
    return this.currentState;
  }

  get bytesConsumed(): number {
    return this.consumed;
  }

  get skippedBytes(): number {
    return this.skipped;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  /**
   * Appends bytes from the source. Already-buffered bytes are kept as they are.
   */
  push(chunk: Uint8Array): void {
    if (this.ended) {
      throw new Error("Cannot push data after end of input");
    }
    if (chunk.length === 0) {
      return;
    }

    const bytes = Buffer.isBuffer(chunk)
      ? chunk
      : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    this.buffer =
      this.cursor >= this.buffer.length
        ? bytes
        : Buffer.concat([this.buffer.subarray(this.cursor), bytes]);
    this.bufferOffset += this.cursor;
    this.cursor = 0;
  }

  /**
   * Signals end of input
   */
  end(): void {
    this.ended = true;
  }

  /**
   * Runs the state machine until the next observable step
   */
  poll(): ScanStep {
    for (;;) {
      switch (this.currentState) {
        case ScannerState.Seeking:
          if (!this.seek()) {
            if (!this.ended) {
              return NEED_DATA;
            }
            // Not enough bytes left for a header
            this.skip(this.buffer.length - this.cursor);
            this.currentState = ScannerState.Done;
          }
          break;

        case ScannerState.Validating: {
          const step = this.validate();
          if (step !== null) {
            return step;
          }
          break;
        }

        case ScannerState.Resyncing:
          this.resync();
          break;

        case ScannerState.Done:
          return DONE;
      }
    }
  }

  /**
   * Snapshot of the frames and counters collected so far
   */
  toParsedStream(): ParsedStream {
    return {
      frames: [...this.frames],
      bytesConsumed: this.consumed,
      skippedBytes: this.skipped,
      errorCounts: { ...this.errorCounts },
    };
  }

  /**
   * Moves the cursor to the next sync-aligned 4-byte window.
   * @returns true if one is buffered
   */
  private seek(): boolean {
    while (this.cursor + MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE <= this.buffer.length) {
      if (isFrameSync(this.buffer, this.cursor)) {
        this.currentState = ScannerState.Validating;
        return true;
      }
      this.skip(1);
    }
    return false;
  }

  /**
   * Decodes the header at the cursor and emits the frame once it is fully buffered.
   * @returns the step to hand to the caller, or null to keep running
   */
  private validate(): ScanStep | null {
    const decoded = decodeFrameHeader(this.buffer, this.cursor);
    if (!decoded.ok) {
      return this.reject(decoded.error);
    }

    const length = frameLengthBytes(decoded.value);
    if (!length.ok) {
      return this.reject(length.error);
    }

    const available = this.buffer.length - this.cursor;
    if (length.value > available) {
      if (!this.ended) {
        // Resumes here once more bytes arrive
        return NEED_DATA;
      }
      return this.reject(
        new TruncatedPayloadError(
          `Frame at offset ${this.position} declares ${length.value} bytes but only ${available} remain`,
          length.value,
          available,
        ),
      );
    }

    const frame = this.createFrame(decoded.value, length.value);
    this.frames.push(frame);
    this.cursor += length.value;
    this.consumed += length.value;
    this.currentState = ScannerState.Seeking;
    return { kind: "frame", frame };
  }

  private createFrame(header: FrameHeader, length: number): Frame {
    const bytes = this.buffer.subarray(this.cursor, this.cursor + length);
    const payloadStart =
      MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE +
      (header.hasCrc ? MPEG_AUDIO_CONSTANTS.CRC_SIZE : 0);

    return Object.freeze({
      offset: this.position,
      length,
      header,
      crc: header.hasCrc
        ? bytes.readUInt16BE(MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE)
        : undefined,
      bytes,
      payload: bytes.subarray(payloadStart),
    });
  }

  private reject(cause: ResyncCause): null {
    this.pendingCause = cause;
    this.currentState = ScannerState.Resyncing;
    return null;
  }

  /**
   * Steps one byte past the rejected candidate and returns to seeking
   */
  private resync(): void {
    if (this.pendingCause !== null) {
      const cause = this.pendingCause;
      this.pendingCause = null;
      this.errorCounts[cause.code] = (this.errorCounts[cause.code] ?? 0) + 1;
      this.options.onResync?.({ offset: this.position, cause });
    }
    this.skip(1);
    this.currentState = ScannerState.Seeking;
  }

  private skip(count: number): void {
    this.cursor += count;
    this.consumed += count;
    this.skipped += count;
  }

  private get position(): number {
    return this.bufferOffset + this.cursor;
  }
}
