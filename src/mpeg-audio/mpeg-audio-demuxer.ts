import { Logger, LoggerService } from "@nestjs/common";
import { ByteSource } from "./byte-source.interface";
import { IFrameIterator } from "./frame-iterator.interface";
import { FrameScanner, ResyncEvent, ScannerState } from "./frame-scanner";
import { ConcurrentReadError } from "./mpeg-audio.errors";
import { Frame, ParsedStream } from "./types";

export const DEFAULT_READ_CHUNK_SIZE = 64 * 1024;

export interface DemuxerOptions {
  /**
   * Upper bound on each read from the byte source
   */
  readChunkSize?: number;
  logger?: LoggerService;
}

/**
 * Pulls frames out of a byte source.
 * Reads from the source only when the scanner has no complete frame buffered,
 * so a caller may stop between frames without leaving partial state behind.
 */
export class MpegAudioDemuxer implements IFrameIterator, AsyncIterable<Frame> {
  private readonly logger: LoggerService;
  private readonly readChunkSize: number;
  private readonly scanner: FrameScanner;
  private busy: boolean = false;

  constructor(
    private readonly source: ByteSource,
    options: DemuxerOptions = {},
  ) {
    this.logger = options.logger ?? new Logger(MpegAudioDemuxer.name);
    this.readChunkSize = options.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE;
    if (!(this.readChunkSize > 0)) {
      throw new RangeError(`Read chunk size must be positive, got ${this.readChunkSize}`);
    }
    this.scanner = new FrameScanner({ onResync: this.onResync.bind(this) });
  }

  private onResync(event: ResyncEvent): void {
    this.logger.verbose?.(
      `Resynchronizing at offset ${event.offset}: ${event.cause.code} (${event.cause.message})`,
      MpegAudioDemuxer.name,
    );
  }

  /**
   * Gets the next frame from the source
   * @returns Promise that resolves to the next frame, or null once the source is exhausted
   * @throws ConcurrentReadError if a previous call has not settled yet
   */
  async next(): Promise<Frame | null> {
    if (this.busy) {
      throw new ConcurrentReadError();
    }

    this.busy = true;
    try {
      for (;;) {
        const step = this.scanner.poll();
        switch (step.kind) {
          case "frame":
            return step.frame;
          case "done":
            return null;
          case "need-data": {
            const chunk = await this.source.read(this.readChunkSize);
            if (chunk === null) {
              this.scanner.end();
            } else {
              this.scanner.push(chunk);
            }
            break;
          }
        }
      }
    } finally {
      this.busy = false;
    }
  }

  /**
   * Checks if there are more frames to iterate
   * @returns false once the scan has finished
   */
  hasNext(): boolean {
    return this.scanner.state !== ScannerState.Done;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Frame> {
    for (;;) {
      const frame = await this.next();
      if (frame === null) {
        return;
      }
      yield frame;
    }
  }

  /**
   * Drains the source
   * @returns Every frame found so far, including those already pulled with next()
   */
  async parse(): Promise<ParsedStream> {
    while ((await this.next()) !== null) {
      // Frames are collected by the scanner
    }

    const parsed = this.scanner.toParsedStream();
    this.logger.debug?.(
      `Demuxed ${parsed.frames.length} frames from ${parsed.bytesConsumed} bytes (${parsed.skippedBytes} skipped)`,
      MpegAudioDemuxer.name,
    );
    return parsed;
  }

  /**
   * Snapshot of the frames and counters collected so far
   */
  snapshot(): ParsedStream {
    return this.scanner.toParsedStream();
  }
}

/**
 * Scans a complete in-memory buffer synchronously
 */
export function demuxBuffer(data: Uint8Array): ParsedStream {
  const scanner = new FrameScanner();
  scanner.push(data);
  scanner.end();

  while (scanner.poll().kind === "frame") {
    // Frames are collected by the scanner
  }

  return scanner.toParsedStream();
}
