import { Readable } from "stream";
import { ByteSource } from "./byte-source.interface";

/**
 * In-memory byte source. An optional chunk size limits every read,
 * which lets callers reproduce transport-sized reads.
 */
export class BufferByteSource implements ByteSource {
  private position: number = 0;
  private readonly data: Buffer;

  constructor(
    data: Uint8Array,
    private readonly chunkSize: number = Number.POSITIVE_INFINITY,
  ) {
    if (!(chunkSize > 0)) {
      throw new RangeError(`Chunk size must be positive, got ${chunkSize}`);
    }
    this.data = Buffer.isBuffer(data)
      ? data
      : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  async read(maxBytes: number): Promise<Buffer | null> {
    if (this.position >= this.data.length) {
      return null;
    }

    const end = Math.min(
      this.data.length,
      this.position + Math.min(maxBytes, this.chunkSize),
    );
    const chunk = this.data.subarray(this.position, end);
    this.position = end;
    return chunk;
  }
}

/**
 * Byte source over a Node.js readable stream.
 * Handles stream events and buffers chunks until they are read; the stream is
 * paused while more than `highWaterMark` bytes wait to be read.
 */
export class ReadableByteSource implements ByteSource {
  private chunks: Buffer[] = [];
  private bufferedBytes: number = 0;
  private isEnded: boolean = false;
  private streamError: Error | null = null;
  private pendingResolve: ((value: Buffer | null) => void) | null = null;
  private pendingReject: ((reason: Error) => void) | null = null;
  private pendingMaxBytes: number = 0;

  constructor(
    private readonly stream: Readable,
    private readonly highWaterMark: number = 1024 * 1024,
  ) {
    this.setupStreamListeners();
  }

  private setupStreamListeners(): void {
    this.stream.on("data", this.onData.bind(this));
    this.stream.on("end", this.onEnd.bind(this));
    this.stream.on("error", this.onError.bind(this));
    this.stream.on("close", this.onClose.bind(this));

    // Resume stream if it's paused
    if (this.stream.isPaused()) {
      this.stream.resume();
    }
  }

  private onData(chunk: Buffer | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    if (bytes.length === 0) {
      return;
    }

    this.chunks.push(bytes);
    this.bufferedBytes += bytes.length;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const maxBytes = this.pendingMaxBytes;
      this.clearPending();
      resolve(this.take(maxBytes));
    }

    if (this.bufferedBytes > this.highWaterMark && !this.stream.isPaused()) {
      this.stream.pause();
    }
  }

  private onEnd(): void {
    this.isEnded = true;

    // Data events always precede end, so a pending read has nothing left to get
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.clearPending();
      resolve(null);
    }
  }

  private onError(error: Error): void {
    this.streamError = error;
    if (this.pendingReject) {
      const reject = this.pendingReject;
      this.clearPending();
      reject(error);
    }
  }

  /**
   * A stream destroyed without an error never emits end
   */
  private onClose(): void {
    if (this.streamError) {
      return;
    }
    this.isEnded = true;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.clearPending();
      resolve(null);
    }
  }

  private clearPending(): void {
    this.pendingResolve = null;
    this.pendingReject = null;
    this.pendingMaxBytes = 0;
  }

  /**
   * Takes up to maxBytes from the first buffered chunk
   */
  private take(maxBytes: number): Buffer {
    const [first] = this.chunks;
    let chunk: Buffer;
    if (first.length <= maxBytes) {
      chunk = first;
      this.chunks.shift();
    } else {
      chunk = first.subarray(0, maxBytes);
      this.chunks[0] = first.subarray(maxBytes);
    }
    this.bufferedBytes -= chunk.length;

    if (
      this.bufferedBytes <= this.highWaterMark &&
      !this.isEnded &&
      this.stream.isPaused()
    ) {
      this.stream.resume();
    }

    return chunk;
  }

  /**
   * Reads the next buffered bytes, waiting for the stream when none are buffered
   * @returns Promise that resolves to up to maxBytes bytes, or null at end of stream
   */
  read(maxBytes: number): Promise<Buffer | null> {
    if (!(maxBytes > 0)) {
      return Promise.reject(
        new RangeError(`maxBytes must be positive, got ${maxBytes}`),
      );
    }

    if (this.chunks.length > 0) {
      return Promise.resolve(this.take(maxBytes));
    }

    if (this.streamError) {
      return Promise.reject(this.streamError);
    }

    if (this.isEnded) {
      return Promise.resolve(null);
    }

    // Wait for more data or stream end
    return new Promise<Buffer | null>((resolve, reject) => {
      // If there's already a pending promise, that's an error
      if (this.pendingResolve) {
        reject(new Error("Multiple concurrent calls to read() are not supported"));
        return;
      }

      this.pendingResolve = resolve;
      this.pendingReject = reject;
      this.pendingMaxBytes = maxBytes;
    });
  }
}
