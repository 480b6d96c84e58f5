import { FrameScanner, ResyncEvent, ScannerState } from "../src/mpeg-audio/frame-scanner";
import { demuxBuffer } from "../src/mpeg-audio/mpeg-audio-demuxer";
import { MpegAudioErrorCode } from "../src/mpeg-audio/mpeg-audio.errors";
import { ParsedStream } from "../src/mpeg-audio/types";
import { buildFrame } from "./helpers/frame-builder";

function framedBytes(parsed: ParsedStream): number {
  return parsed.frames.reduce((sum, frame) => sum + frame.length, 0);
}

describe("demuxBuffer", () => {
  it("should return every frame of a clean stream", () => {
    const input = Buffer.concat([buildFrame(417), buildFrame(417), buildFrame(417)]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => frame.offset)).toEqual([0, 417, 834]);
    expect(parsed.frames.map((frame) => frame.length)).toEqual([417, 417, 417]);
    expect(parsed.bytesConsumed).toBe(1251);
    expect(parsed.skippedBytes).toBe(0);
    expect(parsed.errorCounts).toEqual({});
  });

  it("should skip garbage between frames", () => {
    const input = Buffer.concat([
      buildFrame(417),
      Buffer.from([0x00, 0x11, 0x22, 0x33, 0x44]),
      buildFrame(417),
    ]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => frame.offset)).toEqual([0, 422]);
    expect(parsed.skippedBytes).toBe(5);
    expect(parsed.bytesConsumed).toBe(839);
  });

  it("should resynchronize after a reserved version", () => {
    const input = Buffer.concat([Buffer.from([0xff, 0xeb, 0x00, 0x00]), buildFrame(417)]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames).toHaveLength(1);
    expect(parsed.frames[0].offset).toBe(4);
    expect(parsed.skippedBytes).toBe(4);
    expect(parsed.errorCounts).toEqual({ [MpegAudioErrorCode.RESERVED_VERSION]: 1 });
  });

  it("should resynchronize after a free format header", () => {
    const input = Buffer.concat([
      Buffer.from([0xff, 0xfb, 0x00, 0x00]),
      Buffer.alloc(10),
      buildFrame(417),
    ]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => frame.offset)).toEqual([14]);
    expect(parsed.skippedBytes).toBe(14);
    expect(parsed.errorCounts).toEqual({ [MpegAudioErrorCode.UNDEFINED_FRAME_LENGTH]: 1 });
  });

  it("should find a frame that starts one byte after a false sync", () => {
    // 0xFF 0xFF 0xFB 0x90 decodes as layer I with bitrate index 1111
    const input = Buffer.concat([Buffer.from([0xff]), buildFrame(417)]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => frame.offset)).toEqual([1]);
    expect(parsed.skippedBytes).toBe(1);
    expect(parsed.errorCounts).toEqual({ [MpegAudioErrorCode.INVALID_BITRATE_INDEX]: 1 });
  });

  it("should skip a truncated final frame", () => {
    const input = Buffer.concat([buildFrame(417), buildFrame(417).subarray(0, 100)]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames).toHaveLength(1);
    expect(parsed.skippedBytes).toBe(100);
    expect(parsed.bytesConsumed).toBe(517);
    expect(parsed.errorCounts).toEqual({ [MpegAudioErrorCode.TRUNCATED_PAYLOAD]: 1 });
  });

  it("should skip trailing bytes too short for a header", () => {
    const input = Buffer.concat([buildFrame(417), Buffer.from([0x00, 0x00])]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames).toHaveLength(1);
    expect(parsed.skippedBytes).toBe(2);
    expect(parsed.bytesConsumed).toBe(419);
  });

  it("should return an empty result for empty input", () => {
    const parsed = demuxBuffer(Buffer.alloc(0));

    expect(parsed).toEqual({
      frames: [],
      bytesConsumed: 0,
      skippedBytes: 0,
      errorCounts: {},
    });
  });

  it("should account for every input byte", () => {
    const input = Buffer.concat([
      Buffer.from([0x12, 0xff, 0xe0, 0x00, 0x00]),
      buildFrame(417, { padding: 1 }).subarray(0, 418),
      Buffer.from([0x34, 0x56, 0x78]),
      buildFrame(34, { layerBits: 0b11, bitrateIndex: 1 }),
      buildFrame(417).subarray(0, 50),
    ]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => frame.length)).toEqual([418, 34]);
    expect(parsed.bytesConsumed).toBe(input.length);
    expect(framedBytes(parsed) + parsed.skippedBytes).toBe(input.length);
  });

  it("should read layer I frames back to back", () => {
    const layer1 = { layerBits: 0b11, bitrateIndex: 1 };
    const input = Buffer.concat([buildFrame(34, layer1), buildFrame(35, { ...layer1, padding: 1 })]);

    const parsed = demuxBuffer(input);

    expect(parsed.frames.map((frame) => [frame.offset, frame.length])).toEqual([
      [0, 34],
      [34, 35],
    ]);
  });

  it("should expose the CRC and the payload of protected frames", () => {
    const frame = buildFrame(417, { protectionBit: 0 });
    frame[4] = 0x12;
    frame[5] = 0x34;

    const [parsed] = demuxBuffer(frame).frames;

    expect(parsed.header.hasCrc).toBe(true);
    expect(parsed.crc).toBe(0x1234);
    expect(parsed.payload).toHaveLength(411);
  });

  it("should leave the CRC undefined for unprotected frames", () => {
    const [parsed] = demuxBuffer(buildFrame(417)).frames;

    expect(parsed.crc).toBeUndefined();
    expect(parsed.payload).toHaveLength(413);
  });

  it("should return frozen frames viewing the input bytes", () => {
    const input = Buffer.concat([buildFrame(417, {}, 0x5a), buildFrame(417)]);

    const [first, second] = demuxBuffer(input).frames;

    expect(Object.isFrozen(first)).toBe(true);
    expect(first.bytes.buffer).toBe(input.buffer);
    expect(first.bytes.byteOffset).toBe(input.byteOffset);
    expect(second.bytes.byteOffset).toBe(input.byteOffset + 417);
    expect(first.payload[0]).toBe(0x5a);
  });
});

describe("FrameScanner", () => {
  let scanner: FrameScanner;
  let resyncs: ResyncEvent[];

  beforeEach(() => {
    resyncs = [];
    scanner = new FrameScanner({ onResync: (event) => resyncs.push(event) });
  });

  describe("poll", () => {
    it("should ask for data before any input", () => {
      expect(scanner.poll()).toEqual({ kind: "need-data" });
      expect(scanner.state).toBe(ScannerState.Seeking);
    });

    it("should wait for a header split across chunks", () => {
      const frame = buildFrame(417);

      scanner.push(frame.subarray(0, 2));
      expect(scanner.poll()).toEqual({ kind: "need-data" });
      expect(scanner.state).toBe(ScannerState.Seeking);

      scanner.push(frame.subarray(2));
      const step = scanner.poll();
      expect(step.kind).toBe("frame");
      expect(step.kind === "frame" && step.frame.offset).toBe(0);
    });

    it("should wait in validating state for the rest of a frame", () => {
      const frame = buildFrame(417);

      scanner.push(frame.subarray(0, 200));
      expect(scanner.poll()).toEqual({ kind: "need-data" });
      expect(scanner.state).toBe(ScannerState.Validating);

      scanner.push(frame.subarray(200));
      expect(scanner.poll().kind).toBe("frame");
      expect(scanner.state).toBe(ScannerState.Seeking);
    });

    it("should keep absolute offsets across chunks", () => {
      const input = Buffer.concat([Buffer.from([0x01, 0x02, 0x03]), buildFrame(417), buildFrame(417)]);
      const offsets: number[] = [];

      for (let start = 0; start < input.length; start += 100) {
        scanner.push(input.subarray(start, start + 100));
        for (let step = scanner.poll(); step.kind === "frame"; step = scanner.poll()) {
          offsets.push(step.frame.offset);
        }
      }
      scanner.end();

      expect(scanner.poll()).toEqual({ kind: "done" });
      expect(offsets).toEqual([3, 420]);
      expect(scanner.bytesConsumed).toBe(input.length);
      expect(scanner.skippedBytes).toBe(3);
      expect(scanner.frameCount).toBe(2);
    });

    it("should finish once input has ended", () => {
      scanner.push(buildFrame(417));
      scanner.end();

      expect(scanner.poll().kind).toBe("frame");
      expect(scanner.poll()).toEqual({ kind: "done" });
      expect(scanner.state).toBe(ScannerState.Done);
      expect(scanner.poll()).toEqual({ kind: "done" });
    });

    it("should report each rejected candidate", () => {
      scanner.push(Buffer.concat([Buffer.from([0x00, 0xff, 0xeb, 0x00, 0x00]), buildFrame(417)]));
      scanner.end();

      while (scanner.poll().kind !== "done") {
        // Drain
      }

      expect(resyncs).toHaveLength(1);
      expect(resyncs[0].offset).toBe(1);
      expect(resyncs[0].cause.code).toBe(MpegAudioErrorCode.RESERVED_VERSION);
    });

    it("should report truncation with the declared and available lengths", () => {
      scanner.push(buildFrame(417).subarray(0, 100));
      scanner.end();

      expect(scanner.poll()).toEqual({ kind: "done" });
      expect(resyncs).toHaveLength(1);
      expect(resyncs[0].cause).toMatchObject({
        code: MpegAudioErrorCode.TRUNCATED_PAYLOAD,
        expectedLength: 417,
        availableLength: 100,
      });
    });
  });

  describe("push", () => {
    it("should reject data after end of input", () => {
      scanner.end();

      expect(() => scanner.push(Buffer.from([0x00]))).toThrow(
        "Cannot push data after end of input",
      );
    });

    it("should accept plain Uint8Array chunks", () => {
      scanner.push(new Uint8Array(buildFrame(417)));
      scanner.end();

      expect(scanner.poll().kind).toBe("frame");
    });
  });

  describe("toParsedStream", () => {
    it("should return a snapshot that later frames do not change", () => {
      scanner.push(Buffer.concat([buildFrame(417), buildFrame(417)]));
      scanner.poll();

      const snapshot = scanner.toParsedStream();
      scanner.poll();

      expect(snapshot.frames).toHaveLength(1);
      expect(scanner.toParsedStream().frames).toHaveLength(2);
    });
  });
});
