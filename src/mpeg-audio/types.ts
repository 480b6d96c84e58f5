import type { FrameHeader } from "./frame-header";
import type { MpegAudioErrorCode } from "./mpeg-audio.errors";

/**
 * MPEG version enum
 */
export enum MpegVersion {
  MPEG1 = "MPEG-1",
  MPEG2 = "MPEG-2",
  MPEG25 = "MPEG-2.5",
}

/**
 * MPEG layer enum
 */
export enum MpegLayer {
  Layer1 = "Layer 1",
  Layer2 = "Layer 2",
  Layer3 = "Layer 3",
}

export enum ChannelMode {
  Stereo = "Stereo",
  JointStereo = "Joint Stereo",
  DualChannel = "Dual Channel",
  SingleChannel = "Single Channel",
}

export enum Emphasis {
  None = "None",
  Ms5015 = "50/15 ms",
  CcitJ17 = "CCIT J.17",
}

/**
 * Byte order of the 4-byte header window handed to the decoder.
 * Frames on the wire are always big-endian.
 */
export enum ByteOrder {
  BigEndian = "BE",
  LittleEndian = "LE",
}

/**
 * Meaning of the mode extension bits of a joint stereo frame.
 * `none` for every other channel mode.
 */
export type JointStereoExtension =
  | { readonly kind: "none" }
  | { readonly kind: "band-start"; readonly bandStart: 4 | 8 | 12 | 16 }
  | {
      readonly kind: "stereo-flags";
      readonly intensityStereo: boolean;
      readonly msStereo: boolean;
    };

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * One validated, length-confirmed MPEG audio frame
 */
export interface Frame {
  /**
   * Absolute position of the header in the input
   */
  readonly offset: number;

  /**
   * Frame length in bytes, header inclusive
   */
  readonly length: number;

  readonly header: FrameHeader;

  /**
   * 16-bit CRC following the header, when the frame is protected
   */
  readonly crc: number | undefined;

  /**
   * The whole frame (a view over the scanner's buffer, not a copy)
   */
  readonly bytes: Buffer;

  /**
   * Frame data after the header and CRC
   */
  readonly payload: Buffer;
}

/**
 * Counts of rejected candidate windows, keyed by error code
 */
export type ErrorCounts = Readonly<Partial<Record<MpegAudioErrorCode, number>>>;

/**
 * Result of scanning a byte stream
 */
export interface ParsedStream {
  readonly frames: readonly Frame[];

  /**
   * Total bytes consumed, framed and skipped
   */
  readonly bytesConsumed: number;

  /**
   * Bytes skipped while resynchronizing
   */
  readonly skippedBytes: number;

  readonly errorCounts: ErrorCounts;
}

export enum InfoFrameTag {
  Xing = "Xing",
  Info = "Info",
  Vbri = "VBRI",
}

/**
 * Domain summary of a parsed stream
 */
export interface StreamSummary {
  frameCount: number;
  audioFrameCount: number;
  infoTag: InfoFrameTag | null;
  durationSeconds: number;
  averageBitRateBps: number;
  variableBitRate: boolean;
  version: MpegVersion | null;
  layer: MpegLayer | null;
  sampleRateHz: number | null;
  channelMode: ChannelMode | null;
  bytesConsumed: number;
  skippedBytes: number;
}
