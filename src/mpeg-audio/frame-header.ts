import {
  BAND_START_BY_MODE_EXTENSION,
  BITRATE_TABLE_KBPS,
  BitrateColumn,
  HEADER_FIELDS,
  LAYER2_PROHIBITED_BITRATES_KBPS,
  MPEG_AUDIO_CONSTANTS,
  SAMPLE_RATE_TABLE_HZ,
  VersionColumn,
} from "./consts";
import {
  FrameHeaderError,
  FrameHeaderErrorCode,
  MpegAudioErrorCode,
} from "./mpeg-audio.errors";
import {
  ByteOrder,
  ChannelMode,
  Emphasis,
  JointStereoExtension,
  MpegLayer,
  MpegVersion,
  Result,
} from "./types";

/**
 * Map from MPEG version bit value to MpegVersion; 0x01 is reserved
 */
const VERSION_MAP: ReadonlyMap<number, MpegVersion> = new Map([
  [0x00, MpegVersion.MPEG25],
  [0x02, MpegVersion.MPEG2],
  [0x03, MpegVersion.MPEG1],
]);

/**
 * Map from MPEG layer bit value to MpegLayer; 0x00 is reserved
 */
const LAYER_MAP: ReadonlyMap<number, MpegLayer> = new Map([
  [0x01, MpegLayer.Layer3],
  [0x02, MpegLayer.Layer2],
  [0x03, MpegLayer.Layer1],
]);

/**
 * Channel modes indexed by their 2-bit value
 */
const CHANNEL_MODES = [
  ChannelMode.Stereo,
  ChannelMode.JointStereo,
  ChannelMode.DualChannel,
  ChannelMode.SingleChannel,
] as const;

/**
 * Map from emphasis bit value to Emphasis; 0x02 is reserved
 */
const EMPHASIS_MAP: ReadonlyMap<number, Emphasis> = new Map([
  [0x00, Emphasis.None],
  [0x01, Emphasis.Ms5015],
  [0x03, Emphasis.CcitJ17],
]);

const NO_EXTENSION: JointStereoExtension = Object.freeze<JointStereoExtension>({ kind: "none" });

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

/**
 * Column of the sample-rate and samples-per-frame tables for a version
 */
export function versionColumn(version: MpegVersion): VersionColumn {
  switch (version) {
    case MpegVersion.MPEG1:
      return VersionColumn.Mpeg1;
    case MpegVersion.MPEG2:
      return VersionColumn.Mpeg2;
    case MpegVersion.MPEG25:
      return VersionColumn.Mpeg25;
    default:
      return assertNever(version);
  }
}

/**
 * Column of the bitrate table. MPEG-2 and MPEG-2.5 share columns,
 * and their layers II and III share one.
 */
export function bitrateColumn(version: MpegVersion, layer: MpegLayer): BitrateColumn {
  if (version === MpegVersion.MPEG1) {
    switch (layer) {
      case MpegLayer.Layer1:
        return BitrateColumn.Mpeg1Layer1;
      case MpegLayer.Layer2:
        return BitrateColumn.Mpeg1Layer2;
      case MpegLayer.Layer3:
        return BitrateColumn.Mpeg1Layer3;
      default:
        return assertNever(layer);
    }
  }

  switch (layer) {
    case MpegLayer.Layer1:
      return BitrateColumn.Mpeg2Layer1;
    case MpegLayer.Layer2:
    case MpegLayer.Layer3:
      return BitrateColumn.Mpeg2Layer2And3;
    default:
      return assertNever(layer);
  }
}

function field(word: number, bits: { shift: number; mask: number }): number {
  return (word >>> bits.shift) & bits.mask;
}

function flag(word: number, bits: { shift: number; mask: number }): boolean {
  return field(word, bits) === 1;
}

function failure(
  code: FrameHeaderErrorCode,
  message: string,
): Result<FrameHeader, FrameHeaderError> {
  return { ok: false, error: new FrameHeaderError(code, message) };
}

function decodeJointStereoExtension(
  layer: MpegLayer,
  modeExtension: number,
): JointStereoExtension {
  switch (layer) {
    case MpegLayer.Layer1:
    case MpegLayer.Layer2:
      return {
        kind: "band-start",
        bandStart: BAND_START_BY_MODE_EXTENSION[modeExtension],
      };
    case MpegLayer.Layer3:
      // bit 0: intensity stereo, bit 1: MS stereo
      return {
        kind: "stereo-flags",
        intensityStereo: (modeExtension & 0x01) !== 0,
        msStereo: (modeExtension & 0x02) !== 0,
      };
    default:
      return assertNever(layer);
  }
}

/**
 * Checks the Layer II restrictions on bit rate and channel mode
 */
function isProhibitedLayer2Combination(
  bitRateKbps: number,
  channelMode: ChannelMode,
): boolean {
  const prohibited: readonly number[] =
    channelMode === ChannelMode.SingleChannel
      ? LAYER2_PROHIBITED_BITRATES_KBPS.SINGLE_CHANNEL
      : LAYER2_PROHIBITED_BITRATES_KBPS.MULTI_CHANNEL;
  return prohibited.includes(bitRateKbps);
}

/**
 * Decoded MPEG audio frame header.
 * Instances only come out of {@link FrameHeader.fromWord}, so every instance
 * is a structurally valid header.
 */
export class FrameHeader {
  private constructor(
    readonly version: MpegVersion,
    readonly layer: MpegLayer,
    readonly hasCrc: boolean,
    readonly bitRateBps: number,
    readonly sampleRateHz: number,
    readonly padded: boolean,
    readonly privateBit: boolean,
    readonly channelMode: ChannelMode,
    readonly jointStereoExtension: JointStereoExtension,
    readonly copyrighted: boolean,
    readonly original: boolean,
    readonly emphasis: Emphasis,
  ) {
    Object.freeze(this);
  }

  /**
   * Decodes a 32-bit header word, MSB = first bit on the wire
   */
  static fromWord(word: number): Result<FrameHeader, FrameHeaderError> {
    const header = word >>> 0;

    if (((header & MPEG_AUDIO_CONSTANTS.SYNC_WORD_MASK) >>> 0) !== MPEG_AUDIO_CONSTANTS.SYNC_WORD_MASK) {
      return failure(MpegAudioErrorCode.SYNC_WORD_MISSING, "Frame sync bits are not all set");
    }

    const version = VERSION_MAP.get(field(header, HEADER_FIELDS.VERSION));
    if (version === undefined) {
      return failure(MpegAudioErrorCode.RESERVED_VERSION, "Reserved MPEG version bits (01)");
    }

    const layer = LAYER_MAP.get(field(header, HEADER_FIELDS.LAYER));
    if (layer === undefined) {
      return failure(MpegAudioErrorCode.RESERVED_LAYER, "Reserved layer bits (00)");
    }

    const bitrateIndex = field(header, HEADER_FIELDS.BITRATE_INDEX);
    if (bitrateIndex === MPEG_AUDIO_CONSTANTS.INVALID_BITRATE_INDEX) {
      return failure(MpegAudioErrorCode.INVALID_BITRATE_INDEX, "Invalid bitrate index (1111)");
    }
    const bitRateKbps = BITRATE_TABLE_KBPS[bitrateIndex][bitrateColumn(version, layer)];

    const sampleRateIndex = field(header, HEADER_FIELDS.SAMPLE_RATE_INDEX);
    if (sampleRateIndex === MPEG_AUDIO_CONSTANTS.RESERVED_SAMPLE_RATE_INDEX) {
      return failure(MpegAudioErrorCode.RESERVED_SAMPLE_RATE, "Reserved sample rate index (11)");
    }
    const sampleRateHz = SAMPLE_RATE_TABLE_HZ[sampleRateIndex][versionColumn(version)];

    const channelMode = CHANNEL_MODES[field(header, HEADER_FIELDS.CHANNEL_MODE)];
    const jointStereoExtension =
      channelMode === ChannelMode.JointStereo
        ? Object.freeze(
            decodeJointStereoExtension(layer, field(header, HEADER_FIELDS.MODE_EXTENSION)),
          )
        : NO_EXTENSION;

    const emphasis = EMPHASIS_MAP.get(field(header, HEADER_FIELDS.EMPHASIS));
    if (emphasis === undefined) {
      return failure(MpegAudioErrorCode.RESERVED_EMPHASIS, "Reserved emphasis bits (10)");
    }

    if (
      layer === MpegLayer.Layer2 &&
      bitRateKbps !== 0 &&
      isProhibitedLayer2Combination(bitRateKbps, channelMode)
    ) {
      return failure(
        MpegAudioErrorCode.PROHIBITED_BITRATE_CHANNEL_COMBINATION,
        `Layer II does not allow ${bitRateKbps} kbps in ${channelMode} mode`,
      );
    }

    return {
      ok: true,
      value: new FrameHeader(
        version,
        layer,
        // Protection bit 0 means a CRC follows the header
        !flag(header, HEADER_FIELDS.PROTECTION),
        bitRateKbps * 1000,
        sampleRateHz,
        flag(header, HEADER_FIELDS.PADDING),
        flag(header, HEADER_FIELDS.PRIVATE),
        channelMode,
        jointStereoExtension,
        flag(header, HEADER_FIELDS.COPYRIGHT),
        flag(header, HEADER_FIELDS.ORIGINAL),
        emphasis,
      ),
    };
  }

  get isFreeFormat(): boolean {
    return this.bitRateBps === 0;
  }

  /**
   * Human-readable format, e.g. "MPEG-1 Layer 3"
   */
  get description(): string {
    return `${this.version} ${this.layer}`;
  }
}

/**
 * Checks if a position holds the first two bytes of a sync word:
 * 0xFF followed by a byte with its top 3 bits set
 */
export function isFrameSync(buffer: Uint8Array, position: number): boolean {
  return (
    position + 1 < buffer.length &&
    buffer[position] === MPEG_AUDIO_CONSTANTS.SYNC_BYTE &&
    (buffer[position + 1] & MPEG_AUDIO_CONSTANTS.SYNC_MASK) === MPEG_AUDIO_CONSTANTS.SYNC_MASK
  );
}

/**
 * Decodes the 4-byte header window at `offset`
 * @throws RangeError if fewer than 4 bytes are available at `offset`
 */
export function decodeFrameHeader(
  bytes: Uint8Array,
  offset: number = 0,
  byteOrder: ByteOrder = ByteOrder.BigEndian,
): Result<FrameHeader, FrameHeaderError> {
  if (offset < 0 || offset + MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE > bytes.length) {
    throw new RangeError(
      `Frame header requires ${MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE} bytes at offset ${offset}`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const word = view.getUint32(offset, byteOrder === ByteOrder.LittleEndian);
  return FrameHeader.fromWord(word);
}

export function decodeFrameHeaderWord(word: number): Result<FrameHeader, FrameHeaderError> {
  return FrameHeader.fromWord(word);
}
