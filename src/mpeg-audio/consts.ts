/**
 * Bit-field constants shared by the header decoder and the stream scanner
 */
export const MPEG_AUDIO_CONSTANTS = {
  SYNC_BYTE: 0xff,
  SYNC_MASK: 0xe0,
  SYNC_WORD_MASK: 0xffe00000, // 11 sync bits
  FRAME_HEADER_SIZE: 4,
  CRC_SIZE: 2,
  INVALID_BITRATE_INDEX: 0x0f,
  RESERVED_SAMPLE_RATE_INDEX: 0x03,
} as const;

/**
 * Bit offsets and widths of every header field, MSB first
 */
export const HEADER_FIELDS = {
  VERSION: { shift: 19, mask: 0x03 },
  LAYER: { shift: 17, mask: 0x03 },
  PROTECTION: { shift: 16, mask: 0x01 },
  BITRATE_INDEX: { shift: 12, mask: 0x0f },
  SAMPLE_RATE_INDEX: { shift: 10, mask: 0x03 },
  PADDING: { shift: 9, mask: 0x01 },
  PRIVATE: { shift: 8, mask: 0x01 },
  CHANNEL_MODE: { shift: 6, mask: 0x03 },
  MODE_EXTENSION: { shift: 4, mask: 0x03 },
  COPYRIGHT: { shift: 3, mask: 0x01 },
  ORIGINAL: { shift: 2, mask: 0x01 },
  EMPHASIS: { shift: 0, mask: 0x03 },
} as const;

/**
 * Column order of {@link BITRATE_TABLE_KBPS}
 */
export enum BitrateColumn {
  Mpeg1Layer1 = 0,
  Mpeg1Layer2 = 1,
  Mpeg1Layer3 = 2,
  Mpeg2Layer1 = 3,
  Mpeg2Layer2And3 = 4,
}

/**
 * Bit rates in kbps, rows = bitrate index 0-14, columns = {@link BitrateColumn}.
 * Index 15 is never looked up; the decoder rejects it first.
 */
export const BITRATE_TABLE_KBPS: readonly (readonly number[])[] = Object.freeze([
  Object.freeze([0, 0, 0, 0, 0]),
  Object.freeze([32, 32, 32, 32, 8]),
  Object.freeze([64, 48, 40, 48, 16]),
  Object.freeze([96, 56, 48, 56, 24]),
  Object.freeze([128, 64, 56, 64, 32]),
  Object.freeze([160, 80, 64, 80, 40]),
  Object.freeze([192, 96, 80, 96, 48]),
  Object.freeze([224, 112, 96, 112, 56]),
  Object.freeze([256, 128, 112, 128, 64]),
  Object.freeze([288, 160, 128, 144, 80]),
  Object.freeze([320, 192, 160, 160, 96]),
  Object.freeze([352, 224, 192, 176, 112]),
  Object.freeze([384, 256, 224, 192, 128]),
  Object.freeze([416, 320, 256, 224, 144]),
  Object.freeze([448, 384, 320, 256, 160]),
]);

/**
 * Column order of {@link SAMPLE_RATE_TABLE_HZ} and {@link SAMPLES_PER_FRAME_TABLE}
 */
export enum VersionColumn {
  Mpeg1 = 0,
  Mpeg2 = 1,
  Mpeg25 = 2,
}

/**
 * Sample rates in Hz, rows = sample-rate index 0-2, columns = {@link VersionColumn}.
 * Each version halves the rate of the previous one for the same index.
 */
export const SAMPLE_RATE_TABLE_HZ: readonly (readonly number[])[] = Object.freeze([
  Object.freeze([44100, 22050, 11025]),
  Object.freeze([48000, 24000, 12000]),
  Object.freeze([32000, 16000, 8000]),
]);

/**
 * Row order of {@link SAMPLES_PER_FRAME_TABLE}
 */
export enum LayerRow {
  Layer1 = 0,
  Layer2 = 1,
  Layer3 = 2,
}

/**
 * Samples per frame, rows = {@link LayerRow}, columns = {@link VersionColumn}
 */
export const SAMPLES_PER_FRAME_TABLE: readonly (readonly number[])[] = Object.freeze([
  Object.freeze([384, 384, 384]),
  Object.freeze([1152, 1152, 1152]),
  Object.freeze([1152, 576, 576]),
]);

/**
 * Layer II bit rates (kbps) not permitted for a channel mode,
 * keyed by whether the frame is single channel
 */
export const LAYER2_PROHIBITED_BITRATES_KBPS = {
  MULTI_CHANNEL: Object.freeze([32, 48, 56, 80]),
  SINGLE_CHANNEL: Object.freeze([224, 256, 320, 384]),
} as const;

/**
 * Layer I/II joint stereo band start, indexed by the mode extension bits
 */
export const BAND_START_BY_MODE_EXTENSION = [4, 8, 12, 16] as const;

/**
 * Constants for Xing/Info/VBRI metadata frame detection
 */
export const INFO_FRAME_CONSTANTS = {
  XING_MAGIC: [0x58, 0x69, 0x6e, 0x67] as const, // "Xing"
  INFO_MAGIC: [0x49, 0x6e, 0x66, 0x6f] as const, // "Info"
  VBRI_MAGIC: [0x56, 0x42, 0x52, 0x49] as const, // "VBRI"
  VBRI_OFFSET: 32, // Counted from the end of the header, independent of side info
  SIDE_INFO_MPEG1_MONO: 17,
  SIDE_INFO_MPEG1_STEREO: 32,
  SIDE_INFO_MPEG2_MONO: 9,
  SIDE_INFO_MPEG2_STEREO: 17,
} as const;
