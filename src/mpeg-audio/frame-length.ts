import {
  LayerRow,
  MPEG_AUDIO_CONSTANTS,
  SAMPLES_PER_FRAME_TABLE,
} from "./consts";
import { assertNever, FrameHeader, versionColumn } from "./frame-header";
import { UndefinedFrameLengthError } from "./mpeg-audio.errors";
import { MpegLayer, Result } from "./types";

function layerRow(layer: MpegLayer): LayerRow {
  switch (layer) {
    case MpegLayer.Layer1:
      return LayerRow.Layer1;
    case MpegLayer.Layer2:
      return LayerRow.Layer2;
    case MpegLayer.Layer3:
      return LayerRow.Layer3;
    default:
      return assertNever(layer);
  }
}

export function samplesPerFrame(header: FrameHeader): number {
  return SAMPLES_PER_FRAME_TABLE[layerRow(header.layer)][versionColumn(header.version)];
}

/**
 * Playback duration of one frame
 */
export function frameDurationSeconds(header: FrameHeader): number {
  return samplesPerFrame(header) / header.sampleRateHz;
}

/**
 * Calculates the frame length in bytes, header and CRC inclusive:
 * floor(samples * bitrate / (8 * sampleRate)) plus one byte when padded.
 *
 * Free-format headers (bit rate 0) carry no length.
 */
export function frameLengthBytes(
  header: FrameHeader,
): Result<number, UndefinedFrameLengthError> {
  if (header.isFreeFormat) {
    return { ok: false, error: new UndefinedFrameLengthError() };
  }

  const length = Math.floor(
    (samplesPerFrame(header) * header.bitRateBps) / (8 * header.sampleRateHz),
  );

  return { ok: true, value: length + (header.padded ? 1 : 0) };
}

/**
 * Length of the frame data that follows the header and CRC
 */
export function payloadLengthBytes(
  header: FrameHeader,
): Result<number, UndefinedFrameLengthError> {
  const length = frameLengthBytes(header);
  if (!length.ok) {
    return length;
  }

  const crcBytes = header.hasCrc ? MPEG_AUDIO_CONSTANTS.CRC_SIZE : 0;
  return {
    ok: true,
    value: length.value - MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE - crcBytes,
  };
}
