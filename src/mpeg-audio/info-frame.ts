import { INFO_FRAME_CONSTANTS, MPEG_AUDIO_CONSTANTS } from "./consts";
import { FrameHeader } from "./frame-header";
import { ChannelMode, Frame, InfoFrameTag, MpegLayer, MpegVersion } from "./types";

/**
 * Length of the layer III side information block
 */
export function sideInfoLength(header: FrameHeader): number {
  const mono = header.channelMode === ChannelMode.SingleChannel;
  if (header.version === MpegVersion.MPEG1) {
    return mono
      ? INFO_FRAME_CONSTANTS.SIDE_INFO_MPEG1_MONO
      : INFO_FRAME_CONSTANTS.SIDE_INFO_MPEG1_STEREO;
  }
  return mono
    ? INFO_FRAME_CONSTANTS.SIDE_INFO_MPEG2_MONO
    : INFO_FRAME_CONSTANTS.SIDE_INFO_MPEG2_STEREO;
}

function matchesMagic(
  bytes: Buffer,
  position: number,
  magic: readonly number[],
): boolean {
  if (position + magic.length > bytes.length) {
    return false;
  }
  return magic.every((byte, index) => bytes[position + index] === byte);
}

/**
 * Checks if a frame is a Xing/Info/VBRI header frame (metadata, not audio)
 * @returns The metadata tag, or null for an audio frame
 */
export function detectInfoFrame(frame: Frame): InfoFrameTag | null {
  if (frame.header.layer !== MpegLayer.Layer3) {
    return null;
  }

  const dataStart =
    MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE +
    (frame.header.hasCrc ? MPEG_AUDIO_CONSTANTS.CRC_SIZE : 0);
  const xingStart = dataStart + sideInfoLength(frame.header);

  if (matchesMagic(frame.bytes, xingStart, INFO_FRAME_CONSTANTS.XING_MAGIC)) {
    return InfoFrameTag.Xing;
  }

  if (matchesMagic(frame.bytes, xingStart, INFO_FRAME_CONSTANTS.INFO_MAGIC)) {
    return InfoFrameTag.Info;
  }

  const vbriStart =
    MPEG_AUDIO_CONSTANTS.FRAME_HEADER_SIZE + INFO_FRAME_CONSTANTS.VBRI_OFFSET;
  if (matchesMagic(frame.bytes, vbriStart, INFO_FRAME_CONSTANTS.VBRI_MAGIC)) {
    return InfoFrameTag.Vbri;
  }

  return null;
}
