import { registerAs } from "@nestjs/config";
import { DEFAULT_READ_CHUNK_SIZE } from "./mpeg-audio-demuxer";

export const MPEG_AUDIO_CONFIG_NAMESPACE = "mpegAudio";

export interface MpegAudioConfig {
  /**
   * Upper bound on each read from a byte source
   */
  readChunkSize: number;

  /**
   * Bytes a stream source may buffer before it is paused
   */
  sourceHighWaterMark: number;

  /**
   * Skipped-byte tolerance applied by validate(); null = unlimited
   */
  maxSkippedBytes: number | null;
}

function parseInteger(
  name: string,
  value: string | undefined,
  { min }: { min: number },
): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export default registerAs(
  MPEG_AUDIO_CONFIG_NAMESPACE,
  (): MpegAudioConfig => ({
    readChunkSize:
      parseInteger("MPEG_AUDIO_READ_CHUNK_SIZE", process.env.MPEG_AUDIO_READ_CHUNK_SIZE, {
        min: 1,
      }) ?? DEFAULT_READ_CHUNK_SIZE,
    sourceHighWaterMark:
      parseInteger(
        "MPEG_AUDIO_SOURCE_HIGH_WATER_MARK",
        process.env.MPEG_AUDIO_SOURCE_HIGH_WATER_MARK,
        { min: 1 },
      ) ?? 1024 * 1024,
    maxSkippedBytes:
      parseInteger("MPEG_AUDIO_MAX_SKIPPED_BYTES", process.env.MPEG_AUDIO_MAX_SKIPPED_BYTES, {
        min: 0,
      }) ?? null,
  }),
);
