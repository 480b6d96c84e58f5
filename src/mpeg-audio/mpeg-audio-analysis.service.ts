import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { Readable } from "stream";
import { ReadableByteSource } from "./byte-sources";
import { frameDurationSeconds } from "./frame-length";
import { detectInfoFrame } from "./info-frame";
import mpegAudioConfig from "./mpeg-audio.config";
import { demuxBuffer, MpegAudioDemuxer } from "./mpeg-audio-demuxer";
import { ExcessiveResyncError, NoValidFramesError } from "./mpeg-audio.errors";
import { Frame, InfoFrameTag, ParsedStream, StreamSummary } from "./types";

/**
 * Service responsible for parsing and summarizing MPEG audio streams.
 * Applies the caller-side corruption tolerance the demuxer itself never enforces.
 */
@Injectable()
export class MpegAudioAnalysisService {
  private readonly logger = new Logger(MpegAudioAnalysisService.name);

  constructor(
    @Inject(mpegAudioConfig.KEY)
    private readonly config: ConfigType<typeof mpegAudioConfig>,
  ) {}

  /**
   * Parses every frame of a readable stream
   * @param stream - The readable stream carrying the elementary stream
   * @returns Promise resolving to the parsed stream
   */
  async parseStream(stream: Readable): Promise<ParsedStream> {
    const source = new ReadableByteSource(stream, this.config.sourceHighWaterMark);
    const demuxer = new MpegAudioDemuxer(source, {
      readChunkSize: this.config.readChunkSize,
      logger: this.logger,
    });
    return demuxer.parse();
  }

  parseBuffer(buffer: Uint8Array): ParsedStream {
    return demuxBuffer(buffer);
  }

  /**
   * Validates a parsed stream against the skipped-byte tolerance
   * @param parsed - The parsed stream
   * @param maxSkippedBytes - Tolerance override; defaults to the configured one
   * @throws NoValidFramesError if no frame was found
   * @throws ExcessiveResyncError if more bytes were skipped than tolerated
   */
  validate(
    parsed: ParsedStream,
    maxSkippedBytes: number | null = this.config.maxSkippedBytes,
  ): void {
    if (parsed.frames.length === 0) {
      throw new NoValidFramesError();
    }

    if (maxSkippedBytes !== null && parsed.skippedBytes > maxSkippedBytes) {
      throw new ExcessiveResyncError(parsed.skippedBytes, maxSkippedBytes);
    }
  }

  /**
   * Summarizes a parsed stream. Xing/Info/VBRI frames are counted
   * but excluded from duration and bit rate figures.
   */
  summarize(parsed: ParsedStream): StreamSummary {
    let infoTag: InfoFrameTag | null = null;
    const audioFrames: Frame[] = [];

    for (const frame of parsed.frames) {
      const tag = detectInfoFrame(frame);
      if (tag === null) {
        audioFrames.push(frame);
      } else if (infoTag === null) {
        infoTag = tag;
      }
    }

    const bitRates = new Set(audioFrames.map((frame) => frame.header.bitRateBps));
    const totalBitRate = audioFrames.reduce(
      (sum, frame) => sum + frame.header.bitRateBps,
      0,
    );
    const first = audioFrames.length > 0 ? audioFrames[0].header : null;

    return {
      frameCount: parsed.frames.length,
      audioFrameCount: audioFrames.length,
      infoTag,
      durationSeconds: audioFrames.reduce(
        (sum, frame) => sum + frameDurationSeconds(frame.header),
        0,
      ),
      averageBitRateBps:
        audioFrames.length > 0 ? Math.round(totalBitRate / audioFrames.length) : 0,
      variableBitRate: bitRates.size > 1,
      version: first?.version ?? null,
      layer: first?.layer ?? null,
      sampleRateHz: first?.sampleRateHz ?? null,
      channelMode: first?.channelMode ?? null,
      bytesConsumed: parsed.bytesConsumed,
      skippedBytes: parsed.skippedBytes,
    };
  }

  /**
   * Parses, validates and summarizes a readable stream
   * @throws MpegAudioError when validation fails
   */
  async analyzeStream(stream: Readable): Promise<StreamSummary> {
    const parsed = await this.parseStream(stream);
    this.validate(parsed);

    const summary = this.summarize(parsed);
    this.logger.log(
      `Analyzed ${summary.frameCount} frames (${summary.audioFrameCount} audio), ` +
        `${summary.durationSeconds.toFixed(2)}s, ${summary.skippedBytes} bytes skipped`,
    );
    return summary;
  }
}
