import "reflect-metadata";

export * from "./mpeg-audio/types";
export * from "./mpeg-audio/consts";
export * from "./mpeg-audio/mpeg-audio.errors";
export * from "./mpeg-audio/byte-source.interface";
export * from "./mpeg-audio/frame-iterator.interface";
export {
  decodeFrameHeader,
  decodeFrameHeaderWord,
  FrameHeader,
  isFrameSync,
} from "./mpeg-audio/frame-header";
export {
  frameDurationSeconds,
  frameLengthBytes,
  payloadLengthBytes,
  samplesPerFrame,
} from "./mpeg-audio/frame-length";
export * from "./mpeg-audio/frame-scanner";
export * from "./mpeg-audio/byte-sources";
export * from "./mpeg-audio/mpeg-audio-demuxer";
export * from "./mpeg-audio/info-frame";
export { default as mpegAudioConfig } from "./mpeg-audio/mpeg-audio.config";
export type { MpegAudioConfig } from "./mpeg-audio/mpeg-audio.config";
export { MPEG_AUDIO_CONFIG_NAMESPACE } from "./mpeg-audio/mpeg-audio.config";
export { MpegAudioAnalysisService } from "./mpeg-audio/mpeg-audio-analysis.service";
export { MpegAudioModule } from "./mpeg-audio/mpeg-audio.module";
export { AppModule } from "./app.module";
