import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import mpegAudioConfig from "./mpeg-audio.config";
import { MpegAudioAnalysisService } from "./mpeg-audio-analysis.service";

@Module({
  imports: [ConfigModule.forFeature(mpegAudioConfig)],
  providers: [MpegAudioAnalysisService],
  exports: [MpegAudioAnalysisService],
})
export class MpegAudioModule {}
