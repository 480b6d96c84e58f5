import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { MpegAudioModule } from "./mpeg-audio/mpeg-audio.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
    }),
    MpegAudioModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
