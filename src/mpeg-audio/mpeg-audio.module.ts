import { Module } from "@nestjs/common";
import { MpegAudioService } from "./mpeg-audio.service";

@Module({
  providers: [MpegAudioService],
  exports: [MpegAudioService],
})
export class MpegAudioModule {}
