import { Module } from "@nestjs/common";
import { FileUploadController } from "./file-upload.controller";
import { FileUploadService } from "./file-upload.service";
import { MetadataProcessingService } from "./metadata-processing.service";
import { BusboyFactory } from "./busboy-factory.service";
import { MpegAudioModule } from "../mpeg-audio/mpeg-audio.module";
import { FileStorageModule } from "../file-storage/file-storage.module";

@Module({
  imports: [MpegAudioModule, FileStorageModule],
  controllers: [FileUploadController],
  providers: [FileUploadService, MetadataProcessingService, BusboyFactory],
})
export class FileUploadModule {}
