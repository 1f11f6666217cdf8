import { Injectable } from "@nestjs/common";
import { FileStorageService } from "../file-storage/file-storage.service";
import { MpegAudioService } from "../mpeg-audio/mpeg-audio.service";
import { MpegAudioSummary, ScanOptions } from "../mpeg-audio/types";

/**
 * Service responsible for reading metadata from spooled uploads.
 */
@Injectable()
export class MetadataProcessingService {
  constructor(
    private readonly mpegAudioService: MpegAudioService,
    private readonly fileStorageService: FileStorageService,
  ) {}

  /**
   * Reads the metadata of a spooled file, then releases the file.
   *
   * @param path Path returned by the upload
   * @param scan How far the engine may read to answer
   * @throws MpegAudioError when the file is not MPEG audio
   * @throws ByteSourceError when the file cannot be read
   */
  async processFile(path: string, scan: ScanOptions): Promise<MpegAudioSummary> {
    try {
      const metadata = this.mpegAudioService.openFile(path);
      try {
        return this.mpegAudioService.summarize(metadata, scan);
      } finally {
        metadata.close();
      }
    } finally {
      await this.fileStorageService.release(path);
    }
  }
}
