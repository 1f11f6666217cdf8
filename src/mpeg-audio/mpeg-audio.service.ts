import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { readMpegAudioConfig } from "./mpeg-audio.config";
import { MpegAudioMetadata } from "./mpeg-audio-metadata";
import {
  MpegAudioOpenOptions,
  MpegAudioSummary,
  ParseState,
  ScanOptions,
} from "./types";

/**
 * Opens MPEG audio with the configured engine defaults
 */
@Injectable()
export class MpegAudioService {
  private readonly logger = new Logger(MpegAudioService.name);
  private readonly defaults: MpegAudioOpenOptions;

  constructor(configService: ConfigService) {
    this.defaults = readMpegAudioConfig(configService);
  }

  openFile(path: string, options: MpegAudioOpenOptions = {}): MpegAudioMetadata {
    return MpegAudioMetadata.openFile(path, { ...this.defaults, ...options });
  }

  /**
   * Answers every getter with the same scan options
   */
  summarize(metadata: MpegAudioMetadata, scan: ScanOptions = {}): MpegAudioSummary {
    const summary: MpegAudioSummary = {
      header: metadata.header,
      isVbr: metadata.isVbr(),
      vbrHeader: metadata.vbrHeader.kind,
      duration: metadata.duration(scan),
      frameCount: metadata.frameCount(scan),
      sampleCount: metadata.sampleCount(scan),
      averageBitrate: metadata.averageBitrate(scan),
      state: metadata.state,
      scanReport: metadata.scanReport,
    };
    this.logger.debug(
      `Summarized ${summary.header.version} ${summary.header.layer} stream at ${ParseState[summary.state]}`,
    );
    return summary;
  }
}
