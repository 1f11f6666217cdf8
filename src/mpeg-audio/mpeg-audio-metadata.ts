import { ByteSource, FileByteSource } from "./byte-cursor";
import { MpegAudioEngine } from "./mpeg-audio-engine";
import {
  Bitrate,
  FrameHeader,
  LocatedFrame,
  Measurement,
  MpegAudioOpenOptions,
  ParseState,
  ScanOptions,
  ScanReport,
  VbrInfo,
} from "./types";

/**
 * Metadata of one MPEG audio stream.
 *
 * Opening reads only the first frames. Getters that take `ScanOptions` may
 * read further: the end of the stream for constant bitrate estimates, or
 * every frame when nothing cheaper answers. Pass `allowFullScan: false` to
 * get an unknown result instead of a full walk.
 *
 * @example
 * const metadata = MpegAudioMetadata.openFile("/music/track.mp3");
 * try {
 *   const duration = metadata.duration({ allowFullScan: false });
 *   if (duration.known) console.log(duration.value, duration.certainty);
 * } finally {
 *   metadata.close();
 * }
 */
export class MpegAudioMetadata {
  private constructor(
    private readonly engine: MpegAudioEngine,
    private readonly source: ByteSource,
  ) {}

  /**
   * @throws NotMpegAudioError when no frame is found within the lookahead
   * @throws TruncatedStreamError when the stream ends before a whole first frame
   * @throws ByteSourceError when the source cannot be read
   */
  static open(source: ByteSource, options: MpegAudioOpenOptions = {}): MpegAudioMetadata {
    return new MpegAudioMetadata(new MpegAudioEngine(source, options), source);
  }

  /**
   * Opens a file and keeps it open until `close`. The file is closed again
   * when opening fails.
   */
  static openFile(path: string, options: MpegAudioOpenOptions = {}): MpegAudioMetadata {
    const source = FileByteSource.open(path);
    try {
      return MpegAudioMetadata.open(source, options);
    } catch (error) {
      source.close();
      throw error;
    }
  }

  get state(): ParseState {
    return this.engine.state;
  }

  /** Header of the first frame */
  get header(): FrameHeader {
    return this.engine.firstFrame.header;
  }

  get firstFrameOffset(): number {
    return this.engine.firstFrame.offset;
  }

  get vbrHeader(): VbrInfo {
    return this.engine.vbrInfo;
  }

  get scanReport(): ScanReport | null {
    return this.engine.scanReport;
  }

  /** Parses the end of the stream on first use */
  get lastFrame(): LocatedFrame {
    return this.engine.lastFrame;
  }

  /**
   * Walks the audio frames lazily, from the first frame after any VBR
   * header frame. Stops early if the caller does.
   */
  frames(): Generator<LocatedFrame> {
    return this.engine.frames();
  }

  /**
   * Reads at least as deep as `target` now, instead of on the first getter
   * that needs it. A stream never returns to a shallower state.
   */
  ensure(target: ParseState): void {
    this.engine.ensure(target);
  }

  duration(options: ScanOptions = {}): Measurement<number> {
    return this.engine.duration(options);
  }

  /** Bitrate of the first frame */
  bitrate(): Bitrate {
    return this.engine.firstFrame.header.bitrate;
  }

  averageBitrate(options: ScanOptions = {}): Measurement<number> {
    return this.engine.averageBitrate(options);
  }

  sampleCount(options: ScanOptions = {}): Measurement<number> {
    return this.engine.sampleCount(options);
  }

  frameCount(options: ScanOptions = {}): Measurement<number> {
    return this.engine.frameCount(options);
  }

  isVbr(): boolean {
    return this.engine.isVbr();
  }

  isConstantBitrate(): boolean {
    return this.engine.isConstantBitrate();
  }

  /** Mean frame length in bytes */
  frameSize(options: ScanOptions = {}): Measurement<number> {
    return this.engine.frameSize(options);
  }

  audioSize(options: ScanOptions = {}): Measurement<number> {
    return this.engine.audioSize(options);
  }

  seekOffset(percent: number): number {
    return this.engine.seekOffset(percent);
  }

  close(): void {
    this.source.close?.();
  }
}
