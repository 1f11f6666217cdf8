import { Logger } from "@nestjs/common";
import { ByteCursor, ByteSource } from "./byte-cursor";
import { ENGINE_DEFAULTS, FRAME_CONSTANTS } from "./consts";
import { bitrateEquals, idealFrameLength } from "./frame-header";
import { FrameSynchronizer, findId3v2TagEnd } from "./frame-synchronizer";
import {
  CorruptFrameError,
  NotMpegAudioError,
  TruncatedStreamError,
} from "./mpeg-audio.errors";
import {
  Bitrate,
  Certainty,
  KnownMeasurement,
  LocatedFrame,
  Measurement,
  MpegAudioOpenOptions,
  ParseState,
  ScanOptions,
  ScanReport,
  UnknownReason,
  VbrHeaderKind,
  VbrInfo,
} from "./types";
import { parseVbrHeader } from "./vbr-header-parser";

interface ResolvedOptions {
  beginOffset: number | null;
  endOffset: number;
  lookaheadBytes: number;
  chunkSize: number;
  trustVbrHeader: boolean;
  probeMiddle: boolean;
  skipId3v2: boolean;
  trailingTagTolerance: number;
}

interface Beginning {
  firstFrame: LocatedFrame;
  vbr: VbrInfo;
  /** Offset of the first frame that carries audio */
  audioStart: number;
  /** Frames sampled at open disagree on bitrate */
  bitrateVaries: boolean;
}

interface Ending {
  lastFrame: LocatedFrame;
  audioEnd: number;
}

interface ScanTotals {
  frameCount: number;
  byteCount: number;
  report: ScanReport;
}

interface CachedMeasurement {
  state: ParseState;
  measurement: KnownMeasurement<number>;
}

type CachedQuantity = "duration" | "averageBitrate";

export function resolveOpenOptions(options: MpegAudioOpenOptions = {}): ResolvedOptions {
  return {
    beginOffset: options.beginOffset ?? null,
    endOffset: options.endOffset ?? 0,
    lookaheadBytes: options.lookaheadBytes ?? ENGINE_DEFAULTS.LOOKAHEAD_BYTES,
    chunkSize: options.chunkSize ?? ENGINE_DEFAULTS.CHUNK_SIZE,
    trustVbrHeader: options.trustVbrHeader ?? true,
    probeMiddle: options.probeMiddle ?? true,
    skipId3v2: options.skipId3v2 ?? true,
    trailingTagTolerance: options.trailingTagTolerance ?? ENGINE_DEFAULTS.TRAILING_TAG_TOLERANCE,
  };
}

function known<T>(value: T, certainty: Certainty): KnownMeasurement<T> {
  return { known: true, value, certainty };
}

function unknown<T>(reason: UnknownReason): Measurement<T> {
  return { known: false, reason };
}

/**
 * Reads a stream only as deep as each question needs.
 *
 * Opening parses the beginning: first frame, VBR header and a bitrate sample.
 * The end and the full frame walk happen on demand, each at most once, and
 * every value derived from them is cached against the depth it was read at.
 */
export class MpegAudioEngine {
  private readonly logger = new Logger(MpegAudioEngine.name);
  private readonly options: ResolvedOptions;
  private readonly cursor: ByteCursor;
  private readonly synchronizer: FrameSynchronizer;
  private readonly beginning: Beginning;
  private ending: Ending | null = null;
  private scan: ScanTotals | null = null;
  private parseState: ParseState = ParseState.Unparsed;
  private readonly cache = new Map<CachedQuantity, CachedMeasurement>();

  constructor(source: ByteSource, options: MpegAudioOpenOptions = {}) {
    this.options = resolveOpenOptions(options);
    this.cursor = new ByteCursor(source, this.options.chunkSize);
    this.synchronizer = new FrameSynchronizer(
      this.cursor,
      Math.max(0, source.size - this.options.endOffset),
      this.options.trailingTagTolerance,
    );
    this.beginning = this.parseBeginning();
    this.parseState = ParseState.BeginningParsed;
  }

  get state(): ParseState {
    return this.parseState;
  }

  get firstFrame(): LocatedFrame {
    return this.beginning.firstFrame;
  }

  get vbrInfo(): VbrInfo {
    return this.beginning.vbr;
  }

  get audioStart(): number {
    return this.beginning.audioStart;
  }

  /** Null until every frame has been walked */
  get scanReport(): ScanReport | null {
    return this.scan?.report ?? null;
  }

  /** Reading it parses the end of the stream */
  get lastFrame(): LocatedFrame {
    return this.end().lastFrame;
  }

  /**
   * Audio frames in stream order, corrupt regions skipped. Does not change
   * the parse state; the scan behind `ensure` keeps its own totals.
   */
  *frames(): Generator<LocatedFrame> {
    for (const step of this.synchronizer.walk(this.audioStart, this.firstFrame.header)) {
      if (step.kind === "frame") {
        yield step.frame;
      }
    }
  }

  /**
   * Advances to at least `target`. Never moves backwards.
   */
  ensure(target: ParseState): void {
    if (target >= ParseState.AllFramesParsed) {
      this.fullScan();
    } else if (target >= ParseState.EndParsed) {
      this.end();
    }
  }

  isVbr(): boolean {
    return this.beginning.vbr.kind !== VbrHeaderKind.Absent;
  }

  isConstantBitrate(): boolean {
    return this.constantKbps() !== null;
  }

  frameCount(options: ScanOptions = {}): Measurement<number> {
    if (this.scan !== null) {
      return known(this.scan.frameCount, Certainty.Exact);
    }
    if (!options.exact) {
      const declared = this.declaredFrameCount();
      if (declared !== null) {
        return known(declared, Certainty.Declared);
      }
      const kbps = this.constantKbps();
      if (kbps !== null) {
        const frames = this.audioBytes() / idealFrameLength(this.firstFrame.header, kbps);
        return known(Math.round(frames), Certainty.Estimated);
      }
    }
    return this.fromFullScan(options, (scan) => known(scan.frameCount, Certainty.Exact));
  }

  sampleCount(options: ScanOptions = {}): Measurement<number> {
    const frames = this.frameCount(options);
    if (!frames.known) {
      return frames;
    }
    return known(frames.value * this.firstFrame.header.samplesPerFrame, frames.certainty);
  }

  /**
   * Playing time in seconds
   */
  duration(options: ScanOptions = {}): Measurement<number> {
    return this.memoize("duration", options, () => {
      if (this.scan !== null) {
        return known(this.framesToSeconds(this.scan.frameCount), Certainty.Exact);
      }
      if (!options.exact) {
        const declared = this.declaredFrameCount();
        if (declared !== null) {
          return known(this.framesToSeconds(declared), Certainty.Declared);
        }
        const kbps = this.constantKbps();
        if (kbps !== null) {
          return known((this.audioBytes() * 8) / (kbps * 1000), Certainty.Estimated);
        }
      }
      return this.fromFullScan(options, (scan) =>
        known(this.framesToSeconds(scan.frameCount), Certainty.Exact),
      );
    });
  }

  /**
   * Mean bitrate over the audio, in kbps
   */
  averageBitrate(options: ScanOptions = {}): Measurement<number> {
    return this.memoize("averageBitrate", options, () => {
      if (this.scan !== null) {
        return this.scannedBitrate(this.scan);
      }
      if (!options.exact) {
        const declared = this.declaredFrameCount();
        if (declared !== null) {
          if (declared === 0) {
            return unknown(UnknownReason.NO_AUDIO_FRAMES);
          }
          const declaredBytes = this.declaredByteCount();
          const bytes = declaredBytes ?? this.audioBytes();
          return known(
            this.bitrateOf(bytes, declared),
            declaredBytes !== null ? Certainty.Declared : Certainty.Estimated,
          );
        }
        const kbps = this.constantKbps();
        if (kbps !== null) {
          return known(kbps, Certainty.Declared);
        }
      }
      return this.fromFullScan(options, (scan) => this.scannedBitrate(scan));
    });
  }

  /**
   * Mean frame length in bytes, VBR header frame excluded
   */
  frameSize(options: ScanOptions = {}): Measurement<number> {
    if (this.scan !== null) {
      return this.scannedFrameSize(this.scan);
    }
    if (!options.exact) {
      const declared = this.declaredFrameCount();
      if (declared !== null) {
        if (declared === 0) {
          return unknown(UnknownReason.NO_AUDIO_FRAMES);
        }
        const declaredBytes = this.declaredByteCount();
        return known(
          (declaredBytes ?? this.audioBytes()) / declared,
          declaredBytes !== null ? Certainty.Declared : Certainty.Estimated,
        );
      }
      const kbps = this.constantKbps();
      if (kbps !== null) {
        return known(idealFrameLength(this.firstFrame.header, kbps), Certainty.Declared);
      }
    }
    return this.fromFullScan(options, (scan) => this.scannedFrameSize(scan));
  }

  /**
   * Bytes of audio frames, VBR header frame excluded
   */
  audioSize(options: ScanOptions = {}): Measurement<number> {
    if (this.scan !== null) {
      return known(this.scan.byteCount, Certainty.Exact);
    }
    if (!options.exact) {
      const declared = this.declaredByteCount();
      if (declared !== null) {
        return known(declared, Certainty.Declared);
      }
      return known(this.audioBytes(), Certainty.Estimated);
    }
    return this.fromFullScan(options, (scan) => known(scan.byteCount, Certainty.Exact));
  }

  /**
   * Estimated byte offset of the audio at `percent` of the playing time.
   * Uses the VBR header's table of contents when one is trusted.
   */
  seekOffset(percent: number): number {
    const position = Number.isFinite(percent) ? Math.min(100, Math.max(0, percent)) : 0;
    const vbr = this.beginning.vbr;

    if (this.options.trustVbrHeader && vbr.kind === VbrHeaderKind.Xing && vbr.toc !== null) {
      const index = Math.min(99, Math.floor(position));
      const from = vbr.toc[index];
      const to = index < 99 ? vbr.toc[index + 1] : 256;
      const fraction = (from + (to - from) * (position - index)) / 256;
      const bytes = vbr.byteCount ?? this.end().audioEnd - this.firstFrame.offset;
      return this.firstFrame.offset + Math.round(fraction * bytes);
    }

    if (
      this.options.trustVbrHeader &&
      vbr.kind === VbrHeaderKind.Vbri &&
      vbr.toc.length > 0 &&
      vbr.framesPerEntry > 0
    ) {
      const targetFrame = (position / 100) * vbr.frameCount;
      let offset = this.audioStart;
      let framesBefore = 0;
      for (const entryBytes of vbr.toc) {
        if (framesBefore + vbr.framesPerEntry > targetFrame) {
          offset += entryBytes * ((targetFrame - framesBefore) / vbr.framesPerEntry);
          return Math.round(offset);
        }
        offset += entryBytes;
        framesBefore += vbr.framesPerEntry;
      }
      return Math.round(offset);
    }

    return this.audioStart + Math.round((position / 100) * this.audioBytes());
  }

  private parseBeginning(): Beginning {
    const limit = this.synchronizer.end;
    const start =
      this.options.beginOffset ??
      (this.options.skipId3v2 ? findId3v2TagEnd(this.cursor) : 0);

    if (limit - start < FRAME_CONSTANTS.FRAME_HEADER_SIZE) {
      throw new TruncatedStreamError(
        `Stream holds ${Math.max(0, limit - start)} bytes after offset ${start}, fewer than a frame header`,
      );
    }

    const searchEnd = Math.min(limit, start + this.options.lookaheadBytes);
    const { frame, truncated } = this.synchronizer.findFrame(start, searchEnd);
    if (frame === null) {
      if (truncated) {
        throw new TruncatedStreamError(
          `Stream ends inside the first frame candidate after offset ${start}`,
        );
      }
      throw new NotMpegAudioError(start, searchEnd);
    }

    const vbr = parseVbrHeader(this.cursor, frame);
    const audioStart =
      vbr.kind === VbrHeaderKind.Absent ? frame.offset : frame.offset + frame.length;
    const sampledBitrates = this.sampleBitrates(frame, audioStart);
    const bitrateVaries = sampledBitrates.some(
      (bitrate) => !bitrateEquals(bitrate, frame.header.bitrate),
    );

    this.logger.debug(
      `First frame at ${frame.offset}: ${frame.header.version} ${frame.header.layer}, ` +
        `${frame.header.sampleRate} Hz, VBR header: ${vbr.kind}`,
    );

    return { firstFrame: frame, vbr, audioStart, bitrateVaries };
  }

  /**
   * Bitrates of a few frames at the start and, optionally, near the middle
   */
  private sampleBitrates(first: LocatedFrame, audioStart: number): Bitrate[] {
    const bitrates = this.chain(
      audioStart,
      first,
      ENGINE_DEFAULTS.BEGINNING_SAMPLE_FRAMES,
    ).map((frame) => frame.header.bitrate);

    if (this.options.probeMiddle) {
      const middle = Math.floor((audioStart + this.synchronizer.end) / 2);
      if (middle > audioStart) {
        const probe = this.synchronizer.findFrame(
          middle,
          middle + ENGINE_DEFAULTS.MIDDLE_PROBE_WINDOW,
        );
        if (probe.frame !== null) {
          for (const frame of this.chain(
            probe.frame.offset,
            first,
            ENGINE_DEFAULTS.MIDDLE_PROBE_FRAMES,
          )) {
            bitrates.push(frame.header.bitrate);
          }
        }
      }
    }
    return bitrates;
  }

  /**
   * Up to `count` frames laid end to end from `offset`
   */
  private chain(offset: number, reference: LocatedFrame, count: number): LocatedFrame[] {
    const frames: LocatedFrame[] = [];
    let position = offset;
    while (frames.length < count) {
      const frame = this.synchronizer.frameAt(position, reference.header);
      if (frame === null) {
        break;
      }
      frames.push(frame);
      position += frame.length;
    }
    return frames;
  }

  private end(): Ending {
    return this.ending ?? this.parseEnding();
  }

  private parseEnding(): Ending {
    const limit = this.synchronizer.end;
    const floor = this.audioStart;
    let rewind: number = ENGINE_DEFAULTS.END_REWIND_BYTES;
    let last: LocatedFrame | null = null;

    for (;;) {
      const searchStart = Math.max(floor, limit - rewind);
      const found = this.synchronizer.findFrame(searchStart, limit);
      if (found.frame !== null) {
        let walked = 0;
        for (const step of this.synchronizer.walk(found.frame.offset, this.firstFrame.header)) {
          if (step.kind === "frame") {
            walked++;
            last = step.frame;
          }
        }
        if (walked >= ENGINE_DEFAULTS.END_MIN_FRAMES) {
          break;
        }
      }
      if (searchStart <= floor) {
        break;
      }
      rewind *= 2;
    }

    const lastFrame = last ?? this.firstFrame;
    const ending: Ending = { lastFrame, audioEnd: lastFrame.offset + lastFrame.length };
    this.ending = ending;
    this.parseState = ParseState.EndParsed;
    this.logger.debug(`Audio ends at ${ending.audioEnd}`);
    return ending;
  }

  private fullScan(): ScanTotals {
    return this.scan ?? this.parseAllFrames();
  }

  private parseAllFrames(): ScanTotals {
    let frameCount = 0;
    let byteCount = 0;
    let last: LocatedFrame | null = null;
    const errors: CorruptFrameError[] = [];

    for (const step of this.synchronizer.walk(this.audioStart, this.firstFrame.header)) {
      switch (step.kind) {
        case "frame":
          frameCount++;
          byteCount += step.frame.length;
          last = step.frame;
          break;
        case "corrupt": {
          const error = new CorruptFrameError(step.offset, step.length);
          this.logger.warn(error.message);
          errors.push(error);
          break;
        }
        case "trailing":
          this.logger.debug(`${step.length} trailing bytes at ${step.offset}`);
          break;
      }
    }

    const lastFrame = last ?? this.firstFrame;
    this.ending = { lastFrame, audioEnd: lastFrame.offset + lastFrame.length };
    const scan: ScanTotals = {
      frameCount,
      byteCount,
      report: { complete: errors.length === 0, errors },
    };
    this.scan = scan;
    this.parseState = ParseState.AllFramesParsed;
    this.logger.debug(
      `Walked ${frameCount} frames, ${errors.length} corrupt region(s)`,
    );
    return scan;
  }

  private fromFullScan(
    options: ScanOptions,
    read: (scan: ScanTotals) => Measurement<number>,
  ): Measurement<number> {
    if (options.allowFullScan === false) {
      return unknown(UnknownReason.FULL_SCAN_REQUIRED);
    }
    return read(this.fullScan());
  }

  private memoize(
    quantity: CachedQuantity,
    options: ScanOptions,
    compute: () => Measurement<number>,
  ): Measurement<number> {
    const cached = this.cache.get(quantity);
    if (
      cached !== undefined &&
      cached.state === this.parseState &&
      (!options.exact || cached.measurement.certainty === Certainty.Exact)
    ) {
      return cached.measurement;
    }
    const measurement = compute();
    if (measurement.known) {
      this.cache.set(quantity, { state: this.parseState, measurement });
    }
    return measurement;
  }

  private declaredFrameCount(): number | null {
    const vbr = this.beginning.vbr;
    if (!this.options.trustVbrHeader || vbr.kind === VbrHeaderKind.Absent) {
      return null;
    }
    return vbr.frameCount;
  }

  private declaredByteCount(): number | null {
    const vbr = this.beginning.vbr;
    if (!this.options.trustVbrHeader || vbr.kind === VbrHeaderKind.Absent) {
      return null;
    }
    return vbr.byteCount;
  }

  /**
   * The bitrate every frame shares, when the stream looks constant
   */
  private constantKbps(): number | null {
    const bitrate = this.firstFrame.header.bitrate;
    if (
      this.headerDeclaresVariableBitrate() ||
      this.beginning.bitrateVaries ||
      bitrate.kind !== "fixed"
    ) {
      return null;
    }
    return bitrate.kbps;
  }

  /**
   * VBRI, or Xing under its own signature. Encoders also write the Xing
   * layout into constant bitrate streams under the "Info" signature.
   */
  private headerDeclaresVariableBitrate(): boolean {
    const vbr = this.beginning.vbr;
    return (
      vbr.kind === VbrHeaderKind.Vbri ||
      (vbr.kind === VbrHeaderKind.Xing && vbr.signature === "Xing")
    );
  }

  private audioBytes(): number {
    return Math.max(0, this.end().audioEnd - this.audioStart);
  }

  private framesToSeconds(frames: number): number {
    const header = this.firstFrame.header;
    return (frames * header.samplesPerFrame) / header.sampleRate;
  }

  private bitrateOf(bytes: number, frames: number): number {
    return (bytes * 8) / this.framesToSeconds(frames) / 1000;
  }

  private scannedFrameSize(scan: ScanTotals): Measurement<number> {
    if (scan.frameCount === 0) {
      return unknown(UnknownReason.NO_AUDIO_FRAMES);
    }
    return known(scan.byteCount / scan.frameCount, Certainty.Exact);
  }

  private scannedBitrate(scan: ScanTotals): Measurement<number> {
    if (scan.frameCount === 0) {
      return unknown(UnknownReason.NO_AUDIO_FRAMES);
    }
    return known(this.bitrateOf(scan.byteCount, scan.frameCount), Certainty.Exact);
  }
}
