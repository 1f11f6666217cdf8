import type { CorruptFrameError } from "./mpeg-audio.errors";

export enum MpegVersion {
  MPEG1 = "MPEG-1",
  MPEG2 = "MPEG-2",
  MPEG25 = "MPEG-2.5",
}

export enum MpegLayer {
  Layer1 = "Layer I",
  Layer2 = "Layer II",
  Layer3 = "Layer III",
}

export enum ChannelMode {
  Stereo = "stereo",
  JointStereo = "joint stereo",
  DualChannel = "dual channel",
  Mono = "mono",
}

export enum Emphasis {
  None = "none",
  Ms50_15 = "50/15 ms",
  Reserved = "reserved",
  CcittJ17 = "CCITT J.17",
}

export type Bitrate =
  | { kind: "fixed"; kbps: number }
  | { kind: "free-format" };

/**
 * Decoded 4-byte frame header with the values derived from it
 */
export interface FrameHeader {
  version: MpegVersion;
  layer: MpegLayer;
  bitrateIndex: number;
  sampleRateIndex: number;
  padding: boolean;
  channelMode: ChannelMode;
  modeExtension: number;
  emphasis: Emphasis;
  isProtected: boolean;
  isPrivate: boolean;
  isCopyrighted: boolean;
  isOriginal: boolean;
  bitrate: Bitrate;
  sampleRate: number;
  samplesPerFrame: number;
  /** Byte length of the frame, header included. Null for free format. */
  frameLength: number | null;
}

export enum HeaderRejection {
  INSUFFICIENT_DATA = "INSUFFICIENT_DATA",
  BAD_SYNC = "BAD_SYNC",
  RESERVED_VERSION = "RESERVED_VERSION",
  RESERVED_LAYER = "RESERVED_LAYER",
  RESERVED_BITRATE = "RESERVED_BITRATE",
  RESERVED_SAMPLE_RATE = "RESERVED_SAMPLE_RATE",
}

export type HeaderDecodeResult =
  | { ok: true; header: FrameHeader }
  | { ok: false; reason: HeaderRejection };

/**
 * A frame located in the stream. `length` is resolved even for free format.
 */
export interface LocatedFrame {
  offset: number;
  length: number;
  header: FrameHeader;
}

export enum VbrHeaderKind {
  Xing = "Xing",
  Vbri = "VBRI",
  Absent = "Absent",
}

export interface XingHeader {
  kind: VbrHeaderKind.Xing;
  /** "Info" is written by encoders for constant bitrate streams */
  signature: "Xing" | "Info";
  offset: number;
  frameCount: number | null;
  byteCount: number | null;
  toc: readonly number[] | null;
  quality: number | null;
}

export interface VbriHeader {
  kind: VbrHeaderKind.Vbri;
  offset: number;
  version: number;
  delay: number;
  quality: number;
  byteCount: number;
  frameCount: number;
  tocScale: number;
  framesPerEntry: number;
  /** Scaled byte size of each TOC entry's span of frames */
  toc: readonly number[];
}

export interface AbsentVbrHeader {
  kind: VbrHeaderKind.Absent;
}

export type VbrInfo = XingHeader | VbriHeader | AbsentVbrHeader;

/**
 * Monotone parse depth. Numeric so that depths compare with < and >=.
 */
export enum ParseState {
  Unparsed = 0,
  BeginningParsed = 1,
  EndParsed = 2,
  AllFramesParsed = 3,
}

export enum Certainty {
  /** Counted frame by frame */
  Exact = "exact",
  /** Read from a VBR header or the frame header */
  Declared = "declared",
  /** Extrapolated from the constant bitrate and audio size */
  Estimated = "estimated",
}

export enum UnknownReason {
  FULL_SCAN_REQUIRED = "FULL_SCAN_REQUIRED",
  NO_AUDIO_FRAMES = "NO_AUDIO_FRAMES",
}

export type KnownMeasurement<T> = { known: true; value: T; certainty: Certainty };

export type Measurement<T> =
  | KnownMeasurement<T>
  | { known: false; reason: UnknownReason };

export interface ScanOptions {
  /** Permit walking every frame when no cheaper answer exists. Defaults to true. */
  allowFullScan?: boolean;
  /** Refuse declared or estimated answers. Defaults to false. */
  exact?: boolean;
}

export interface MpegAudioOpenOptions {
  /** Offset to start looking for the first frame. Defaults to after a leading ID3v2 tag. */
  beginOffset?: number;
  /** Bytes at the end of the stream that are known not to be audio */
  endOffset?: number;
  lookaheadBytes?: number;
  chunkSize?: number;
  trustVbrHeader?: boolean;
  probeMiddle?: boolean;
  skipId3v2?: boolean;
  trailingTagTolerance?: number;
}

export interface ScanReport {
  complete: boolean;
  errors: readonly CorruptFrameError[];
}

/**
 * Everything known about a stream after answering each getter once
 */
export interface MpegAudioSummary {
  header: FrameHeader;
  isVbr: boolean;
  vbrHeader: VbrHeaderKind;
  duration: Measurement<number>;
  frameCount: Measurement<number>;
  sampleCount: Measurement<number>;
  averageBitrate: Measurement<number>;
  state: ParseState;
  scanReport: ScanReport | null;
}
