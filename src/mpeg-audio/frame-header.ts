import {
  BITRATE_TABLES,
  FRAME_CONSTANTS,
  LAYER_MAP,
  SAMPLE_RATE_TABLES,
  VERSION_MAP,
  samplesPerFrame,
  slotSize,
} from "./consts";
import {
  Bitrate,
  ChannelMode,
  Emphasis,
  FrameHeader,
  HeaderDecodeResult,
  HeaderRejection,
  MpegLayer,
  MpegVersion,
} from "./types";

const CHANNEL_MODES: readonly ChannelMode[] = [
  ChannelMode.Stereo,
  ChannelMode.JointStereo,
  ChannelMode.DualChannel,
  ChannelMode.Mono,
];

const EMPHASES: readonly Emphasis[] = [
  Emphasis.None,
  Emphasis.Ms50_15,
  Emphasis.Reserved,
  Emphasis.CcittJ17,
];

const RESERVED_BITRATE_INDEX = 0x0f;

/**
 * Checks for the 11-bit frame sync at a position
 */
export function isFrameSync(bytes: Buffer, position = 0): boolean {
  return (
    position + 1 < bytes.length &&
    bytes[position] === FRAME_CONSTANTS.SYNC_BYTE &&
    (bytes[position + 1] & FRAME_CONSTANTS.SYNC_MASK) ===
      FRAME_CONSTANTS.SYNC_MASK
  );
}

/**
 * Decodes the frame header starting at `position`.
 * Pure: the result depends only on the four header bytes.
 */
export function decodeFrameHeader(
  bytes: Buffer,
  position = 0,
): HeaderDecodeResult {
  if (position < 0 || position + FRAME_CONSTANTS.FRAME_HEADER_SIZE > bytes.length) {
    return { ok: false, reason: HeaderRejection.INSUFFICIENT_DATA };
  }
  if (!isFrameSync(bytes, position)) {
    return { ok: false, reason: HeaderRejection.BAD_SYNC };
  }

  const word = bytes.readUInt32BE(position);

  const version = VERSION_MAP.get((word >>> 19) & 0x03);
  if (version === undefined) {
    return { ok: false, reason: HeaderRejection.RESERVED_VERSION };
  }
  const layer = LAYER_MAP.get((word >>> 17) & 0x03);
  if (layer === undefined) {
    return { ok: false, reason: HeaderRejection.RESERVED_LAYER };
  }
  const bitrateIndex = (word >>> 12) & 0x0f;
  if (bitrateIndex === RESERVED_BITRATE_INDEX) {
    return { ok: false, reason: HeaderRejection.RESERVED_BITRATE };
  }
  const sampleRateIndex = (word >>> 10) & 0x03;
  const sampleRate = SAMPLE_RATE_TABLES.get(version)?.[sampleRateIndex];
  if (sampleRate === undefined) {
    return { ok: false, reason: HeaderRejection.RESERVED_SAMPLE_RATE };
  }

  const bitrate = lookupBitrate(version, layer, bitrateIndex);
  const padding = ((word >>> 9) & 0x01) === 1;
  const spf = samplesPerFrame(version, layer);

  return {
    ok: true,
    header: {
      version,
      layer,
      bitrateIndex,
      sampleRateIndex,
      padding,
      channelMode: CHANNEL_MODES[(word >>> 6) & 0x03],
      modeExtension: (word >>> 4) & 0x03,
      emphasis: EMPHASES[word & 0x03],
      // The bit is 0 when a CRC follows the header
      isProtected: ((word >>> 16) & 0x01) === 0,
      isPrivate: ((word >>> 8) & 0x01) === 1,
      isCopyrighted: ((word >>> 3) & 0x01) === 1,
      isOriginal: ((word >>> 2) & 0x01) === 1,
      bitrate,
      sampleRate,
      samplesPerFrame: spf,
      frameLength:
        bitrate.kind === "fixed"
          ? calculateFrameLength(layer, spf, bitrate.kbps, sampleRate, padding)
          : null,
    },
  };
}

function lookupBitrate(
  version: MpegVersion,
  layer: MpegLayer,
  index: number,
): Bitrate {
  const kbps = BITRATE_TABLES.get(version)?.[layer][index] ?? 0;
  return kbps === 0 ? { kind: "free-format" } : { kind: "fixed", kbps };
}

/**
 * Frame length in bytes, header included.
 * (floor(coefficient * bitrate / sampleRate) + padding) * slot, where the
 * coefficient is the number of slots per second of bitrate.
 */
export function calculateFrameLength(
  layer: MpegLayer,
  samples: number,
  kbps: number,
  sampleRate: number,
  padding: boolean,
): number {
  const slot = slotSize(layer);
  const coefficient = samples / 8 / slot;
  const slots = Math.floor((coefficient * kbps * 1000) / sampleRate);
  return (slots + (padding ? 1 : 0)) * slot;
}

/**
 * Average frame length for a bitrate, before padding is rounded into frames
 */
export function idealFrameLength(header: FrameHeader, kbps: number): number {
  return (header.samplesPerFrame / 8) * kbps * 1000 / header.sampleRate;
}

/**
 * Frames that can follow one another in a single stream.
 * A free-format stream stays free format.
 */
export function areCompatible(a: FrameHeader, b: FrameHeader): boolean {
  return (
    a.version === b.version &&
    a.layer === b.layer &&
    a.sampleRate === b.sampleRate &&
    a.bitrate.kind === b.bitrate.kind
  );
}

export function bitrateEquals(a: Bitrate, b: Bitrate): boolean {
  if (a.kind === "fixed" && b.kind === "fixed") {
    return a.kbps === b.kbps;
  }
  return a.kind === b.kind;
}
