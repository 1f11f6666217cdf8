import { MpegLayer, MpegVersion } from "./types";

/**
 * Byte-level constants shared by every MPEG audio frame
 */
export const FRAME_CONSTANTS = {
  SYNC_BYTE: 0xff,
  SYNC_MASK: 0xe0,
  FRAME_HEADER_SIZE: 4,
  CRC_SIZE: 2,
  ID3V2_MAGIC: [0x49, 0x44, 0x33] as const, // "ID3"
  ID3V2_HEADER_SIZE: 10,
  ID3V2_FOOTER_FLAG: 0x10,
  XING_MAGIC: "Xing",
  INFO_MAGIC: "Info",
  VBRI_MAGIC: "VBRI",
  VBRI_OFFSET: 36,
  XING_TOC_SIZE: 100,
  MAX_FREE_FORMAT_FRAME_LENGTH: 8192,
} as const;

/**
 * Tuning for the lazy engine. Sizes are in bytes.
 */
export const ENGINE_DEFAULTS = {
  CHUNK_SIZE: 65536,
  LOOKAHEAD_BYTES: 65536,
  TRAILING_TAG_TOLERANCE: 128, // ID3v1
  BEGINNING_SAMPLE_FRAMES: 6,
  MIDDLE_PROBE_FRAMES: 3,
  MIDDLE_PROBE_WINDOW: 16384,
  END_REWIND_BYTES: 4000,
  END_MIN_FRAMES: 3,
} as const;

// Index 0 is free format, index 15 is reserved and never looked up.
const MPEG1_BITRATES: Readonly<Record<MpegLayer, readonly number[]>> = {
  [MpegLayer.Layer1]: [0, 32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448],
  [MpegLayer.Layer2]: [0, 32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384],
  [MpegLayer.Layer3]: [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320],
};

const MPEG2_BITRATES: Readonly<Record<MpegLayer, readonly number[]>> = {
  [MpegLayer.Layer1]: [0, 32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256],
  [MpegLayer.Layer2]: [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
  [MpegLayer.Layer3]: [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
};

export const BITRATE_TABLES: ReadonlyMap<
  MpegVersion,
  Readonly<Record<MpegLayer, readonly number[]>>
> = new Map([
  [MpegVersion.MPEG1, MPEG1_BITRATES],
  [MpegVersion.MPEG2, MPEG2_BITRATES],
  [MpegVersion.MPEG25, MPEG2_BITRATES],
]);

export const SAMPLE_RATE_TABLES: ReadonlyMap<MpegVersion, readonly number[]> =
  new Map([
    [MpegVersion.MPEG1, [44100, 48000, 32000]],
    [MpegVersion.MPEG2, [22050, 24000, 16000]],
    [MpegVersion.MPEG25, [11025, 12000, 8000]],
  ]);

/**
 * Version bits (header bits 19-20) to version. 0b01 is reserved.
 */
export const VERSION_MAP: ReadonlyMap<number, MpegVersion> = new Map([
  [0b00, MpegVersion.MPEG25],
  [0b10, MpegVersion.MPEG2],
  [0b11, MpegVersion.MPEG1],
]);

/**
 * Layer bits (header bits 17-18) to layer. 0b00 is reserved.
 */
export const LAYER_MAP: ReadonlyMap<number, MpegLayer> = new Map([
  [0b01, MpegLayer.Layer3],
  [0b10, MpegLayer.Layer2],
  [0b11, MpegLayer.Layer1],
]);

export function samplesPerFrame(version: MpegVersion, layer: MpegLayer): number {
  switch (layer) {
    case MpegLayer.Layer1:
      return 384;
    case MpegLayer.Layer2:
      return 1152;
    case MpegLayer.Layer3:
      return version === MpegVersion.MPEG1 ? 1152 : 576;
  }
}

/**
 * Layer I counts frame length in 4-byte slots, the others in bytes
 */
export function slotSize(layer: MpegLayer): number {
  return layer === MpegLayer.Layer1 ? 4 : 1;
}

/**
 * Side information size of a Layer III frame, which precedes a Xing header
 */
export function sideInfoSize(version: MpegVersion, mono: boolean): number {
  if (version === MpegVersion.MPEG1) {
    return mono ? 17 : 32;
  }
  return mono ? 9 : 17;
}

/**
 * MPEG-1 Layer II bitrates a channel mode does not allow
 */
export const LAYER2_FORBIDDEN_MONO_BITRATES: ReadonlySet<number> = new Set([
  224, 256, 320, 384,
]);
export const LAYER2_FORBIDDEN_STEREO_BITRATES: ReadonlySet<number> = new Set([
  32, 48, 56, 80,
]);
