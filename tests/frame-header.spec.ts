import {
  areCompatible,
  calculateFrameLength,
  decodeFrameHeader,
  isFrameSync,
} from "../src/mpeg-audio/frame-header";
import {
  ChannelMode,
  Emphasis,
  HeaderRejection,
  MpegLayer,
  MpegVersion,
} from "../src/mpeg-audio/types";
import { decodeFields } from "./helpers/mpeg-frames";

describe("decodeFrameHeader", () => {
  it("should decode an MPEG-1 Layer III 128 kbps 44.1 kHz header", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xfb, 0x90, 0x00]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header).toEqual({
      version: MpegVersion.MPEG1,
      layer: MpegLayer.Layer3,
      bitrateIndex: 9,
      sampleRateIndex: 0,
      padding: false,
      channelMode: ChannelMode.Stereo,
      modeExtension: 0,
      emphasis: Emphasis.None,
      isProtected: false,
      isPrivate: false,
      isCopyrighted: false,
      isOriginal: false,
      bitrate: { kind: "fixed", kbps: 128 },
      sampleRate: 44100,
      samplesPerFrame: 1152,
      frameLength: 417,
    });
  });

  it("should add one byte of padding to a Layer III frame", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xfb, 0x92, 0x00]));

    expect(result.ok && result.header.frameLength).toBe(418);
  });

  it("should decode MPEG-2 Layer III with 576 samples per frame", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xf3, 0x80, 0x00]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header.version).toBe(MpegVersion.MPEG2);
    expect(result.header.bitrate).toEqual({ kind: "fixed", kbps: 64 });
    expect(result.header.sampleRate).toBe(22050);
    expect(result.header.samplesPerFrame).toBe(576);
    expect(result.header.frameLength).toBe(208);
  });

  it("should decode MPEG-2.5 sample rates", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xe3, 0x88, 0x00]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header.version).toBe(MpegVersion.MPEG25);
    expect(result.header.sampleRate).toBe(8000);
    expect(result.header.frameLength).toBe(576);
  });

  it("should count Layer I frames in 4-byte slots", () => {
    const plain = decodeFrameHeader(Buffer.from([0xff, 0xff, 0xc4, 0x00]));
    const padded = decodeFrameHeader(Buffer.from([0xff, 0xff, 0xc6, 0x00]));

    expect(plain.ok && plain.header.layer).toBe(MpegLayer.Layer1);
    expect(plain.ok && plain.header.samplesPerFrame).toBe(384);
    expect(plain.ok && plain.header.frameLength).toBe(384);
    expect(padded.ok && padded.header.frameLength).toBe(388);
  });

  it("should decode MPEG-1 Layer II", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xfd, 0xa4, 0x00]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header.layer).toBe(MpegLayer.Layer2);
    expect(result.header.bitrate).toEqual({ kind: "fixed", kbps: 192 });
    expect(result.header.sampleRate).toBe(48000);
    expect(result.header.frameLength).toBe(576);
  });

  it("should report free format with no frame length", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xfb, 0x00, 0x00]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header.bitrate).toEqual({ kind: "free-format" });
    expect(result.header.frameLength).toBeNull();
  });

  it("should decode flags, channel mode and emphasis", () => {
    const result = decodeFrameHeader(Buffer.from([0xff, 0xfa, 0x91, 0xdd]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.header.isProtected).toBe(true);
    expect(result.header.isPrivate).toBe(true);
    expect(result.header.channelMode).toBe(ChannelMode.Mono);
    expect(result.header.modeExtension).toBe(1);
    expect(result.header.isCopyrighted).toBe(true);
    expect(result.header.isOriginal).toBe(true);
    expect(result.header.emphasis).toBe(Emphasis.Ms50_15);
  });

  it("should decode at a position inside a larger buffer", () => {
    const result = decodeFrameHeader(Buffer.from([0x00, 0x00, 0xff, 0xfb, 0x90, 0x00]), 2);

    expect(result.ok && result.header.frameLength).toBe(417);
  });

  it.each([
    ["no sync", [0x00, 0xfb, 0x90, 0x00], HeaderRejection.BAD_SYNC],
    ["partial sync", [0xff, 0x1b, 0x90, 0x00], HeaderRejection.BAD_SYNC],
    ["reserved version", [0xff, 0xeb, 0x90, 0x00], HeaderRejection.RESERVED_VERSION],
    ["reserved layer", [0xff, 0xf9, 0x90, 0x00], HeaderRejection.RESERVED_LAYER],
    ["reserved bitrate", [0xff, 0xfb, 0xf0, 0x00], HeaderRejection.RESERVED_BITRATE],
    ["reserved sample rate", [0xff, 0xfb, 0x9c, 0x00], HeaderRejection.RESERVED_SAMPLE_RATE],
    ["fewer than four bytes", [0xff, 0xfb, 0x90], HeaderRejection.INSUFFICIENT_DATA],
  ])("should reject a header with %s", (_label, bytes, reason) => {
    expect(decodeFrameHeader(Buffer.from(bytes))).toEqual({ ok: false, reason });
  });

  it("should return the same result for the same bytes", () => {
    const bytes = Buffer.from([0xff, 0xfb, 0x92, 0x40]);

    expect(decodeFrameHeader(bytes)).toEqual(decodeFrameHeader(Buffer.from(bytes)));
  });
});

describe("calculateFrameLength", () => {
  it("should floor the slot count before adding padding", () => {
    expect(calculateFrameLength(MpegLayer.Layer3, 1152, 320, 32000, true)).toBe(1441);
    expect(calculateFrameLength(MpegLayer.Layer3, 1152, 32, 44100, false)).toBe(104);
  });

  it("should multiply Layer I slots by four", () => {
    expect(calculateFrameLength(MpegLayer.Layer1, 384, 448, 32000, true)).toBe(676);
  });
});

describe("isFrameSync", () => {
  it("should need eleven set bits", () => {
    expect(isFrameSync(Buffer.from([0xff, 0xe0]))).toBe(true);
    expect(isFrameSync(Buffer.from([0xff, 0xc0]))).toBe(false);
    expect(isFrameSync(Buffer.from([0xff]))).toBe(false);
  });
});

describe("areCompatible", () => {
  it("should accept bitrate changes within one stream", () => {
    expect(areCompatible(decodeFields({ bitrateIndex: 9 }), decodeFields({ bitrateIndex: 11 }))).toBe(true);
  });

  it("should reject a change of sample rate or layer", () => {
    expect(areCompatible(decodeFields(), decodeFields({ sampleRateIndex: 1 }))).toBe(false);
    expect(areCompatible(decodeFields(), decodeFields({ layer: 2, bitrateIndex: 10 }))).toBe(false);
  });

  it("should not mix free format with fixed bitrates", () => {
    expect(areCompatible(decodeFields(), decodeFields({ bitrateIndex: 0 }))).toBe(false);
  });
});
