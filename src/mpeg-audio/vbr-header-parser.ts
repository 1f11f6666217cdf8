import { ByteCursor } from "./byte-cursor";
import { FRAME_CONSTANTS, sideInfoSize } from "./consts";
import {
  ChannelMode,
  FrameHeader,
  LocatedFrame,
  MpegLayer,
  VbrHeaderKind,
  VbrInfo,
  VbriHeader,
  XingHeader,
} from "./types";

const XING_FLAGS = {
  FRAMES: 0x01,
  BYTES: 0x02,
  TOC: 0x04,
  QUALITY: 0x08,
} as const;

const ABSENT: VbrInfo = { kind: VbrHeaderKind.Absent };

// version, delay, quality, bytes, frames, entries, scale, entry size, frames per entry
const VBRI_FIXED_SIZE = 22;

/**
 * Offset of a Xing/Info signature relative to the frame start
 */
export function xingOffset(header: FrameHeader): number {
  return (
    FRAME_CONSTANTS.FRAME_HEADER_SIZE +
    (header.isProtected ? FRAME_CONSTANTS.CRC_SIZE : 0) +
    sideInfoSize(header.version, header.channelMode === ChannelMode.Mono)
  );
}

/**
 * Looks for a Xing/Info or VBRI header inside the first frame
 */
export function parseVbrHeader(cursor: ByteCursor, frame: LocatedFrame): VbrInfo {
  cursor.seek(frame.offset);
  const bytes = cursor.read(frame.length);
  return (
    parseXingHeader(bytes, frame.header, frame.offset) ??
    parseVbriHeader(bytes, frame.offset) ??
    ABSENT
  );
}

/**
 * @param bytes - the whole frame, header included
 * @param frameOffset - file offset of `bytes[0]`
 */
export function parseXingHeader(
  bytes: Buffer,
  header: FrameHeader,
  frameOffset = 0,
): XingHeader | null {
  if (header.layer !== MpegLayer.Layer3) {
    return null;
  }
  const start = xingOffset(header);
  const signature = bytes.toString("latin1", start, start + 4);
  if (signature !== FRAME_CONSTANTS.XING_MAGIC && signature !== FRAME_CONSTANTS.INFO_MAGIC) {
    return null;
  }

  let position = start + 4;
  if (position + 4 > bytes.length) {
    return null;
  }
  const flags = bytes.readUInt32BE(position);
  position += 4;

  const readField = (flag: number, size: number): Buffer | null | undefined => {
    if ((flags & flag) === 0) {
      return null;
    }
    if (position + size > bytes.length) {
      return undefined;
    }
    const field = bytes.subarray(position, position + size);
    position += size;
    return field;
  };

  const frames = readField(XING_FLAGS.FRAMES, 4);
  const byteCount = readField(XING_FLAGS.BYTES, 4);
  const toc = readField(XING_FLAGS.TOC, FRAME_CONSTANTS.XING_TOC_SIZE);
  const quality = readField(XING_FLAGS.QUALITY, 4);
  if (frames === undefined || byteCount === undefined || toc === undefined || quality === undefined) {
    return null;
  }

  return {
    kind: VbrHeaderKind.Xing,
    signature: signature === FRAME_CONSTANTS.XING_MAGIC ? "Xing" : "Info",
    offset: frameOffset + start,
    frameCount: frames && frames.readUInt32BE(0),
    byteCount: byteCount && byteCount.readUInt32BE(0),
    toc: toc && Array.from(toc),
    quality: quality && quality.readUInt32BE(0),
  };
}

/**
 * @param bytes - the whole frame, header included
 * @param frameOffset - file offset of `bytes[0]`
 */
export function parseVbriHeader(bytes: Buffer, frameOffset = 0): VbriHeader | null {
  const start = FRAME_CONSTANTS.VBRI_OFFSET;
  if (bytes.toString("latin1", start, start + 4) !== FRAME_CONSTANTS.VBRI_MAGIC) {
    return null;
  }
  const body = start + 4;
  if (body + VBRI_FIXED_SIZE > bytes.length) {
    return null;
  }

  const entryCount = bytes.readUInt16BE(body + 14);
  const tocScale = bytes.readUInt16BE(body + 16);
  const entrySize = bytes.readUInt16BE(body + 18);
  const tocStart = body + VBRI_FIXED_SIZE;
  if (
    entryCount > 0 &&
    (entrySize < 1 || entrySize > 4 || tocStart + entryCount * entrySize > bytes.length)
  ) {
    return null;
  }

  const toc: number[] = [];
  for (let i = 0; i < entryCount; i++) {
    toc.push(bytes.readUIntBE(tocStart + i * entrySize, entrySize) * tocScale);
  }

  return {
    kind: VbrHeaderKind.Vbri,
    offset: frameOffset + start,
    version: bytes.readUInt16BE(body),
    delay: bytes.readUInt16BE(body + 2),
    quality: bytes.readUInt16BE(body + 4),
    byteCount: bytes.readUInt32BE(body + 6),
    frameCount: bytes.readUInt32BE(body + 10),
    tocScale,
    framesPerEntry: bytes.readUInt16BE(body + 20),
    toc,
  };
}
