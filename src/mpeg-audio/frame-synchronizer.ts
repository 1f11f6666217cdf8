import { ByteCursor } from "./byte-cursor";
import {
  ENGINE_DEFAULTS,
  FRAME_CONSTANTS,
  LAYER2_FORBIDDEN_MONO_BITRATES,
  LAYER2_FORBIDDEN_STEREO_BITRATES,
  slotSize,
} from "./consts";
import { areCompatible, decodeFrameHeader, isFrameSync } from "./frame-header";
import {
  ChannelMode,
  Emphasis,
  FrameHeader,
  LocatedFrame,
  MpegLayer,
  MpegVersion,
} from "./types";

export interface SyncResult {
  frame: LocatedFrame | null;
  /**
   * The search found no frame and the audio ends inside a header, or inside
   * a frame that starts right at the search start
   */
  truncated: boolean;
}

export type WalkStep =
  | { kind: "frame"; frame: LocatedFrame }
  | { kind: "corrupt"; offset: number; length: number }
  | { kind: "trailing"; offset: number; length: number };

type Located = LocatedFrame | "header-cut" | "frame-cut" | null;

/**
 * Cross-field checks the decoder leaves out
 */
export function isPlausibleHeader(header: FrameHeader): boolean {
  if (header.emphasis === Emphasis.Reserved) {
    return false;
  }
  if (
    header.version === MpegVersion.MPEG1 &&
    header.layer === MpegLayer.Layer2 &&
    header.bitrate.kind === "fixed"
  ) {
    const forbidden =
      header.channelMode === ChannelMode.Mono
        ? LAYER2_FORBIDDEN_MONO_BITRATES
        : LAYER2_FORBIDDEN_STEREO_BITRATES;
    return !forbidden.has(header.bitrate.kbps);
  }
  return true;
}

function paddingOf(header: FrameHeader): number {
  return header.padding ? slotSize(header.layer) : 0;
}

/**
 * Offset just past any ID3v2 tags that begin at `start`.
 * Reads only the 10-byte tag headers.
 */
export function findId3v2TagEnd(cursor: ByteCursor, start = 0): number {
  const { ID3V2_MAGIC, ID3V2_HEADER_SIZE, ID3V2_FOOTER_FLAG } = FRAME_CONSTANTS;
  const header = cursor.readAt(start, ID3V2_HEADER_SIZE);
  if (
    header.length < ID3V2_HEADER_SIZE ||
    header[0] !== ID3V2_MAGIC[0] ||
    header[1] !== ID3V2_MAGIC[1] ||
    header[2] !== ID3V2_MAGIC[2]
  ) {
    return start;
  }

  // Synchsafe integer: 7 significant bits per byte
  const tagSize =
    ((header[6] & 0x7f) << 21) |
    ((header[7] & 0x7f) << 14) |
    ((header[8] & 0x7f) << 7) |
    (header[9] & 0x7f);
  const footerSize = header[5] & ID3V2_FOOTER_FLAG ? ID3V2_HEADER_SIZE : 0;
  const end = start + ID3V2_HEADER_SIZE + tagSize + footerSize;

  if (end > cursor.size) {
    return start;
  }
  return findId3v2TagEnd(cursor, end);
}

/**
 * Locates and confirms frames. A candidate counts as a frame only when a
 * compatible header follows it, or when the audio ends within the trailing
 * tolerance after it. A free-format candidate is measured up to the header
 * that follows it, so it needs the header after that one as well.
 */
export class FrameSynchronizer {
  private freeFormatBase: number | null = null;

  constructor(
    private readonly cursor: ByteCursor,
    /** Exclusive end of the region that may hold audio */
    readonly end: number,
    private readonly trailingTagTolerance: number = ENGINE_DEFAULTS.TRAILING_TAG_TOLERANCE,
  ) {}

  /**
   * First confirmed frame whose offset lies in [start, searchEnd)
   */
  findFrame(start: number, searchEnd: number, limit: number = this.end): SyncResult {
    const stop = Math.min(searchEnd, limit);
    const first = Math.max(0, start);
    let truncated = false;
    let offset = first;

    while (offset < stop) {
      const candidate = this.cursor.indexOf(FRAME_CONSTANTS.SYNC_BYTE, offset, stop);
      if (candidate === -1) {
        break;
      }
      const located = this.locate(candidate, null, limit);
      if (located === "header-cut" || (located === "frame-cut" && candidate === first)) {
        truncated = true;
      } else if (located !== null && located !== "frame-cut" && this.confirm(located, limit)) {
        this.learnFreeFormat(located);
        return { frame: located, truncated: false };
      }
      offset = candidate + 1;
    }

    return { frame: null, truncated };
  }

  /**
   * The frame at exactly `offset`, if it is compatible with `reference`
   * and fits before `limit`. No confirmation.
   */
  frameAt(offset: number, reference: FrameHeader, limit: number = this.end): LocatedFrame | null {
    const located = this.locate(offset, reference, limit);
    return located === "header-cut" || located === "frame-cut" ? null : located;
  }

  /**
   * Walks frames from `start`. A position that does not hold a frame is
   * reported as a corrupt region up to the next confirmed frame, or as
   * trailing data when no frame follows it.
   */
  *walk(start: number, reference: FrameHeader, limit: number = this.end): Generator<WalkStep> {
    let offset = start;
    while (limit - offset >= FRAME_CONSTANTS.FRAME_HEADER_SIZE) {
      const frame = this.frameAt(offset, reference, limit);
      if (frame !== null) {
        yield { kind: "frame", frame };
        offset += frame.length;
        continue;
      }

      const resync = this.findFrame(offset + 1, limit, limit);
      if (resync.frame === null) {
        yield { kind: "trailing", offset, length: limit - offset };
        return;
      }
      yield { kind: "corrupt", offset, length: resync.frame.offset - offset };
      offset = resync.frame.offset;
    }
  }

  private locate(offset: number, reference: FrameHeader | null, limit: number): Located {
    const bytes = this.cursor.readAt(
      offset,
      Math.min(FRAME_CONSTANTS.FRAME_HEADER_SIZE, limit - offset),
    );
    if (bytes.length < FRAME_CONSTANTS.FRAME_HEADER_SIZE) {
      return isFrameSync(bytes) ? "header-cut" : null;
    }

    const decoded = decodeFrameHeader(bytes);
    if (!decoded.ok || !isPlausibleHeader(decoded.header)) {
      return null;
    }
    const header = decoded.header;
    if (reference !== null && !areCompatible(reference, header)) {
      return null;
    }

    const length = header.frameLength ?? this.freeFormatLength(offset, header, limit);
    if (length === null) {
      return null;
    }
    if (offset + length > limit) {
      return "frame-cut";
    }
    return { offset, length, header };
  }

  private confirm(frame: LocatedFrame, limit: number): boolean {
    const next = frame.offset + frame.length;
    const successor = this.compatibleHeaderAt(next, frame.header, limit);
    if (successor === null) {
      return limit - next <= this.trailingTagTolerance;
    }
    if (frame.header.frameLength !== null) {
      return true;
    }

    const base = frame.length - paddingOf(frame.header);
    const third = next + base + paddingOf(successor);
    if (third > limit) {
      return false;
    }
    return (
      this.compatibleHeaderAt(third, frame.header, limit) !== null ||
      limit - third <= this.trailingTagTolerance
    );
  }

  private compatibleHeaderAt(
    offset: number,
    reference: FrameHeader,
    limit: number,
  ): FrameHeader | null {
    if (limit - offset < FRAME_CONSTANTS.FRAME_HEADER_SIZE) {
      return null;
    }
    const decoded = decodeFrameHeader(
      this.cursor.readAt(offset, FRAME_CONSTANTS.FRAME_HEADER_SIZE),
    );
    if (
      !decoded.ok ||
      !isPlausibleHeader(decoded.header) ||
      !areCompatible(reference, decoded.header)
    ) {
      return null;
    }
    return decoded.header;
  }

  private freeFormatLength(offset: number, header: FrameHeader, limit: number): number | null {
    if (this.freeFormatBase !== null) {
      return this.freeFormatBase + paddingOf(header);
    }

    // Free format leaves the length implicit: measure it to the next header
    const searchEnd = Math.min(limit, offset + FRAME_CONSTANTS.MAX_FREE_FORMAT_FRAME_LENGTH);
    let position = offset + FRAME_CONSTANTS.FRAME_HEADER_SIZE;
    while (position < searchEnd) {
      const candidate = this.cursor.indexOf(FRAME_CONSTANTS.SYNC_BYTE, position, searchEnd);
      if (candidate === -1) {
        return null;
      }
      const decoded = decodeFrameHeader(
        this.cursor.readAt(candidate, FRAME_CONSTANTS.FRAME_HEADER_SIZE),
      );
      if (decoded.ok && areCompatible(header, decoded.header)) {
        return candidate - offset;
      }
      position = candidate + 1;
    }
    return null;
  }

  private learnFreeFormat(frame: LocatedFrame): void {
    if (frame.header.frameLength === null && this.freeFormatBase === null) {
      this.freeFormatBase = frame.length - paddingOf(frame.header);
    }
  }
}
