import * as fs from "fs";
import { ENGINE_DEFAULTS } from "./consts";
import { ByteSourceOpenError, ByteSourceReadError } from "./mpeg-audio.errors";

/**
 * Random-access, size-known storage the engine reads from.
 * `read` returns fewer bytes than asked for only at the end of the source.
 */
export interface ByteSource {
  readonly size: number;
  read(position: number, length: number): Buffer;
  close?(): void;
}

export class BufferByteSource implements ByteSource {
  constructor(private readonly buffer: Buffer) {}

  get size(): number {
    return this.buffer.length;
  }

  read(position: number, length: number): Buffer {
    return this.buffer.subarray(position, position + length);
  }
}

/**
 * Reads a file through a descriptor held open until `close`
 */
export class FileByteSource implements ByteSource {
  private fd: number | null;

  private constructor(
    fd: number,
    readonly size: number,
    readonly path: string,
  ) {
    this.fd = fd;
  }

  static open(path: string): FileByteSource {
    let fd: number;
    try {
      fd = fs.openSync(path, "r");
    } catch (error) {
      throw new ByteSourceOpenError(path, error);
    }
    try {
      return new FileByteSource(fd, fs.fstatSync(fd).size, path);
    } catch (error) {
      fs.closeSync(fd);
      throw new ByteSourceOpenError(path, error);
    }
  }

  read(position: number, length: number): Buffer {
    if (this.fd === null) {
      throw new ByteSourceReadError(position, length, "source is closed");
    }
    const available = Math.max(0, Math.min(length, this.size - position));
    const buffer = Buffer.alloc(available);
    let filled = 0;
    try {
      while (filled < available) {
        const bytesRead = fs.readSync(
          this.fd,
          buffer,
          filled,
          available - filled,
          position + filled,
        );
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
      }
    } catch (error) {
      throw new ByteSourceReadError(position, length, error);
    }
    return filled === available ? buffer : buffer.subarray(0, filled);
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Positioned reader over a ByteSource. Keeps one window of `chunkSize`
 * bytes so that neighbouring small reads cost a single source read.
 */
export class ByteCursor {
  private windowStart = 0;
  private window: Buffer = Buffer.alloc(0);
  private current = 0;

  constructor(
    private readonly source: ByteSource,
    private readonly chunkSize: number = ENGINE_DEFAULTS.CHUNK_SIZE,
  ) {}

  get size(): number {
    return this.source.size;
  }

  get position(): number {
    return this.current;
  }

  seek(position: number): void {
    this.current = Math.max(0, Math.min(position, this.size));
  }

  /**
   * Reads from the current position and advances past what was read
   */
  read(length: number): Buffer {
    const bytes = this.readAt(this.current, length);
    this.current += bytes.length;
    return bytes;
  }

  /**
   * Reads without moving the cursor. Short at end of source.
   */
  readAt(position: number, length: number): Buffer {
    if (position < 0 || length <= 0 || position >= this.size) {
      return Buffer.alloc(0);
    }
    const end = Math.min(position + length, this.size);
    const windowEnd = this.windowStart + this.window.length;
    if (position >= this.windowStart && end <= windowEnd) {
      return this.window.subarray(position - this.windowStart, end - this.windowStart);
    }
    if (end - position > this.chunkSize) {
      return this.source.read(position, end - position);
    }
    this.windowStart = position;
    this.window = this.source.read(position, this.chunkSize);
    return this.window.subarray(0, end - position);
  }

  /**
   * Offset of the first `byte` in [from, to), or -1
   */
  indexOf(byte: number, from: number, to: number): number {
    let position = Math.max(0, from);
    const stop = Math.min(to, this.size);
    while (position < stop) {
      const chunk = this.readAt(position, Math.min(this.chunkSize, stop - position));
      if (chunk.length === 0) {
        return -1;
      }
      const index = chunk.indexOf(byte);
      if (index !== -1) {
        return position + index;
      }
      position += chunk.length;
    }
    return -1;
  }
}
