import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { createWriteStream, promises as fs } from "fs";
import { tmpdir } from "os";
import * as path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { readString } from "../common/config/config-readers";
import { UploadError, errorMessage } from "./file-storage.errors";

/**
 * Prefix of the per-upload temporary directories
 */
export const UPLOAD_DIRECTORY_PREFIX = "mpeg-upload-";
export const UPLOAD_FILE_NAME = "upload.bin";

/**
 * Spools uploads to local temporary files.
 * The metadata engine needs random access, which a request stream cannot give.
 */
@Injectable()
export class FileStorageService {
  private readonly logger = new Logger(FileStorageService.name);
  private readonly rootDirectory: string;

  constructor(configService: ConfigService) {
    this.rootDirectory = readString(configService, "UPLOAD_TMP_DIR", tmpdir());
  }

  /**
   * Writes a stream to a new temporary file.
   *
   * @param requestStream The readable stream from the HTTP request
   * @returns Path of the written file; pass it to `release` when done
   * @throws UploadError if the file cannot be written
   */
  async spoolStream(requestStream: Readable): Promise<string> {
    let directory: string;
    try {
      directory = await fs.mkdtemp(
        path.join(this.rootDirectory, UPLOAD_DIRECTORY_PREFIX),
      );
    } catch (error: unknown) {
      throw new UploadError(
        `Failed to create upload directory: ${errorMessage(error)}`,
      );
    }

    const filePath = path.join(directory, UPLOAD_FILE_NAME);
    try {
      await pipeline(requestStream, createWriteStream(filePath));
      this.logger.debug(`File spooled to ${filePath}`);
      return filePath;
    } catch (error: unknown) {
      await this.release(filePath);
      throw new UploadError(
        `Failed to store upload: ${errorMessage(error)}`,
        filePath,
      );
    }
  }

  /**
   * Removes a spooled file and its directory. Failures are logged, not thrown.
   */
  async release(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
      await fs.rmdir(path.dirname(filePath));
    } catch (error: unknown) {
      this.logger.warn(
        `Failed to remove temporary upload ${filePath}: ${errorMessage(error)}`,
      );
    }
  }
}
