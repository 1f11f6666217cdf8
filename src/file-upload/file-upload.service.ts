import { Injectable, Logger } from "@nestjs/common";
import { Readable } from "stream";
import { FileStorageError } from "../file-storage/file-storage.errors";
import { FileStorageService } from "../file-storage/file-storage.service";
import { UploadTooLargeError, UploadValidationError } from "./errors";
import { BusboyFactory } from "./busboy-factory.service";
import { SpooledUpload, UploadRequest } from "./types";

type SpoolResult =
  | { ok: true; path: string }
  | { ok: false; error: unknown };

interface PendingUpload {
  /** Settles once the file stream is written; never rejects */
  spool: Promise<SpoolResult>;
  filename: string;
  mimeType: string;
  truncated: () => boolean;
}

/**
 * Service responsible for receiving multipart uploads.
 * Parses multipart/form-data and spools the `file` field to local storage.
 */
@Injectable()
export class FileUploadService {
  private readonly logger = new Logger(FileUploadService.name);

  constructor(
    private readonly fileStorageService: FileStorageService,
    private readonly busboyFactory: BusboyFactory,
  ) {}

  /**
   * Processes a multipart/form-data file upload request.
   *
   * @param req - Express request object containing multipart/form-data
   * @returns Promise resolving to the spooled file
   * @throws UploadValidationError for invalid requests (invalid content type, missing file, etc.)
   * @throws UploadTooLargeError when the file exceeds the size limit
   * @throws FileStorageError for storage errors
   */
  async processUpload(
    req: UploadRequest,
  ): Promise<SpooledUpload> {
    return new Promise((resolve, reject) => {
      const contentType = req.headers["content-type"] || "";
      if (!contentType.includes("multipart/form-data")) {
        reject(
          new UploadValidationError(
            "Invalid content type. Expected multipart/form-data",
          ),
        );
        return;
      }

      const busboy = this.busboyFactory.create(req.headers);
      let pending: PendingUpload | null = null;

      busboy.on(
        "file",
        this.handleFileEvent.bind(this, {
          hasUpload: () => pending !== null,
          setUpload: (value: PendingUpload) => {
            pending = value;
          },
        }),
      );

      busboy.on(
        "finish",
        this.handleFinishEvent.bind(this, {
          upload: () => pending,
          resolve,
          reject,
        }),
      );

      busboy.on(
        "error",
        this.handleBusboyError.bind(this, { upload: () => pending, reject }),
      );

      req.pipe(busboy);
    });
  }

  /**
   * Handles the "file" event from Busboy.
   * @private
   */
  private handleFileEvent(
    state: {
      hasUpload: () => boolean;
      setUpload: (value: PendingUpload) => void;
    },
    name: string,
    stream: Readable,
    info: { filename: string; encoding: string; mimeType: string },
  ): void {
    const { filename, encoding, mimeType } = info;
    if (name !== "file" || state.hasUpload()) {
      stream.resume(); // Drain other fields
      return;
    }

    this.logger.debug(
      `Received file upload: ${filename}, type: ${mimeType}, encoding: ${encoding}`,
    );

    let truncated = false;
    stream.once("limit", () => {
      truncated = true;
    });

    // Spool while the stream is active; busboy waits for it to be consumed
    state.setUpload({
      spool: this.fileStorageService.spoolStream(stream).then(
        (path): SpoolResult => ({ ok: true, path }),
        (error: unknown): SpoolResult => ({ ok: false, error }),
      ),
      filename,
      mimeType,
      truncated: () => truncated,
    });
  }

  /**
   * Handles the "finish" event from Busboy.
   * @private
   */
  private async handleFinishEvent(state: {
    upload: () => PendingUpload | null;
    resolve: (value: SpooledUpload) => void;
    reject: (reason?: unknown) => void;
  }): Promise<void> {
    const upload = state.upload();
    if (upload === null) {
      state.reject(new UploadValidationError("File is required"));
      return;
    }

    const spooled = await upload.spool;
    if (!spooled.ok) {
      if (spooled.error instanceof FileStorageError) {
        this.logger.error(
          `File storage error: ${spooled.error.message}`,
          spooled.error.stack,
          FileUploadService.name,
        );
      }
      state.reject(spooled.error);
      return;
    }
    const { path } = spooled;

    if (upload.truncated()) {
      await this.fileStorageService.release(path);
      state.reject(new UploadTooLargeError(this.busboyFactory.maxFileSize));
      return;
    }

    state.resolve({ path, filename: upload.filename, mimeType: upload.mimeType });
  }

  /**
   * Handles the "error" event from Busboy.
   * @private
   */
  private async handleBusboyError(
    state: {
      upload: () => PendingUpload | null;
      reject: (reason?: unknown) => void;
    },
    error: Error,
  ): Promise<void> {
    this.logger.error(`Busboy error: ${error.message}`, error.stack);
    state.reject(
      new UploadValidationError(
        `Failed to parse multipart form data: ${error.message}`,
      ),
    );

    // A file written before the error is not handed to anyone
    const upload = state.upload();
    if (upload !== null) {
      const spooled = await upload.spool;
      if (spooled.ok) {
        await this.fileStorageService.release(spooled.path);
      }
    }
  }
}
