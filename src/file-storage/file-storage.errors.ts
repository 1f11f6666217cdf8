/**
 * Error codes specific to file storage operations
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum FileStorageErrorCode {
  UPLOAD_ERROR = "UPLOAD_ERROR",
}

/**
 * Base error class for file storage errors
 * Framework-agnostic error that can be caught and converted to framework-specific exceptions
 */
export class FileStorageError extends Error {
  constructor(
    public readonly code: FileStorageErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FileStorageError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FileStorageError);
    }
  }
}

/**
 * Error thrown when an upload cannot be written to local storage
 */
export class UploadError extends FileStorageError {
  constructor(message: string, public readonly path?: string) {
    super(FileStorageErrorCode.UPLOAD_ERROR, message);
    this.name = "UploadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
