/**
 * Domain error thrown when upload validation fails.
 * Framework-agnostic error that can be converted to HTTP exceptions in the API layer.
 */
export class UploadValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadValidationError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UploadValidationError);
    }
  }
}

/**
 * Domain error thrown when an uploaded file exceeds the configured size limit
 */
export class UploadTooLargeError extends UploadValidationError {
  constructor(public readonly limit: number) {
    super(`File exceeds the upload limit of ${limit} bytes`);
    this.name = "UploadTooLargeError";
  }
}

/**
 * Error codes specific to file upload API operations.
 * These are HTTP/API layer error codes used for HTTP responses.
 * Domain errors are converted to HTTP exceptions with these codes in the controller layer.
 */
export enum FileUploadErrorCode {
  FILE_REQUIRED = "FILE_REQUIRED",
  FILE_TOO_LARGE = "FILE_TOO_LARGE",
  INVALID_FORMAT = "INVALID_FORMAT",
  TRUNCATED_FILE = "TRUNCATED_FILE",
  INVALID_QUERY = "INVALID_QUERY",
  STORAGE_UPLOAD_ERROR = "STORAGE_UPLOAD_ERROR",
  STORAGE_READ_ERROR = "STORAGE_READ_ERROR",
}
