import { Request } from "express";

/**
 * An upload written to local storage
 */
export interface SpooledUpload {
  path: string;
  filename: string;
  mimeType: string;
}

/**
 * The parts of an incoming request an upload is read from
 */
export type UploadRequest = Pick<Request, "headers" | "pipe">;
