import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Busboy from "busboy";
import { IncomingHttpHeaders } from "http";
import { readPositiveInteger } from "../common/config/config-readers";

export const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

/**
 * Factory service for creating Busboy instances.
 * Applies the configured upload limits to every parser it creates.
 */
@Injectable()
export class BusboyFactory {
  readonly maxFileSize: number;

  constructor(configService: ConfigService) {
    this.maxFileSize = readPositiveInteger(
      configService,
      "UPLOAD_MAX_FILE_SIZE",
      DEFAULT_MAX_FILE_SIZE,
    );
  }

  /**
   * Creates a new Busboy instance for one request.
   *
   * @param headers - HTTP headers from the request
   */
  create(headers: IncomingHttpHeaders): Busboy.Busboy {
    return Busboy({
      headers,
      limits: { files: 1, fileSize: this.maxFileSize },
    });
  }
}
