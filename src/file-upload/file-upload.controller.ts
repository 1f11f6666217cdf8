import {
  Controller,
  Post,
  Query,
  Req,
  BadRequestException,
  InternalServerErrorException,
  PayloadTooLargeException,
} from "@nestjs/common";
import { MeasurementDto, MetadataResponseDto } from "./dto/metadata-response.dto";
import { FileUploadService } from "./file-upload.service";
import { UploadRequest } from "./types";
import { MetadataProcessingService } from "./metadata-processing.service";
import {
  FileUploadErrorCode,
  UploadTooLargeError,
  UploadValidationError,
} from "./errors";
import {
  ByteSourceError,
  MpegAudioError,
  TruncatedStreamError,
} from "../mpeg-audio/mpeg-audio.errors";
import {
  Measurement,
  MpegAudioSummary,
  ParseState,
  ScanOptions,
  VbrHeaderKind,
} from "../mpeg-audio/types";
import { FileStorageError } from "../file-storage/file-storage.errors";

@Controller("file-upload")
export class FileUploadController {
  constructor(
    private readonly fileUploadService: FileUploadService,
    private readonly metadataProcessingService: MetadataProcessingService,
  ) {}

  @Post()
  async uploadFile(
    @Req() req: UploadRequest,
    @Query("fullScan") fullScan?: string,
    @Query("exact") exact?: string,
  ): Promise<MetadataResponseDto> {
    const scan: ScanOptions = {
      allowFullScan: parseFlag("fullScan", fullScan, true),
      exact: parseFlag("exact", exact, false),
    };

    try {
      const upload = await this.fileUploadService.processUpload(req);
      const summary = await this.metadataProcessingService.processFile(
        upload.path,
        scan,
      );
      return toResponse(upload.filename, summary);
    } catch (error) {
      // Convert domain errors to HTTP exceptions
      if (error instanceof UploadTooLargeError) {
        throw new PayloadTooLargeException({
          error: error.message,
          code: FileUploadErrorCode.FILE_TOO_LARGE,
        });
      }

      if (error instanceof UploadValidationError) {
        throw new BadRequestException({
          error: error.message,
          code: FileUploadErrorCode.FILE_REQUIRED,
        });
      }

      if (error instanceof TruncatedStreamError) {
        throw new BadRequestException({
          error: error.message,
          code: FileUploadErrorCode.TRUNCATED_FILE,
        });
      }

      if (error instanceof MpegAudioError) {
        throw new BadRequestException({
          error: error.message,
          code: FileUploadErrorCode.INVALID_FORMAT,
        });
      }

      if (error instanceof FileStorageError) {
        throw new InternalServerErrorException({
          error: error.message,
          code: FileUploadErrorCode.STORAGE_UPLOAD_ERROR,
        });
      }

      if (error instanceof ByteSourceError) {
        throw new InternalServerErrorException({
          error: error.message,
          code: FileUploadErrorCode.STORAGE_READ_ERROR,
        });
      }

      // Re-throw unknown errors (will be handled by exception filter)
      throw error;
    }
  }
}

function parseFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") {
    return fallback;
  }
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  throw new BadRequestException({
    error: `Query parameter ${name} must be "true" or "false"`,
    code: FileUploadErrorCode.INVALID_QUERY,
  });
}

function toMeasurementDto(measurement: Measurement<number>): MeasurementDto {
  return measurement.known
    ? { value: measurement.value, certainty: measurement.certainty }
    : { value: null, certainty: null };
}

function toResponse(filename: string, summary: MpegAudioSummary): MetadataResponseDto {
  const { header, scanReport } = summary;
  return {
    filename,
    version: header.version,
    layer: header.layer,
    sampleRate: header.sampleRate,
    channelMode: header.channelMode,
    bitrate: header.bitrate.kind === "fixed" ? header.bitrate.kbps : "free-format",
    isVbr: summary.isVbr,
    vbrHeader: summary.vbrHeader === VbrHeaderKind.Absent ? null : summary.vbrHeader,
    durationSeconds: toMeasurementDto(summary.duration),
    frameCount: toMeasurementDto(summary.frameCount),
    sampleCount: toMeasurementDto(summary.sampleCount),
    averageBitrateKbps: toMeasurementDto(summary.averageBitrate),
    parseState: ParseState[summary.state],
    scanComplete: scanReport === null ? null : scanReport.complete,
    corruptRegions: scanReport === null ? 0 : scanReport.errors.length,
  };
}
