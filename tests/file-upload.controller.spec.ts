import { Test, TestingModule } from "@nestjs/testing";
import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  PayloadTooLargeException,
} from "@nestjs/common";
import { PassThrough } from "stream";
import { FileUploadController } from "../src/file-upload/file-upload.controller";
import { FileUploadService } from "../src/file-upload/file-upload.service";
import { MetadataProcessingService } from "../src/file-upload/metadata-processing.service";
import {
  FileUploadErrorCode,
  UploadTooLargeError,
  UploadValidationError,
} from "../src/file-upload/errors";
import { SpooledUpload, UploadRequest } from "../src/file-upload/types";
import {
  ByteSourceReadError,
  NotMpegAudioError,
  TruncatedStreamError,
} from "../src/mpeg-audio/mpeg-audio.errors";
import { UploadError } from "../src/file-storage/file-storage.errors";
import {
  Certainty,
  MpegAudioSummary,
  ParseState,
  ScanOptions,
  UnknownReason,
  VbrHeaderKind,
} from "../src/mpeg-audio/types";
import { decodeFields } from "./helpers/mpeg-frames";

const UPLOAD: SpooledUpload = {
  path: "/tmp/mpeg-upload-1/upload.bin",
  filename: "track.mp3",
  mimeType: "audio/mpeg",
};

const SUMMARY: MpegAudioSummary = {
  header: decodeFields(),
  isVbr: false,
  vbrHeader: VbrHeaderKind.Absent,
  duration: { known: true, value: 0.5, certainty: Certainty.Estimated },
  frameCount: { known: true, value: 19, certainty: Certainty.Estimated },
  sampleCount: { known: true, value: 21888, certainty: Certainty.Estimated },
  averageBitrate: { known: true, value: 128, certainty: Certainty.Declared },
  state: ParseState.EndParsed,
  scanReport: null,
};

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe("FileUploadController", () => {
  let controller: FileUploadController;
  let request: UploadRequest;
  let fileUploadService: {
    processUpload: jest.Mock<Promise<SpooledUpload>, [UploadRequest]>;
  };
  let metadataProcessingService: {
    processFile: jest.Mock<Promise<MpegAudioSummary>, [string, ScanOptions]>;
  };

  beforeEach(async () => {
    fileUploadService = {
      processUpload: jest.fn<Promise<SpooledUpload>, [UploadRequest]>(),
    };
    metadataProcessingService = {
      processFile: jest.fn<Promise<MpegAudioSummary>, [string, ScanOptions]>(),
    };
    request = Object.assign(new PassThrough(), { headers: {} });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [FileUploadController],
      providers: [
        {
          provide: FileUploadService,
          useValue: fileUploadService,
        },
        {
          provide: MetadataProcessingService,
          useValue: metadataProcessingService,
        },
      ],
    }).compile();

    controller = module.get<FileUploadController>(FileUploadController);
  });

  describe("uploadFile", () => {
    it("should return the metadata of the uploaded file", async () => {
      fileUploadService.processUpload.mockResolvedValue(UPLOAD);
      metadataProcessingService.processFile.mockResolvedValue(SUMMARY);

      const result = await controller.uploadFile(request);

      expect(result).toEqual({
        filename: "track.mp3",
        version: "MPEG-1",
        layer: "Layer III",
        sampleRate: 44100,
        channelMode: "stereo",
        bitrate: 128,
        isVbr: false,
        vbrHeader: null,
        durationSeconds: { value: 0.5, certainty: "estimated" },
        frameCount: { value: 19, certainty: "estimated" },
        sampleCount: { value: 21888, certainty: "estimated" },
        averageBitrateKbps: { value: 128, certainty: "declared" },
        parseState: "EndParsed",
        scanComplete: null,
        corruptRegions: 0,
      });
      expect(fileUploadService.processUpload).toHaveBeenCalledWith(request);
      expect(metadataProcessingService.processFile).toHaveBeenCalledWith(UPLOAD.path, {
        allowFullScan: true,
        exact: false,
      });
    });

    it("should pass the scan flags from the query", async () => {
      fileUploadService.processUpload.mockResolvedValue(UPLOAD);
      metadataProcessingService.processFile.mockResolvedValue(SUMMARY);

      await controller.uploadFile(request, "false", "true");

      expect(metadataProcessingService.processFile).toHaveBeenCalledWith(UPLOAD.path, {
        allowFullScan: false,
        exact: true,
      });
    });

    it("should reject a malformed flag before reading the upload", async () => {
      const error = await rejection(controller.uploadFile(request, "maybe"));

      expect(error).toBeInstanceOf(BadRequestException);
      expect(error instanceof HttpException && error.getResponse()).toEqual({
        error: 'Query parameter fullScan must be "true" or "false"',
        code: FileUploadErrorCode.INVALID_QUERY,
      });
      expect(fileUploadService.processUpload).not.toHaveBeenCalled();
    });

    it("should report unknown measurements and scan results", async () => {
      fileUploadService.processUpload.mockResolvedValue(UPLOAD);
      metadataProcessingService.processFile.mockResolvedValue({
        ...SUMMARY,
        header: decodeFields({ bitrateIndex: 0 }),
        isVbr: true,
        vbrHeader: VbrHeaderKind.Xing,
        duration: { known: false, reason: UnknownReason.FULL_SCAN_REQUIRED },
        state: ParseState.AllFramesParsed,
        scanReport: { complete: true, errors: [] },
      });

      const result = await controller.uploadFile(request);

      expect(result.bitrate).toBe("free-format");
      expect(result.isVbr).toBe(true);
      expect(result.vbrHeader).toBe("Xing");
      expect(result.durationSeconds).toEqual({ value: null, certainty: null });
      expect(result.parseState).toBe("AllFramesParsed");
      expect(result.scanComplete).toBe(true);
      expect(result.corruptRegions).toBe(0);
    });

    it.each([
      ["upload", new UploadTooLargeError(1000), PayloadTooLargeException, FileUploadErrorCode.FILE_TOO_LARGE],
      ["upload", new UploadValidationError("File is required"), BadRequestException, FileUploadErrorCode.FILE_REQUIRED],
      ["upload", new UploadError("Disk full"), InternalServerErrorException, FileUploadErrorCode.STORAGE_UPLOAD_ERROR],
      ["processing", new TruncatedStreamError("Stream ends inside the first frame"), BadRequestException, FileUploadErrorCode.TRUNCATED_FILE],
      ["processing", new NotMpegAudioError(0, 600), BadRequestException, FileUploadErrorCode.INVALID_FORMAT],
      ["processing", new ByteSourceReadError(0, 4, new Error("EIO")), InternalServerErrorException, FileUploadErrorCode.STORAGE_READ_ERROR],
    ])("should map a %s %p to %p", async (stage, domainError, exception, code) => {
      if (stage === "upload") {
        fileUploadService.processUpload.mockRejectedValue(domainError);
      } else {
        fileUploadService.processUpload.mockResolvedValue(UPLOAD);
        metadataProcessingService.processFile.mockRejectedValue(domainError);
      }

      const error = await rejection(controller.uploadFile(request));

      expect(error).toBeInstanceOf(exception);
      expect(error instanceof HttpException && error.getResponse()).toEqual({
        error: domainError.message,
        code,
      });
    });

    it("should re-throw unknown errors", async () => {
      const unknownError = new Error("Unknown error");
      fileUploadService.processUpload.mockResolvedValue(UPLOAD);
      metadataProcessingService.processFile.mockRejectedValue(unknownError);

      await expect(controller.uploadFile(request)).rejects.toBe(unknownError);
    });
  });
});
