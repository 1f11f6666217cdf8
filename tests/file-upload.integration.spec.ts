import { Test, TestingModule } from "@nestjs/testing";
import { INestApplication } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import request from "supertest";
import { AppModule } from "../src/tasks/file-upload/app.module";
import {
  buildCbrStream,
  buildFrame,
  buildId3v2Tag,
  buildVariableStream,
} from "./helpers/mpeg-frames";

async function createApp(config?: Record<string, string>): Promise<INestApplication> {
  const builder = Test.createTestingModule({
    imports: [AppModule],
  });
  if (config !== undefined) {
    builder.overrideProvider(ConfigService).useValue(new ConfigService(config));
  }
  const moduleFixture: TestingModule = await builder.compile();

  const app = moduleFixture.createNestApplication();
  await app.init();
  return app;
}

describe("FileUploadController (integration)", () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe("POST /file-upload", () => {
    it("should return metadata for a constant bitrate stream", async () => {
      const fileBuffer = buildCbrStream(100, {}, { padded: false });

      const response = await request(app.getHttpServer())
        .post("/file-upload")
        .attach("file", fileBuffer, "track.mp3")
        .expect(201);

      expect(response.body).toEqual({
        filename: "track.mp3",
        version: "MPEG-1",
        layer: "Layer III",
        sampleRate: 44100,
        channelMode: "stereo",
        bitrate: 128,
        isVbr: false,
        vbrHeader: null,
        durationSeconds: { value: 2.60625, certainty: "estimated" },
        frameCount: { value: 100, certainty: "estimated" },
        sampleCount: { value: 115200, certainty: "estimated" },
        averageBitrateKbps: { value: 128, certainty: "declared" },
        parseState: "EndParsed",
        scanComplete: null,
        corruptRegions: 0,
      });
    });

    it("should count every frame when exact values are requested", async () => {
      const fileBuffer = Buffer.concat([buildId3v2Tag(500), buildCbrStream(100)]);

      const response = await request(app.getHttpServer())
        .post("/file-upload?exact=true")
        .attach("file", fileBuffer, "tagged.mp3")
        .expect(201);

      expect(response.body.frameCount).toEqual({ value: 100, certainty: "exact" });
      expect(response.body.parseState).toBe("AllFramesParsed");
      expect(response.body.scanComplete).toBe(true);
    });

    it("should leave values unknown when a full scan is not allowed", async () => {
      const fileBuffer = buildVariableStream(40, [9, 10]);

      const response = await request(app.getHttpServer())
        .post("/file-upload?fullScan=false")
        .attach("file", fileBuffer, "variable.mp3")
        .expect(201);

      expect(response.body.durationSeconds).toEqual({ value: null, certainty: null });
      expect(response.body.frameCount).toEqual({ value: null, certainty: null });
      expect(response.body.isVbr).toBe(false);
      expect(response.body.parseState).toBe("BeginningParsed");
    });

    it("should return 400 for missing file", async () => {
      const response = await request(app.getHttpServer())
        .post("/file-upload")
        .field("comment", "no file here")
        .expect(400);

      expect(response.body).toEqual({ error: "File is required", code: "FILE_REQUIRED" });
    });

    it("should return 400 for a file that is not MPEG audio", async () => {
      const invalidFile = Buffer.from("This is not an MP3 file");

      const response = await request(app.getHttpServer())
        .post("/file-upload")
        .attach("file", invalidFile, "test.txt")
        .expect(400);

      expect(response.body.code).toBe("INVALID_FORMAT");
    });

    it("should return 400 for a file cut off inside its first frame", async () => {
      const response = await request(app.getHttpServer())
        .post("/file-upload")
        .attach("file", buildFrame().subarray(0, 200), "short.mp3")
        .expect(400);

      expect(response.body.code).toBe("TRUNCATED_FILE");
    });

    it("should return 400 for a malformed query flag", async () => {
      const response = await request(app.getHttpServer())
        .post("/file-upload?fullScan=maybe")
        .attach("file", buildCbrStream(10), "track.mp3")
        .expect(400);

      expect(response.body.code).toBe("INVALID_QUERY");
    });

    it("should return 400 for non-multipart request", async () => {
      const response = await request(app.getHttpServer())
        .post("/file-upload")
        .set("Content-Type", "application/json")
        .send({ file: "data" })
        .expect(400);

      expect(response.body).toEqual({
        error: "Invalid content type. Expected multipart/form-data",
        code: "FILE_REQUIRED",
      });
    });

    it("should return consistent results for the same file", async () => {
      const fileBuffer = buildCbrStream(50);

      const response1 = await request(app.getHttpServer())
        .post("/file-upload")
        .attach("file", fileBuffer, "test1.mp3")
        .expect(201);

      const response2 = await request(app.getHttpServer())
        .post("/file-upload")
        .attach("file", fileBuffer, "test2.mp3")
        .expect(201);

      expect(response1.body.durationSeconds).toEqual(response2.body.durationSeconds);
    });
  });
});

describe("FileUploadController (integration, upload limit)", () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createApp({ UPLOAD_MAX_FILE_SIZE: "1000" });
  });

  afterAll(async () => {
    await app.close();
  });

  it("should return 413 for a file over the limit", async () => {
    const response = await request(app.getHttpServer())
      .post("/file-upload")
      .attach("file", buildCbrStream(10), "large.mp3")
      .expect(413);

    expect(response.body).toEqual({
      error: "File exceeds the upload limit of 1000 bytes",
      code: "FILE_TOO_LARGE",
    });
  });
});
