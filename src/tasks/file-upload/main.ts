import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { readPositiveInteger } from "../../common/config/config-readers";
import { AppModule } from "./app.module";

const DEFAULT_PORT = 3000;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const port = readPositiveInteger(app.get(ConfigService), "PORT", DEFAULT_PORT);
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    "Bootstrap",
  );
  process.exit(1);
});
