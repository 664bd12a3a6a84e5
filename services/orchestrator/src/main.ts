import "reflect-metadata";

import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";

import { AppModule } from "./app.module.js";
import { APP_CONFIG } from "./tokens.js";
import type { AppConfig } from "./config.js";

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.useBodyParser("json", { limit: "25mb" });
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
  }));
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  Logger.log(`Orchestrator listening on port ${config.port}`, "Bootstrap");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    Logger.error(`Failed to bootstrap orchestrator: ${(error as Error).message}`, "Bootstrap");
    process.exitCode = 1;
  });
}
