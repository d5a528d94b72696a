import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { SIMULATOR_CONFIG } from "@toto-sim/core-config";
import type { SimulatorConfig } from "@toto-sim/core-config";
import { AppModule } from "./app.module";

export async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(new Logger());
  app.enableShutdownHooks();
  const config = app.get<SimulatorConfig>(SIMULATOR_CONFIG);
  await app.listen(config.apiPort);
  Logger.log(`TOTO API is running on port ${config.apiPort}`);
}

void bootstrap();
