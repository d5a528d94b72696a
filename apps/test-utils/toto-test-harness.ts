import { INestApplication } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { Test } from "@nestjs/testing";
import { Registry } from "prom-client";
import { SIMULATOR_CONFIG, SimulatorConfig } from "@toto-sim/core-config";
import { CorrelationIdInterceptor, LOGGER } from "@toto-sim/core-logging";
import { METRICS, METRICS_REGISTRY, PrometheusMetricsService } from "@toto-sim/core-metrics";
import { IRngService, RNG_SERVICE } from "@toto-sim/core-rng";
import { TOTO_PROVIDERS } from "../toto-api/src/app.module";
import { TotoController } from "../toto-api/src/toto.controller";
import { HealthController } from "../toto-api/src/health.controller";
import { MetricsController } from "../toto-api/src/metrics.controller";
import { InMemoryLogger } from "./test-helpers";

export const TEST_SIMULATOR_CONFIG: SimulatorConfig = {
  defaultMaxDraws: 100,
  maxDrawsLimit: 1_000,
  apiPort: 3000,
};

export interface TotoTestHarnessOptions {
  /** Replaces the provably-fair rng when set; a scripted `TestRngService` is the usual choice. */
  rng?: IRngService;
  config?: SimulatorConfig;
}

export interface TotoTestHarness {
  app: INestApplication;
  logger: InMemoryLogger;
  registry: Registry;
}

export async function createTotoTestHarness(options: TotoTestHarnessOptions = {}): Promise<TotoTestHarness> {
  const config = options.config ?? TEST_SIMULATOR_CONFIG;
  const logger = new InMemoryLogger();
  const registry = new Registry();

  const builder = Test.createTestingModule({
    controllers: [TotoController, HealthController, MetricsController],
    providers: [
      ...TOTO_PROVIDERS,
      { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
      { provide: SIMULATOR_CONFIG, useValue: config },
      { provide: LOGGER, useValue: logger },
      { provide: METRICS_REGISTRY, useValue: registry },
      { provide: METRICS, useValue: new PrometheusMetricsService(registry) },
    ],
  });
  if (options.rng) {
    builder.overrideProvider(RNG_SERVICE).useValue(options.rng);
  }
  const moduleRef = await builder.compile();

  const app = moduleRef.createNestApplication();
  await app.init();

  return { app, logger, registry };
}
