import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { SimulatorConfigModule } from "@toto-sim/core-config";
import { CorrelationIdInterceptor, LoggingModule } from "@toto-sim/core-logging";
import { MetricsModule } from "@toto-sim/core-metrics";
import { PROVABLY_FAIR_SERVICE, ProvablyFairService } from "@toto-sim/core-provably-fair";
import { ProvablyFairRngService, RNG_SERVICE } from "@toto-sim/core-rng";
import { TotoController } from "./toto.controller";
import { TotoService } from "./toto.service";
import { HealthController } from "./health.controller";
import { MetricsController } from "./metrics.controller";

export const TOTO_PROVIDERS = [
  { provide: PROVABLY_FAIR_SERVICE, useClass: ProvablyFairService },
  {
    provide: RNG_SERVICE,
    inject: [PROVABLY_FAIR_SERVICE],
    useFactory: (pf: ProvablyFairService) => new ProvablyFairRngService(pf),
  },
  TotoService,
];

@Module({
  imports: [SimulatorConfigModule, LoggingModule, MetricsModule],
  controllers: [TotoController, HealthController, MetricsController],
  providers: [...TOTO_PROVIDERS, { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor }],
})
export class AppModule {}
