import { Controller, Get, Header, Inject } from "@nestjs/common";
import { Registry } from "prom-client";
import { METRICS_REGISTRY } from "@toto-sim/core-metrics";

@Controller()
export class MetricsController {
  constructor(@Inject(METRICS_REGISTRY) private readonly registry: Registry) {}

  @Get("metrics")
  @Header("Content-Type", "text/plain")
  async metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
