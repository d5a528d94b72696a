import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, Registry, register } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>, value?: number): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");
export const METRICS_REGISTRY = Symbol("METRICS_REGISTRY");

const DURATION_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000];

export class PrometheusMetricsService implements IMetrics {
  private counters = new Map<string, Counter<string>>();
  private histograms = new Map<string, Histogram<string>>();

  constructor(private readonly registry: Registry = register) {
    this.registry.setDefaultLabels({ service: "toto-simulator" });
  }

  increment(name: string, labels: Record<string, string> = {}, value = 1): void {
    const counter = this.getOrCreateCounter(name, Object.keys(labels));
    counter.inc(labels, value);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.getOrCreateHistogram(name, Object.keys(labels));
    histogram.observe(labels, value);
  }

  private getOrCreateCounter(name: string, labelNames: string[]): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) {
      return existing;
    }
    const counter = new Counter({
      name,
      help: `${name}_counter`,
      labelNames,
      registers: [this.registry],
    });
    this.counters.set(name, counter);
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) {
      return existing;
    }
    const histogram = new Histogram({
      name,
      help: `${name}_histogram`,
      labelNames,
      buckets: DURATION_BUCKETS_MS,
      registers: [this.registry],
    });
    this.histograms.set(name, histogram);
    return histogram;
  }
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
}

export function createMetrics(registry: Registry = register, env: NodeJS.ProcessEnv = process.env): IMetrics {
  if (env.METRICS_DISABLED === "true") {
    return new NoopMetricsService();
  }
  return new PrometheusMetricsService(registry);
}

@Global()
@Module({
  providers: [
    {
      provide: METRICS_REGISTRY,
      useValue: register,
    },
    {
      provide: METRICS,
      useFactory: (registry: Registry) => createMetrics(registry),
      inject: [METRICS_REGISTRY],
    },
  ],
  exports: [METRICS, METRICS_REGISTRY],
})
export class MetricsModule {}
