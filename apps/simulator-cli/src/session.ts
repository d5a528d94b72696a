import { ILogger } from "@toto-sim/core-logging";
import { NoopMetricsService } from "@toto-sim/core-metrics";
import { IProvablyFairService, toProvablyFairInfo } from "@toto-sim/core-provably-fair";
import { IRngService, createSeededSource } from "@toto-sim/core-rng";
import { ProvablyFairInfo } from "@toto-sim/core-types";
import { TotoSimulationEngine } from "@toto-sim/toto-simulation";
import { DrawOptions } from "./args";

export interface SessionDeps {
  provablyFair: IProvablyFairService;
  rng: IRngService;
  logger: ILogger;
}

export interface SimulatorSession {
  engine: TotoSimulationEngine;
  pf: ProvablyFairInfo;
}

/** One engine per invocation, drawing from the seed pair in `options`. */
export function createSession(options: DrawOptions, deps: SessionDeps): SimulatorSession {
  const ctx = deps.provablyFair.initContext({ game: "toto", serverSeed: options.serverSeed, clientSeed: options.clientSeed });
  const source = createSeededSource(deps.rng, ctx);
  const engine = new TotoSimulationEngine({ rng: source.next, logger: deps.logger, metrics: new NoopMetricsService() });
  return { engine, pf: toProvablyFairInfo(ctx) };
}
