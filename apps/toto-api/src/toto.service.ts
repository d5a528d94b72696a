import { BadRequestException, Inject, Injectable } from "@nestjs/common";
import { LottoErrorCode, isLottoError, lottoErrorPayload } from "@toto-sim/core-errors";
import { SIMULATOR_CONFIG } from "@toto-sim/core-config";
import type { SimulatorConfig } from "@toto-sim/core-config";
import { LOGGER } from "@toto-sim/core-logging";
import type { ILogger } from "@toto-sim/core-logging";
import { METRICS } from "@toto-sim/core-metrics";
import type { IMetrics } from "@toto-sim/core-metrics";
import { PROVABLY_FAIR_SERVICE, toProvablyFairInfo } from "@toto-sim/core-provably-fair";
import type { IProvablyFairService } from "@toto-sim/core-provably-fair";
import { RNG_SERVICE, createSeededSource } from "@toto-sim/core-rng";
import type { IRngService } from "@toto-sim/core-rng";
import type { ProvablyFairInfo } from "@toto-sim/core-types";
import { PRIZE_TIER_LABELS, toNumberSet } from "@toto-sim/game-math-toto";
import { TotoSimulationEngine, summarizeTiers } from "@toto-sim/toto-simulation";
import { TotoDrawDto } from "./dto/toto-draw.dto";
import { TotoSimulationDto } from "./dto/toto-simulation.dto";
import type { TotoDrawResponse, TotoSimulationResponse } from "./dto/toto-response.dto";

@Injectable()
export class TotoService {
  constructor(
    @Inject(PROVABLY_FAIR_SERVICE) private readonly provablyFair: IProvablyFairService,
    @Inject(RNG_SERVICE) private readonly rng: IRngService,
    @Inject(SIMULATOR_CONFIG) private readonly config: SimulatorConfig,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(METRICS) private readonly metrics: IMetrics,
  ) {}

  draw(dto: TotoDrawDto): TotoDrawResponse {
    return this.withInputErrors(() => {
      const numbers = toNumberSet(dto.numbers);
      const { engine, pf } = this.createEngine(dto.clientSeed);
      const { draw, classification, timestamp } = engine.runOnce(numbers);

      this.logger.info("toto.draw.completed", {
        game: "toto",
        tier: classification.tier,
        matchCount: classification.matchCount,
        serverSeedHash: pf.serverSeedHash,
        clientSeed: pf.clientSeed,
        nonce: pf.nonce,
      });

      return {
        drawnAt: timestamp.toISOString(),
        playerNumbers: [...numbers],
        winningNumbers: [...draw.primaryNumbers],
        supplementary: draw.supplementary,
        tier: classification.tier,
        label: PRIZE_TIER_LABELS[classification.tier],
        matchCount: classification.matchCount,
        matchingNumbers: classification.matchingNumbers,
        supplementaryMatched: classification.supplementaryMatched,
        isJackpot: classification.isJackpot,
        ...pf,
      };
    });
  }

  simulate(dto: TotoSimulationDto): TotoSimulationResponse {
    return this.withInputErrors(() => {
      const numbers = toNumberSet(dto.numbers);
      const maxDraws = this.resolveMaxDraws(dto.maxDraws);
      const { engine, pf } = this.createEngine(dto.clientSeed);
      const summary = engine.runUntilJackpot(numbers, maxDraws);

      return {
        playerNumbers: [...numbers],
        totalDraws: summary.totalDraws,
        maxDraws: summary.maxDraws,
        jackpotAchieved: summary.jackpotAchieved,
        stopReason: summary.stopReason,
        elapsedSeconds: summary.elapsedSeconds,
        equivalentYears: summary.equivalentYears,
        theoreticalOdds: summary.theoreticalOdds.toString(),
        tiers: summarizeTiers(summary),
        ...pf,
      };
    });
  }

  private createEngine(clientSeed?: string): { engine: TotoSimulationEngine; pf: ProvablyFairInfo } {
    const ctx = this.provablyFair.initContext({ game: "toto", clientSeed });
    const source = createSeededSource(this.rng, ctx);
    const engine = new TotoSimulationEngine({ rng: source.next, logger: this.logger, metrics: this.metrics });
    return { engine, pf: toProvablyFairInfo(ctx) };
  }

  private resolveMaxDraws(requested: number | undefined): number {
    const maxDraws = requested ?? this.config.defaultMaxDraws;
    if (maxDraws > this.config.maxDrawsLimit) {
      throw new BadRequestException(
        lottoErrorPayload(LottoErrorCode.INVALID_INPUT, `maxDraws must not exceed ${this.config.maxDrawsLimit}`, {
          maxDraws,
          limit: this.config.maxDrawsLimit,
        }),
      );
    }
    return maxDraws;
  }

  private withInputErrors<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isLottoError(err) && err.code === LottoErrorCode.INVALID_INPUT) {
        throw new BadRequestException(lottoErrorPayload(err.code, err.message, err.details));
      }
      throw err;
    }
  }
}
