import { assertNever, invalidInput } from "@toto-sim/core-errors";
import { ILogger, NoopLogger } from "@toto-sim/core-logging";
import { IMetrics, NoopMetricsService } from "@toto-sim/core-metrics";
import {
  JACKPOT_ODDS,
  NumberSet,
  PRIZE_TIERS,
  PrizeTally,
  equivalentYears,
  generateDraw,
  scoreDraw,
  toNumberSet,
} from "@toto-sim/game-math-toto";
import { ProgressTracker } from "./progress";
import { drawTrials, foldTrials } from "./trials";
import {
  Clock,
  RunUntilJackpotOptions,
  SimulationSummary,
  SingleDrawResult,
  StopReason,
  systemClock,
} from "./types";

export interface TotoSimulationEngineOptions {
  rng: () => number;
  clock?: Clock;
  logger?: ILogger;
  metrics?: IMetrics;
}

export class TotoSimulationEngine {
  private readonly rng: () => number;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly metrics: IMetrics;

  constructor(options: TotoSimulationEngineOptions) {
    if (typeof options.rng !== "function") {
      throw new Error("Toto: rng() source is required");
    }
    this.rng = options.rng;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsService();
  }

  runOnce(playerNumbers: NumberSet): SingleDrawResult {
    const picks = new Set(toNumberSet(playerNumbers));
    const draw = generateDraw(this.rng);
    const classification = scoreDraw(picks, draw);

    this.metrics.increment("toto_draws_total", { tier: classification.tier });

    return { draw, classification, timestamp: this.clock.now() };
  }

  runUntilJackpot(playerNumbers: NumberSet, maxDraws: number, options: RunUntilJackpotOptions = {}): SimulationSummary {
    const numbers = toNumberSet(playerNumbers);
    if (!Number.isSafeInteger(maxDraws) || maxDraws < 1) {
      throw invalidInput("Toto: maxDraws must be a positive integer", { maxDraws });
    }

    const progress = new ProgressTracker(maxDraws, options.onProgress);
    const startedAt = this.clock.monotonicMs();
    const fold = foldTrials(drawTrials(new Set(numbers), this.rng), maxDraws, (draws) => progress.record(draws));
    const elapsedMs = this.clock.monotonicMs() - startedAt;

    const summary: SimulationSummary = {
      totalDraws: fold.totalDraws,
      maxDraws,
      jackpotAchieved: fold.stopReason === "JACKPOT",
      stopReason: fold.stopReason,
      tally: fold.tally,
      elapsedSeconds: elapsedMs / 1000,
      theoreticalOdds: JACKPOT_ODDS,
      equivalentYears: equivalentYears(fold.totalDraws),
    };

    this.record(numbers, summary, elapsedMs);
    return summary;
  }

  private record(numbers: NumberSet, summary: SimulationSummary, elapsedMs: number): void {
    const outcome = outcomeLabel(summary.stopReason);
    this.metrics.increment("toto_simulations_total", { outcome });
    this.recordTally(summary.tally);
    this.metrics.observe("toto_simulation_duration_ms", elapsedMs, { outcome });

    this.logger.info("toto.simulation.completed", {
      game: "toto",
      numbers,
      outcome,
      totalDraws: summary.totalDraws,
      maxDraws: summary.maxDraws,
      jackpotTally: summary.tally.JACKPOT,
      elapsedSeconds: summary.elapsedSeconds,
      equivalentYears: summary.equivalentYears,
    });
  }

  private recordTally(tally: PrizeTally): void {
    for (const tier of PRIZE_TIERS) {
      if (tally[tier] > 0) {
        this.metrics.increment("toto_draws_total", { tier }, tally[tier]);
      }
    }
  }
}

function outcomeLabel(reason: StopReason): "jackpot" | "exhausted" {
  switch (reason) {
    case "JACKPOT":
      return "jackpot";
    case "MAX_DRAWS":
      return "exhausted";
    default:
      return assertNever(reason, "stop reason");
  }
}
