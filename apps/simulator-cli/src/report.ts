import { ProvablyFairInfo } from "@toto-sim/core-types";
import { NumberSet, PRIZE_TIER_LABELS } from "@toto-sim/game-math-toto";
import { SimulationProgress, SimulationSummary, SingleDrawResult, TierBreakdown, summarizeTiers } from "@toto-sim/toto-simulation";

const BAR_WIDTH = 20;

export interface DrawReport extends ProvablyFairInfo {
  drawnAt: string;
  playerNumbers: number[];
  winningNumbers: number[];
  supplementary: number;
  prize: string;
  tier: string;
  matchCount: number;
  matchingNumbers: number[];
  supplementaryMatched: boolean;
}

export interface SimulationReport extends ProvablyFairInfo {
  playerNumbers: number[];
  jackpotAchieved: boolean;
  draws: number;
  maxDraws: number;
  simulationSeconds: number;
  yearsEquivalent: number;
  theoreticalOdds: string;
  prizes: Array<Omit<TierBreakdown, "percentage"> & { percentage: string }>;
}

export function toDrawReport(playerNumbers: NumberSet, result: SingleDrawResult, pf: ProvablyFairInfo): DrawReport {
  const { draw, classification } = result;
  return {
    drawnAt: result.timestamp.toISOString(),
    playerNumbers: [...playerNumbers],
    winningNumbers: [...draw.primaryNumbers],
    supplementary: draw.supplementary,
    prize: PRIZE_TIER_LABELS[classification.tier],
    tier: classification.tier,
    matchCount: classification.matchCount,
    matchingNumbers: classification.matchingNumbers,
    supplementaryMatched: classification.supplementaryMatched,
    ...pf,
  };
}

export function toSimulationReport(playerNumbers: NumberSet, summary: SimulationSummary, pf: ProvablyFairInfo): SimulationReport {
  return {
    playerNumbers: [...playerNumbers],
    jackpotAchieved: summary.jackpotAchieved,
    draws: summary.totalDraws,
    maxDraws: summary.maxDraws,
    simulationSeconds: Number(summary.elapsedSeconds.toFixed(2)),
    yearsEquivalent: summary.equivalentYears,
    theoreticalOdds: summary.theoreticalOdds.toString(),
    prizes: summarizeTiers(summary).map((row) => ({ ...row, percentage: row.percentage.toFixed(2) })),
    ...pf,
  };
}

export function renderProgressBar(progress: Pick<SimulationProgress, "step" | "steps">): string {
  const filled = Math.min(BAR_WIDTH, Math.max(0, Math.round((progress.step / progress.steps) * BAR_WIDTH)));
  return `[${"=".repeat(filled)}${"-".repeat(BAR_WIDTH - filled)}]`;
}
