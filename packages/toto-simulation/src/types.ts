import { ClassificationResult, Draw, PrizeTally, PrizeTier } from "@toto-sim/game-math-toto";

export interface Clock {
  now(): Date;
  /** Milliseconds from a monotonic origin. */
  monotonicMs(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonicMs: () => performance.now(),
};

export interface SingleDrawResult {
  draw: Draw;
  classification: ClassificationResult;
  timestamp: Date;
}

export interface Trial extends ClassificationResult {
  draw: Draw;
}

export type StopReason = "JACKPOT" | "MAX_DRAWS";

export interface SimulationSummary {
  totalDraws: number;
  maxDraws: number;
  jackpotAchieved: boolean;
  stopReason: StopReason;
  tally: PrizeTally;
  elapsedSeconds: number;
  theoreticalOdds: bigint;
  equivalentYears: number;
}

export interface SimulationProgress {
  draws: number;
  maxDraws: number;
  step: number;
  steps: number;
}

export interface RunUntilJackpotOptions {
  onProgress?: (progress: SimulationProgress) => void;
}

export interface TierBreakdown {
  tier: PrizeTier;
  label: string;
  count: number;
  percentage: number;
}
