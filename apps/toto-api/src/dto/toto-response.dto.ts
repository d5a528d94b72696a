import { ProvablyFairInfo } from "@toto-sim/core-types";
import { PrizeTier } from "@toto-sim/game-math-toto";
import { StopReason, TierBreakdown } from "@toto-sim/toto-simulation";

export interface TotoDrawResponse extends ProvablyFairInfo {
  drawnAt: string;
  playerNumbers: number[];
  winningNumbers: number[];
  supplementary: number;
  tier: PrizeTier;
  label: string;
  matchCount: number;
  matchingNumbers: number[];
  supplementaryMatched: boolean;
  isJackpot: boolean;
}

export interface TotoSimulationResponse extends ProvablyFairInfo {
  playerNumbers: number[];
  totalDraws: number;
  maxDraws: number;
  jackpotAchieved: boolean;
  stopReason: StopReason;
  elapsedSeconds: number;
  equivalentYears: number;
  theoreticalOdds: string;
  tiers: TierBreakdown[];
}
