import { PRIZE_TIERS, PRIZE_TIER_LABELS } from "@toto-sim/game-math-toto";
import { SimulationSummary, TierBreakdown } from "./types";

export function summarizeTiers(summary: Pick<SimulationSummary, "tally" | "totalDraws">): TierBreakdown[] {
  return PRIZE_TIERS.map((tier) => {
    const count = summary.tally[tier];
    return {
      tier,
      label: PRIZE_TIER_LABELS[tier],
      count,
      percentage: summary.totalDraws > 0 ? (count / summary.totalDraws) * 100 : 0,
    };
  });
}
