export interface TotoRules {
  minNumber: number;
  maxNumber: number;
  picks: number;
  drawsPerYear: number; // two draws a week
}

export const TOTO_RULES: Readonly<TotoRules> = Object.freeze({
  minNumber: 1,
  maxNumber: 49,
  picks: 6,
  drawsPerYear: 104,
});

/** Six distinct integers in [1, 49], ascending. */
export type NumberSet = readonly number[];

export interface Draw {
  readonly primaryNumbers: NumberSet;
  readonly supplementary: number;
}

// Fixed order, best tier first.
export const PRIZE_TIERS = ["JACKPOT", "TIER2", "TIER3", "TIER4", "TIER5", "TIER6", "NONE"] as const;

export type PrizeTier = (typeof PRIZE_TIERS)[number];

export const PRIZE_TIER_LABELS: Readonly<Record<PrizeTier, string>> = Object.freeze({
  JACKPOT: "Group 1 Prize",
  TIER2: "Group 2 Prize",
  TIER3: "Group 3 Prize",
  TIER4: "Group 4 Prize",
  TIER5: "Group 5 Prize",
  TIER6: "Group 6 Prize",
  NONE: "No prize",
});

export interface ClassificationResult {
  matchCount: number;
  supplementaryMatched: boolean;
  matchingNumbers: number[];
  tier: PrizeTier;
  isJackpot: boolean;
}

export type PrizeTally = Record<PrizeTier, number>;

export function createEmptyTally(): PrizeTally {
  return {
    JACKPOT: 0,
    TIER2: 0,
    TIER3: 0,
    TIER4: 0,
    TIER5: 0,
    TIER6: 0,
    NONE: 0,
  };
}
