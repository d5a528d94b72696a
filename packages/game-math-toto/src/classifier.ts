import { toNumberSet } from "./numbers";
import { ClassificationResult, Draw, NumberSet, PrizeTier } from "./types";

/**
 * Ordered decision list; the first matching rule wins, which is what splits
 * the five- and four-match cases on the supplementary number.
 */
export function tierFor(matchCount: number, supplementaryMatched: boolean): PrizeTier {
  if (matchCount === 6) return "JACKPOT";
  if (matchCount === 5 && supplementaryMatched) return "TIER2";
  if (matchCount === 5) return "TIER3";
  if (matchCount === 4 && supplementaryMatched) return "TIER4";
  if (matchCount === 4) return "TIER5";
  if (matchCount === 3 && supplementaryMatched) return "TIER6";
  return "NONE";
}

export function classify(playerNumbers: NumberSet, draw: Draw): ClassificationResult {
  const picks = new Set(toNumberSet(playerNumbers));
  return scoreDraw(picks, draw);
}

/** Classifies against picks already validated by `toNumberSet`. */
export function scoreDraw(picks: ReadonlySet<number>, draw: Draw): ClassificationResult {
  const matchingNumbers = draw.primaryNumbers.filter((value) => picks.has(value));
  const supplementaryMatched = picks.has(draw.supplementary);
  const matchCount = matchingNumbers.length;
  const tier = tierFor(matchCount, supplementaryMatched);

  return {
    matchCount,
    supplementaryMatched,
    matchingNumbers,
    tier,
    isJackpot: tier === "JACKPOT",
  };
}
