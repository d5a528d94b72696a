import { PrizeTally, createEmptyTally, generateDraw, scoreDraw } from "@toto-sim/game-math-toto";
import { StopReason, Trial } from "./types";

/** Unbounded lazy stream of scored draws. */
export function* drawTrials(picks: ReadonlySet<number>, rng: () => number): Generator<Trial, never> {
  while (true) {
    const draw = generateDraw(rng);
    yield { ...scoreDraw(picks, draw), draw };
  }
}

export interface TrialFold {
  tally: PrizeTally;
  totalDraws: number;
  stopReason: StopReason;
}

/**
 * Folds at most `maxDraws` trials into a tally, stopping after the first
 * jackpot. `onTrial` sees the running draw count after each trial.
 */
export function foldTrials(trials: Iterator<Trial>, maxDraws: number, onTrial?: (draws: number) => void): TrialFold {
  const tally = createEmptyTally();
  let totalDraws = 0;

  while (totalDraws < maxDraws) {
    const next = trials.next();
    if (next.done) {
      break;
    }
    totalDraws += 1;
    tally[next.value.tier] += 1;
    onTrial?.(totalDraws);
    if (next.value.isJackpot) {
      return { tally, totalDraws, stopReason: "JACKPOT" };
    }
  }

  return { tally, totalDraws, stopReason: "MAX_DRAWS" };
}
