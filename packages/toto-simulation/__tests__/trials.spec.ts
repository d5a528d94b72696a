import { describe, expect, it } from "vitest";
import { Trial, drawTrials, foldTrials, summarizeTiers } from "../src";

function scripted(tiers: Trial["tier"][]): Iterator<Trial> {
  const trials = tiers.map<Trial>((tier) => ({
    tier,
    isJackpot: tier === "JACKPOT",
    matchCount: tier === "JACKPOT" ? 6 : 0,
    matchingNumbers: [],
    supplementaryMatched: false,
    draw: { primaryNumbers: [1, 2, 3, 4, 5, 6], supplementary: 7 },
  }));
  return trials[Symbol.iterator]();
}

describe("drawTrials", () => {
  it("yields scored draws lazily", () => {
    let calls = 0;
    const trials = drawTrials(new Set([1, 2, 3, 4, 5, 6]), () => {
      calls += 1;
      return 0;
    });
    expect(calls).toBe(0);

    const first = trials.next();
    expect(calls).toBe(7);
    expect(first.done).toBe(false);
    expect(first.value).toMatchObject({ tier: "JACKPOT", draw: { supplementary: 7 } });
  });
});

describe("foldTrials", () => {
  it("counts every tier until the jackpot", () => {
    const fold = foldTrials(scripted(["NONE", "TIER6", "NONE", "JACKPOT", "TIER2"]), 10);

    expect(fold.stopReason).toBe("JACKPOT");
    expect(fold.totalDraws).toBe(4);
    expect(fold.tally).toEqual({ JACKPOT: 1, TIER2: 0, TIER3: 0, TIER4: 0, TIER5: 0, TIER6: 1, NONE: 2 });
  });

  it("stops at the cap", () => {
    const seen: number[] = [];
    const fold = foldTrials(scripted(["NONE", "TIER5", "TIER4", "JACKPOT"]), 3, (draws) => seen.push(draws));

    expect(fold.stopReason).toBe("MAX_DRAWS");
    expect(fold.totalDraws).toBe(3);
    expect(seen).toEqual([1, 2, 3]);
  });
});

describe("summarizeTiers", () => {
  it("lists tiers in prize order with percentages", () => {
    const breakdown = summarizeTiers({
      totalDraws: 8,
      tally: { JACKPOT: 0, TIER2: 0, TIER3: 0, TIER4: 1, TIER5: 1, TIER6: 2, NONE: 4 },
    });

    expect(breakdown.map((row) => row.tier)).toEqual(["JACKPOT", "TIER2", "TIER3", "TIER4", "TIER5", "TIER6", "NONE"]);
    expect(breakdown[3]).toEqual({ tier: "TIER4", label: "Group 4 Prize", count: 1, percentage: 12.5 });
    expect(breakdown[5]).toEqual({ tier: "TIER6", label: "Group 6 Prize", count: 2, percentage: 25 });
    expect(breakdown[6]).toEqual({ tier: "NONE", label: "No prize", count: 4, percentage: 50 });
  });

  it("avoids dividing by zero", () => {
    const breakdown = summarizeTiers({
      totalDraws: 0,
      tally: { JACKPOT: 0, TIER2: 0, TIER3: 0, TIER4: 0, TIER5: 0, TIER6: 0, NONE: 0 },
    });
    expect(breakdown.every((row) => row.percentage === 0)).toBe(true);
  });
});
