import { describe, expect, it } from "vitest";
import { LottoError, LottoErrorCode } from "@toto-sim/core-errors";
import { Draw, PrizeTier, classify, generateDraw, tierFor } from "../src";

const draw = (primaryNumbers: number[], supplementary: number): Draw => ({ primaryNumbers, supplementary });

describe("tierFor", () => {
  it.each<[number, boolean, PrizeTier]>([
    [6, false, "JACKPOT"],
    [6, true, "JACKPOT"],
    [5, true, "TIER2"],
    [5, false, "TIER3"],
    [4, true, "TIER4"],
    [4, false, "TIER5"],
    [3, true, "TIER6"],
    [3, false, "NONE"],
    [2, true, "NONE"],
    [2, false, "NONE"],
    [1, true, "NONE"],
    [1, false, "NONE"],
    [0, true, "NONE"],
    [0, false, "NONE"],
  ])("maps %i matches with supplementary=%s to %s", (matchCount, supplementaryMatched, tier) => {
    expect(tierFor(matchCount, supplementaryMatched)).toBe(tier);
  });
});

describe("classify", () => {
  it("awards the jackpot for six matches", () => {
    const result = classify([1, 2, 3, 4, 5, 6], draw([1, 2, 3, 4, 5, 6], 7));
    expect(result).toEqual({
      matchCount: 6,
      supplementaryMatched: false,
      matchingNumbers: [1, 2, 3, 4, 5, 6],
      tier: "JACKPOT",
      isJackpot: true,
    });
  });

  it("awards tier 4 for four matches plus the supplementary", () => {
    const result = classify([1, 2, 3, 4, 5, 6], draw([1, 2, 3, 4, 8, 9], 5));
    expect(result).toEqual({
      matchCount: 4,
      supplementaryMatched: true,
      matchingNumbers: [1, 2, 3, 4],
      tier: "TIER4",
      isJackpot: false,
    });
  });

  it("ignores the order the player entered the numbers in", () => {
    const result = classify([40, 3, 22, 9, 17, 31], draw([3, 9, 17, 22, 30, 41], 40));
    expect(result.matchingNumbers).toEqual([3, 9, 17, 22]);
    expect(result.tier).toBe("TIER4");
  });

  it("splits five matches on the supplementary", () => {
    const numbers = [5, 10, 15, 20, 25, 30];
    expect(classify(numbers, draw([5, 10, 15, 20, 25, 49], 30)).tier).toBe("TIER2");
    expect(classify(numbers, draw([5, 10, 15, 20, 25, 49], 31)).tier).toBe("TIER3");
  });

  it("returns no prize for three matches without the supplementary", () => {
    const result = classify([1, 2, 3, 10, 11, 12], draw([1, 2, 3, 40, 41, 42], 43));
    expect(result).toMatchObject({ matchCount: 3, supplementaryMatched: false, tier: "NONE", isJackpot: false });
  });

  it("matches the intersection size for random draws", () => {
    const numbers = [7, 14, 21, 28, 35, 42];
    let seed = 99;
    const rng = () => {
      seed = (seed * 48271) % 2147483647;
      return seed / 2147483647;
    };
    for (let i = 0; i < 500; i += 1) {
      const generated = generateDraw(rng);
      const result = classify(numbers, generated);
      const expected = generated.primaryNumbers.filter((value) => numbers.includes(value));
      expect(result.matchCount).toBe(expected.length);
      expect(result.matchingNumbers).toEqual(expected);
      expect(result.supplementaryMatched).toBe(numbers.includes(generated.supplementary));
    }
  });

  it.each([
    [[1, 2, 3, 4, 5], /exactly 6 numbers/],
    [[1, 2, 3, 4, 5, 6, 7], /exactly 6 numbers/],
    [[1, 1, 2, 3, 4, 5], /unique/],
    [[0, 2, 3, 4, 5, 6], /between 1 and 49/],
    [[1, 2, 3, 4, 5, 50], /between 1 and 49/],
    [[1, 2, 3, 4, 5, 6.5], /integers/],
  ])("rejects %o as invalid input", (numbers, message) => {
    expect(() => classify(numbers, draw([1, 2, 3, 4, 5, 6], 7))).toThrowError(message);
  });

  it("raises LottoError with the invalid-input code", () => {
    let caught: unknown;
    try {
      classify([1, 2, 3], draw([1, 2, 3, 4, 5, 6], 7));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LottoError);
    expect(caught).toMatchObject({ code: LottoErrorCode.INVALID_INPUT, details: { count: 3 } });
  });
});
