import { TOTO_RULES } from "./types";

/** Binomial coefficient C(n, k) in exact integer arithmetic. */
export function combinations(n: number, k: number): bigint {
  if (!Number.isSafeInteger(n) || !Number.isSafeInteger(k) || n < 0 || k < 0) {
    throw new Error("combinations: n and k must be non-negative integers");
  }
  if (k > n) {
    return 0n;
  }
  const r = BigInt(Math.min(k, n - k));
  const total = BigInt(n);
  let result = 1n;
  for (let i = 1n; i <= r; i += 1n) {
    // Each partial product is itself C(total - r + i, i), so the division is exact.
    result = (result * (total - r + i)) / i;
  }
  return result;
}

export const JACKPOT_ODDS: bigint = combinations(TOTO_RULES.maxNumber - TOTO_RULES.minNumber + 1, TOTO_RULES.picks);

export function equivalentYears(draws: number, drawsPerYear: number = TOTO_RULES.drawsPerYear): number {
  return Math.round((draws / drawsPerYear) * 10) / 10;
}
