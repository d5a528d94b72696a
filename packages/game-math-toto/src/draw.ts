import { Draw, TOTO_RULES, TotoRules } from "./types";

/**
 * Draws the primary numbers by a partial Fisher-Yates over the full pool, then
 * the supplementary from what is left. Consumes exactly `picks + 1` values of
 * `rng`, so a replayed source replays the draw.
 */
export function generateDraw(rng: () => number, rules: TotoRules = TOTO_RULES): Draw {
  const pool = createPool(rules);

  for (let i = 0; i < rules.picks; i += 1) {
    const j = i + pickIndex(rng, pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  const primaryNumbers = pool.slice(0, rules.picks).sort((a, b) => a - b);
  const supplementary = pool[rules.picks + pickIndex(rng, pool.length - rules.picks)];

  return Object.freeze({
    primaryNumbers: Object.freeze(primaryNumbers),
    supplementary,
  });
}

function createPool(rules: TotoRules): number[] {
  const size = rules.maxNumber - rules.minNumber + 1;
  if (!Number.isInteger(size) || size <= rules.picks) {
    throw new Error("Toto: number range must be larger than the pick count");
  }
  return Array.from({ length: size }, (_, idx) => rules.minNumber + idx);
}

function pickIndex(rng: () => number, size: number): number {
  const rand = rng();
  if (!Number.isFinite(rand) || rand < 0 || rand >= 1) {
    throw new Error("Toto: rng() must produce 0 <= r < 1");
  }
  return Math.floor(rand * size);
}
