import { IProvablyFairService } from "@toto-sim/core-provably-fair";
import { ProvablyFairRngService, createSeededSource } from "@toto-sim/core-rng";
import { Draw, generateDraw } from "@toto-sim/game-math-toto";

export interface DrawVerificationParams {
  serverSeed: string;
  clientSeed: string;
  /** Nonce of the draw's first rng value. */
  nonce: number;
  draw: Draw;
}

/** Regenerates the draw that starts at `nonce` of the given seed pair. */
export function replayDraw(provablyFair: IProvablyFairService, params: Omit<DrawVerificationParams, "draw">): Draw {
  const ctx = provablyFair.initContext({
    game: "toto",
    serverSeed: params.serverSeed,
    clientSeed: params.clientSeed,
    nonce: params.nonce,
  });
  const source = createSeededSource(new ProvablyFairRngService(provablyFair), ctx);
  return generateDraw(source.next);
}

export function verifyDraw(provablyFair: IProvablyFairService, params: DrawVerificationParams): boolean {
  const replayed = replayDraw(provablyFair, params);
  return (
    replayed.supplementary === params.draw.supplementary &&
    replayed.primaryNumbers.length === params.draw.primaryNumbers.length &&
    replayed.primaryNumbers.every((value, idx) => value === params.draw.primaryNumbers[idx])
  );
}
